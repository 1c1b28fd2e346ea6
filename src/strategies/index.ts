/**
 * Export tất cả các strategies
 */

export * from "./baseStrategy";
export * from "./openPlayStrategy";
export * from "./corridorEscapeStrategy";
export * from "./postEscapeFillStrategy";
