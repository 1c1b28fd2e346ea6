/**
 * Export tất cả các utility functions
 */

// Export constants as primary source of truth
export * from "./constants";

export * from "./position";
export * from "./floodFill";
export * from "./collision";
export * from "./candidates";
export * from "./smartLogger";
