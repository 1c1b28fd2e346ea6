export * from "./grid";
export * from "./gameEngine";
