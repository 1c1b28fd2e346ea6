export * from "./game";
