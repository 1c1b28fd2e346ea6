export * from "./schemas";
export * from "./errorHandler";
export * from "./agentServer";
