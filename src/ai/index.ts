export * from "./trailAI";
export * from "./phaseStateMachine";
export * from "./decisionContext";
