import { BaseStrategy, DecisionContext, StrategyDecision } from "./baseStrategy";
import { MatchPhase, MatchSession } from "../types";

/**
 * Default play: take the move with the most reachable space that does not
 * kill us.
 */
export class OpenPlayStrategy extends BaseStrategy {
  name = "OpenPlay";
  phase = MatchPhase.OPEN_PLAY;

  evaluate(
    context: DecisionContext,
    session: MatchSession
  ): StrategyDecision | null {
    return this.fallbackDecision(context, session, "flood fill");
  }
}
