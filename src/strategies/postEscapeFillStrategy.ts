import { BaseStrategy, DecisionContext, StrategyDecision } from "./baseStrategy";
import { Direction, MatchPhase, MatchSession } from "../types";

/**
 * After the escape: keep filling horizontally along the escape bias,
 * turning vertically when blocked.
 */
export class PostEscapeFillStrategy extends BaseStrategy {
  name = "PostEscapeFill";
  phase = MatchPhase.POST_ESCAPE_FILL;

  evaluate(
    context: DecisionContext,
    session: MatchSession
  ): StrategyDecision | null {
    // Neutral bias means we never ran along the corridor; go right
    const horizontal =
      session.escapeBias < 0 ? Direction.LEFT : Direction.RIGHT;

    for (const direction of [horizontal, Direction.UP, Direction.DOWN]) {
      if (this.isSafe(context, direction)) {
        return this.createDecision(
          direction,
          direction === horizontal ? "continuing along bias" : "turning",
          session
        );
      }
    }

    return this.fallbackDecision(context, session, "fill blocked");
  }
}
