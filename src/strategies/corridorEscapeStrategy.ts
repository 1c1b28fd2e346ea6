import { BaseStrategy, DecisionContext, StrategyDecision } from "./baseStrategy";
import { Direction, MatchPhase, MatchSession } from "../types";

/**
 * Panic behaviour: run to the safe row, then along it to the exit column.
 *
 * Every tentative step is re-checked; an unsafe step falls back to the
 * most-space move. Arriving at the exit hands over to post-escape fill.
 */
export class CorridorEscapeStrategy extends BaseStrategy {
  name = "CorridorEscape";
  phase = MatchPhase.PANIC;

  evaluate(
    context: DecisionContext,
    session: MatchSession
  ): StrategyDecision | null {
    const { head } = context;
    const corridor = session.corridor ?? context.corridor;
    const planned: MatchSession = { ...session, corridor };

    // Step 1: align with the safe row
    if (head.y !== corridor.row) {
      const direction = head.y < corridor.row ? Direction.DOWN : Direction.UP;
      return this.stepOrFallback(
        context,
        planned,
        direction,
        `heading to safe row ${corridor.row}`
      );
    }

    // Step 2: run along the row to the exit column
    if (head.x !== corridor.exitColumn) {
      const bias = head.x < corridor.exitColumn ? 1 : -1;
      const direction = bias > 0 ? Direction.RIGHT : Direction.LEFT;
      return this.stepOrFallback(
        context,
        { ...planned, escapeBias: bias },
        direction,
        `running to exit column ${corridor.exitColumn}`
      );
    }

    // Step 3: arrived
    return this.fallbackDecision(
      context,
      { ...planned, phase: MatchPhase.POST_ESCAPE_FILL },
      "reached corridor exit"
    );
  }

  private stepOrFallback(
    context: DecisionContext,
    session: MatchSession,
    direction: Direction,
    reason: string
  ): StrategyDecision | null {
    if (this.isSafe(context, direction)) {
      return this.createDecision(direction, reason, session);
    }
    return this.fallbackDecision(
      context,
      session,
      `${direction} blocked while ${reason}`
    );
  }
}
