import type { Grid } from "../game/grid";
import {
  AgentState,
  CorridorPlan,
  Direction,
  MatchPhase,
  MatchSession,
  MoveCandidate,
  Position,
} from "../types";
import { sortByScore } from "../utils/candidates";
import { isSuicidal } from "../utils/collision";
import { getPositionInDirection } from "../utils/position";

/**
 * Everything a strategy may read for one decision. Built from a snapshot,
 * never mutated.
 */
export interface DecisionContext {
  grid: Grid;
  width: number;
  height: number;
  self: AgentState;
  head: Position;
  opponentHead: Position | null; // null when the opponent is dead
  occupied: ReadonlySet<string>;
  corridor: CorridorPlan;
  candidates: MoveCandidate[];
}

export interface StrategyDecision {
  direction: Direction;
  reason: string;
  session: MatchSession; // session after this decision
}

/**
 * Interface for phase strategies.
 */
export interface PhaseStrategy {
  name: string;
  phase: MatchPhase;
  evaluate(
    context: DecisionContext,
    session: MatchSession
  ): StrategyDecision | null;
}

/**
 * Base class for all strategies.
 */
export abstract class BaseStrategy implements PhaseStrategy {
  abstract name: string;
  abstract phase: MatchPhase;

  abstract evaluate(
    context: DecisionContext,
    session: MatchSession
  ): StrategyDecision | null;

  protected createDecision(
    direction: Direction,
    reason: string,
    session: MatchSession
  ): StrategyDecision {
    return { direction, reason: `${this.name} - ${reason}`, session };
  }

  protected isSafe(context: DecisionContext, direction: Direction): boolean {
    const target = getPositionInDirection(
      context.head,
      direction,
      context.width,
      context.height
    );
    return !isSuicidal(context.grid, context.head, target, context.occupied);
  }

  /**
   * Generic selection: best-scoring non-suicidal candidate, or the best
   * candidate outright when every move is fatal. Null when there are none.
   */
  protected selectNonSuicidal(context: DecisionContext): MoveCandidate | null {
    const sorted = sortByScore(context.candidates);

    for (const candidate of sorted) {
      if (
        !isSuicidal(context.grid, context.head, candidate.target, context.occupied)
      ) {
        return candidate;
      }
    }

    return sorted[0] ?? null;
  }

  /**
   * Generic selection wrapped as a decision, keeping the given session
   */
  protected fallbackDecision(
    context: DecisionContext,
    session: MatchSession,
    why: string
  ): StrategyDecision | null {
    const candidate = this.selectNonSuicidal(context);
    if (!candidate) return null;

    const safe = !isSuicidal(
      context.grid,
      context.head,
      candidate.target,
      context.occupied
    );
    return this.createDecision(
      candidate.direction,
      `${why}, ${safe ? "most space" : "no safe move, most space"} (${candidate.score})`,
      session
    );
  }
}
