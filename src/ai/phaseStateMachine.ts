import {
  CorridorPlan,
  MatchPhase,
  MatchSession,
  Position,
} from "../types";
import type { DecisionContext } from "../strategies/baseStrategy";
import { PANIC_THRESHOLD } from "../utils/constants";
import { horizontalSeparation, wrap } from "../utils/position";

/**
 * Fresh session for a new match: open play, neutral bias, no corridor yet
 */
export function createMatchSession(): MatchSession {
  return {
    phase: MatchPhase.OPEN_PLAY,
    escapeBias: 0,
    corridor: null,
  };
}

/**
 * Safe row half a board away from the origin row; exit at the origin column
 */
export function planCorridor(origin: Position, height: number): CorridorPlan {
  return {
    row: wrap(origin.y + Math.floor(height / 2), height),
    exitColumn: origin.x,
  };
}

export interface PhaseTransition {
  session: MatchSession;
  transitions: string[];
}

/**
 * Open play → panic → post-escape fill. Transitions only move forward;
 * the only way back to open play is a new session.
 */
export class PhaseStateMachine {
  constructor(private readonly panicThreshold: number = PANIC_THRESHOLD) {}

  /**
   * Apply the proximity and infiltration transitions for one decision.
   * The arrival transition belongs to the corridor escape strategy.
   */
  public advance(
    session: MatchSession,
    context: DecisionContext
  ): PhaseTransition {
    const transitions: string[] = [];
    let next = session;

    if (
      next.phase === MatchPhase.OPEN_PLAY &&
      this.isOpponentClose(context.head, context.opponentHead)
    ) {
      next = {
        ...next,
        phase: MatchPhase.PANIC,
        corridor: next.corridor ?? context.corridor,
      };
      transitions.push(
        `OPEN_PLAY -> PANIC (opponent within ${this.panicThreshold} column)`
      );
    }

    if (
      next.phase === MatchPhase.PANIC &&
      context.opponentHead &&
      PhaseStateMachine.isCorridorInfiltrated(
        context.head,
        context.opponentHead,
        next.corridor ?? context.corridor
      )
    ) {
      next = { ...next, phase: MatchPhase.POST_ESCAPE_FILL };
      transitions.push("PANIC -> POST_ESCAPE_FILL (corridor infiltrated)");
    }

    return { session: next, transitions };
  }

  private isOpponentClose(
    head: Position,
    opponentHead: Position | null
  ): boolean {
    if (!opponentHead) return false;
    return horizontalSeparation(head, opponentHead) <= this.panicThreshold;
  }

  /**
   * The opponent sits on the safe row between our column and the exit.
   * Our own column is excluded, the exit column is included.
   */
  public static isCorridorInfiltrated(
    head: Position,
    opponentHead: Position,
    corridor: CorridorPlan
  ): boolean {
    if (head.y === corridor.row || opponentHead.y !== corridor.row) {
      return false;
    }

    const exit = corridor.exitColumn;
    const opp = opponentHead.x;

    if (head.x < exit) {
      return head.x < opp && opp <= exit;
    }
    if (head.x > exit) {
      return exit <= opp && opp < head.x;
    }
    return false;
  }
}
