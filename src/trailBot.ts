import { TrailAI, TrailAIOptions } from "./ai";
import { createMatchSession } from "./ai/phaseStateMachine";
import { GameEngine } from "./game";
import {
  MatchSession,
  MoveDecision,
  PlayerNumber,
  StateSync,
} from "./types";
import { logger, LogCategory } from "./utils/smartLogger";

/**
 * Encode a decision the way the game master expects: "UP" or "UP:BOOST"
 */
export function formatMove(decision: MoveDecision): string {
  return decision.boost ? `${decision.direction}:BOOST` : decision.direction;
}

/**
 * Bot facade: owns the mirrored match state and one session per player.
 *
 * Every method runs synchronously, so a call never interleaves with
 * another sync, query or reset. Move queries read a snapshot of the state.
 */
export class TrailBot {
  private readonly ai: TrailAI;
  private readonly gameEngine: GameEngine;
  private sessions: Record<PlayerNumber, MatchSession>;

  constructor(options: TrailAIOptions = {}) {
    this.ai = new TrailAI(options);
    this.gameEngine = new GameEngine();
    this.sessions = { 1: createMatchSession(), 2: createMatchSession() };
  }

  public syncState(sync: StateSync): string[] {
    return this.gameEngine.applySync(sync);
  }

  public decideMove(player: PlayerNumber): MoveDecision {
    const snapshot = this.gameEngine.snapshot();

    const { decision, session } = logger.performance(
      `decision for player ${player} (turn ${snapshot.turn})`,
      () => this.ai.decide(snapshot, player, this.sessions[player])
    );

    if (session.phase !== this.sessions[player].phase) {
      logger.info(
        LogCategory.PHASE,
        `Player ${player} phase ${this.sessions[player].phase} -> ${session.phase}`
      );
    }
    this.sessions = { ...this.sessions, [player]: session };

    return decision;
  }

  /**
   * Match over: apply the final sync if any, then start fresh sessions
   */
  public endMatch(finalSync?: StateSync): void {
    if (finalSync) {
      this.syncState(finalSync);
    }
    this.sessions = { 1: createMatchSession(), 2: createMatchSession() };
    logger.info(LogCategory.GENERAL, "🏁 Match ended, sessions reset");
  }

  public getSession(player: PlayerNumber): MatchSession {
    return this.sessions[player];
  }

  public getGameEngine(): GameEngine {
    return this.gameEngine;
  }
}
