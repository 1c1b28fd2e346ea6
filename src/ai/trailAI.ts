import {
  Direction,
  GameSnapshot,
  MatchPhase,
  MatchSession,
  MoveDecision,
  PlayerNumber,
} from "../types";
import {
  CorridorEscapeStrategy,
  DecisionContext,
  OpenPlayStrategy,
  PhaseStrategy,
  PostEscapeFillStrategy,
  StrategyDecision,
} from "../strategies";
import { BOOST_SPACE_THRESHOLD } from "../utils/constants";
import { logger, LogCategory } from "../utils/smartLogger";
import { createDecisionContext } from "./decisionContext";
import { PhaseStateMachine } from "./phaseStateMachine";

export interface TrailAIOptions {
  boost?: { enabled: boolean; threshold: number };
  panicThreshold?: number;
}

export interface DecisionResult {
  decision: MoveDecision;
  session: MatchSession;
}

/**
 * The main AI engine: advances the match phase, lets the active phase
 * strategy pick a move and decides on boosting.
 *
 * Stateless between calls; everything that survives a turn lives in the
 * session passed in and returned.
 */
export class TrailAI {
  private readonly strategies: Record<MatchPhase, PhaseStrategy>;
  private readonly fallbackStrategy: PhaseStrategy;
  private readonly phaseMachine: PhaseStateMachine;
  private readonly boost: { enabled: boolean; threshold: number };

  constructor(options: TrailAIOptions = {}) {
    this.fallbackStrategy = new OpenPlayStrategy();
    this.strategies = {
      [MatchPhase.OPEN_PLAY]: this.fallbackStrategy,
      [MatchPhase.PANIC]: new CorridorEscapeStrategy(),
      [MatchPhase.POST_ESCAPE_FILL]: new PostEscapeFillStrategy(),
    };
    this.phaseMachine = new PhaseStateMachine(options.panicThreshold);
    this.boost = options.boost ?? {
      enabled: true,
      threshold: BOOST_SPACE_THRESHOLD,
    };
  }

  /**
   * Makes a decision for one player from a state snapshot.
   * Never throws: any failure degrades to continuing the current heading.
   */
  public decide(
    snapshot: GameSnapshot,
    player: PlayerNumber,
    session: MatchSession
  ): DecisionResult {
    const self = snapshot.agents[player];

    try {
      const context = createDecisionContext(snapshot, player, session);
      if (!context) {
        return this.continueHeading(
          self.direction,
          session,
          "no trail yet, continuing heading"
        );
      }

      const { session: advanced, transitions } = this.phaseMachine.advance(
        session,
        context
      );
      for (const transition of transitions) {
        logger.debug(LogCategory.PHASE, `Player ${player}: ${transition}`);
      }

      const chosen = this.evaluate(context, advanced);
      if (!chosen) {
        return this.continueHeading(
          self.direction,
          advanced,
          "no candidates, continuing heading"
        );
      }

      const decision = this.finalize(chosen, context);
      logger.debug(
        LogCategory.AI,
        `Player ${player} [${decision.phase}] ${decision.direction}${
          decision.boost ? " +boost" : ""
        }: ${decision.reason}`
      );
      return { decision, session: chosen.session };
    } catch (error) {
      logger.error(
        LogCategory.AI,
        `Decision failed for player ${player}, continuing heading:`,
        error
      );
      return this.continueHeading(
        self.direction,
        session,
        "decision failed, continuing heading"
      );
    }
  }

  private evaluate(
    context: DecisionContext,
    session: MatchSession
  ): StrategyDecision | null {
    const strategy = this.strategies[session.phase];

    try {
      return strategy.evaluate(context, session);
    } catch (error) {
      logger.error(
        LogCategory.AI,
        `Error in strategy ${strategy.name}, falling back to ${this.fallbackStrategy.name}:`,
        error
      );
      return this.fallbackStrategy.evaluate(context, session);
    }
  }

  private finalize(
    chosen: StrategyDecision,
    context: DecisionContext
  ): MoveDecision {
    const score = context.candidates.find(
      (c) => c.direction === chosen.direction
    )?.score;

    return {
      direction: chosen.direction,
      boost: this.shouldBoost(context.self.boostsRemaining, score ?? 0),
      phase: chosen.session.phase,
      reason: chosen.reason,
      score,
    };
  }

  /**
   * Boost only when boosts remain and the move opens enough space
   */
  public shouldBoost(boostsRemaining: number, score: number): boolean {
    return (
      this.boost.enabled &&
      boostsRemaining > 0 &&
      score > this.boost.threshold
    );
  }

  private continueHeading(
    direction: Direction,
    session: MatchSession,
    reason: string
  ): DecisionResult {
    logger.warn(LogCategory.AI, reason);
    return {
      decision: { direction, boost: false, phase: session.phase, reason },
      session,
    };
  }
}
