import {
  AgentState,
  Direction,
  GameSnapshot,
  GridSnapshot,
  PlayerNumber,
  Position,
  StateSync,
} from "../types";
import {
  AGENT_CELL,
  DEFAULT_AGENT1_TRAIL,
  DEFAULT_AGENT2_TRAIL,
  DEFAULT_BOARD_HEIGHT,
  DEFAULT_BOARD_WIDTH,
  DEFAULT_BOOSTS,
  EMPTY_CELL,
} from "../utils/constants";
import { getDirectionFromStep } from "../utils/position";
import { logger, LogCategory } from "../utils/smartLogger";

const PLAYERS: readonly PlayerNumber[] = [1, 2];

/**
 * The GameEngine holds the match state mirrored from the game master.
 *
 * It starts from a fixed layout and is overwritten by every state sync.
 * Syncs are partial: fields missing from a payload keep their value.
 */
export class GameEngine {
  private gameState: GameSnapshot;

  constructor() {
    this.gameState = this.createInitialGameState();
  }

  /**
   * Applies a (validated) state sync from the game master.
   * @returns The names of the fields that were applied.
   */
  public applySync(sync: StateSync): string[] {
    const applied: string[] = [];

    const boardApplied = sync.board !== undefined;
    if (sync.board !== undefined) {
      this.applyBoard(sync.board);
      applied.push("board");
    }

    for (const player of PLAYERS) {
      const agent = this.gameState.agents[player];
      const trail = player === 1 ? sync.agent1_trail : sync.agent2_trail;
      const length = player === 1 ? sync.agent1_length : sync.agent2_length;
      const alive = player === 1 ? sync.agent1_alive : sync.agent2_alive;
      const boosts = player === 1 ? sync.agent1_boosts : sync.agent2_boosts;

      if (trail !== undefined) {
        agent.trail = trail.map(([x, y]) => ({ x, y }));
        applied.push(`agent${player}_trail`);
      }
      if (length !== undefined) {
        agent.length = length;
        applied.push(`agent${player}_length`);
      }
      if (alive !== undefined) {
        agent.alive = alive;
        applied.push(`agent${player}_alive`);
      }
      if (boosts !== undefined) {
        agent.boostsRemaining = boosts;
        applied.push(`agent${player}_boosts`);
      }

      // A new board size changes which cells are adjacent across the seam
      if (trail !== undefined || boardApplied) {
        this.deriveHeading(agent);
      }
    }

    if (sync.turn_count !== undefined) {
      this.gameState.turn = sync.turn_count;
      applied.push("turn_count");
    }

    logger.debug(
      LogCategory.GAME_STATE,
      `Sync applied (turn ${this.gameState.turn}): ${applied.join(", ")}`
    );
    return applied;
  }

  /**
   * Gets the current game state (direct reference, do not mutate).
   */
  public getGameState(): Readonly<GameSnapshot> {
    return this.gameState;
  }

  /**
   * Deep copy of the state for one decision
   */
  public snapshot(): GameSnapshot {
    return structuredClone(this.gameState);
  }

  public getAgent(player: PlayerNumber): Readonly<AgentState> {
    return this.gameState.agents[player];
  }

  private applyBoard(board: GridSnapshot): void {
    const height = board.length;
    const width = board.reduce(
      (max, row) => (Array.isArray(row) ? Math.max(max, row.length) : max),
      0
    );

    if (height === 0 || width === 0) {
      logger.warn(
        LogCategory.GAME_STATE,
        "Empty board in sync, keeping previous dimensions"
      );
    } else {
      this.gameState.width = width;
      this.gameState.height = height;
    }

    this.gameState.grid = board;
  }

  /**
   * The protocol carries no heading; derive it from the last step.
   * Trail cells are kept as received and only wrapped here and at decision time.
   */
  private deriveHeading(agent: AgentState): void {
    const { width, height } = this.gameState;
    const head = agent.trail[agent.trail.length - 1];
    const previous = agent.trail[agent.trail.length - 2];
    if (!head || !previous) return;

    const direction = getDirectionFromStep(previous, head, width, height);
    if (direction) {
      agent.direction = direction;
    } else {
      logger.warn(
        LogCategory.GAME_STATE,
        `Trail ends with a non-adjacent step (${previous.x},${previous.y}) -> (${head.x},${head.y}), keeping heading ${agent.direction}`
      );
    }
  }

  private createInitialGameState(): GameSnapshot {
    const width = DEFAULT_BOARD_WIDTH;
    const height = DEFAULT_BOARD_HEIGHT;

    const agent1 = this.createAgent(DEFAULT_AGENT1_TRAIL, Direction.RIGHT);
    const agent2 = this.createAgent(DEFAULT_AGENT2_TRAIL, Direction.LEFT);

    const grid: number[][] = Array.from({ length: height }, () =>
      Array<number>(width).fill(EMPTY_CELL)
    );
    for (const cell of [...agent1.trail, ...agent2.trail]) {
      const row = grid[cell.y];
      if (row) row[cell.x] = AGENT_CELL;
    }

    return {
      width,
      height,
      grid,
      agents: { 1: agent1, 2: agent2 },
      turn: 0,
    };
  }

  private createAgent(
    trail: readonly Position[],
    direction: Direction
  ): AgentState {
    return {
      trail: trail.map((cell) => ({ ...cell })),
      direction,
      alive: true,
      length: trail.length,
      boostsRemaining: DEFAULT_BOOSTS,
    };
  }
}
