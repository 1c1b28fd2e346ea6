import {
  AgentState,
  Direction,
  GameSnapshot,
  Position,
} from "../types";

export interface SnapshotOptions {
  width?: number;
  height?: number;
  self: Position[];
  opponent: Position[];
  selfDirection?: Direction;
  opponentDirection?: Direction;
  opponentAlive?: boolean;
  boosts?: number;
}

function agent(
  trail: Position[],
  direction: Direction,
  alive: boolean,
  boosts: number
): AgentState {
  return {
    trail: trail.map((cell) => ({ ...cell })),
    direction,
    alive,
    length: trail.length,
    boostsRemaining: boosts,
  };
}

/**
 * Board with both trails marked occupied; player 1 is "self"
 */
export function createSnapshot(options: SnapshotOptions): GameSnapshot {
  const width = options.width ?? 10;
  const height = options.height ?? 10;

  const grid: number[][] = Array.from({ length: height }, () =>
    Array<number>(width).fill(0)
  );
  for (const cell of [...options.self, ...options.opponent]) {
    const row = grid[cell.y];
    if (row) row[cell.x] = 1;
  }

  return {
    width,
    height,
    grid,
    agents: {
      1: agent(
        options.self,
        options.selfDirection ?? Direction.RIGHT,
        true,
        options.boosts ?? 0
      ),
      2: agent(
        options.opponent,
        options.opponentDirection ?? Direction.LEFT,
        options.opponentAlive ?? true,
        options.boosts ?? 0
      ),
    },
    turn: 0,
  };
}

/**
 * 2D board of zeros with the given cells set to 1, as the game master sends it
 */
export function createBoard(
  width: number,
  height: number,
  occupied: Array<[number, number]> = []
): number[][] {
  const board: number[][] = Array.from({ length: height }, () =>
    Array<number>(width).fill(0)
  );
  for (const [x, y] of occupied) {
    const row = board[y];
    if (row) row[x] = 1;
  }
  return board;
}

export function keys(...cells: Array<[number, number]>): Set<string> {
  return new Set(cells.map(([x, y]) => `${x},${y}`));
}
