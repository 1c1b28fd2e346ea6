/**
 * Core types for the light-cycle trail game, following the game master protocol
 */

export interface Position {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export enum Direction {
  UP = "UP",
  DOWN = "DOWN",
  LEFT = "LEFT",
  RIGHT = "RIGHT",
}

export enum CellState {
  EMPTY = "EMPTY",
  OCCUPIED = "OCCUPIED",
  UNKNOWN = "UNKNOWN", // snapshot could not classify the cell
}

export type PlayerNumber = 1 | 2;

// Raw board as pushed by the game master: grid[y][x], 0 = empty
export type GridSnapshot = unknown[][];

export interface AgentState {
  trail: Position[]; // trail[trail.length - 1] = head, trail[0] = origin
  direction: Direction;
  alive: boolean;
  length: number;
  boostsRemaining: number;
}

export interface GameSnapshot extends Size {
  grid: GridSnapshot;
  agents: Record<PlayerNumber, AgentState>;
  turn: number;
}

export enum MatchPhase {
  OPEN_PLAY = "OPEN_PLAY",
  PANIC = "PANIC",
  POST_ESCAPE_FILL = "POST_ESCAPE_FILL",
}

export type EscapeBias = -1 | 0 | 1;

export interface CorridorPlan {
  row: number; // safe row, half a board away from the origin row
  exitColumn: number;
}

export interface MatchSession {
  readonly phase: MatchPhase;
  readonly escapeBias: EscapeBias;
  readonly corridor: CorridorPlan | null;
}

export interface MoveCandidate {
  score: number;
  direction: Direction;
  target: Position;
}

export interface MoveDecision {
  direction: Direction;
  boost: boolean;
  phase: MatchPhase;
  reason: string;
  score?: number;
}

/**
 * State sync payload, already validated at the HTTP boundary.
 * Every field is optional; absent fields leave the engine untouched.
 */
export interface StateSync {
  board?: GridSnapshot;
  agent1_trail?: Array<[number, number]>;
  agent2_trail?: Array<[number, number]>;
  agent1_length?: number;
  agent2_length?: number;
  agent1_alive?: boolean;
  agent2_alive?: boolean;
  agent1_boosts?: number;
  agent2_boosts?: number;
  turn_count?: number;
}
