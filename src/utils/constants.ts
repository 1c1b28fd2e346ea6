/**
 * Central constants for the trail bot
 * Single source of truth for board layout and decision thresholds
 */

import { Direction, Position } from "../types";

// === BOARD CONSTANTS ===
export const DEFAULT_BOARD_WIDTH = 20;
export const DEFAULT_BOARD_HEIGHT = 18;
export const EMPTY_CELL = 0;
export const AGENT_CELL = 1;

// === AGENT CONSTANTS ===
export const DEFAULT_AGENT1_TRAIL: readonly Position[] = [
  { x: 1, y: 2 },
  { x: 2, y: 2 },
];
export const DEFAULT_AGENT2_TRAIL: readonly Position[] = [
  { x: 17, y: 15 },
  { x: 16, y: 15 },
];
export const DEFAULT_BOOSTS = 3;

// === DECISION CONSTANTS ===
export const PANIC_THRESHOLD = 1; // horizontal separation that triggers panic
export const BOOST_SPACE_THRESHOLD = 10; // boost only when score exceeds this
export const SLOW_DECISION_MS = 100;

// === DIRECTIONS ===
// Order matters: candidates and fallbacks are tried in this order
export const DIRECTION_ORDER: readonly Direction[] = [
  Direction.UP,
  Direction.DOWN,
  Direction.RIGHT,
  Direction.LEFT,
];

export const DIRECTION_VECTORS: Readonly<Record<Direction, Position>> = {
  [Direction.UP]: { x: 0, y: -1 },
  [Direction.DOWN]: { x: 0, y: 1 },
  [Direction.LEFT]: { x: -1, y: 0 },
  [Direction.RIGHT]: { x: 1, y: 0 },
};

export const OPPOSITE_DIRECTIONS: Readonly<Record<Direction, Direction>> = {
  [Direction.UP]: Direction.DOWN,
  [Direction.DOWN]: Direction.UP,
  [Direction.LEFT]: Direction.RIGHT,
  [Direction.RIGHT]: Direction.LEFT,
};

// === KEYS ===
/**
 * Create cell key for maps/sets
 */
export function createCellKey(cell: Position): string {
  return `${cell.x},${cell.y}`;
}

