import { Position, Direction } from "../types";
import { DIRECTION_VECTORS, OPPOSITE_DIRECTIONS } from "./constants";

/**
 * Wrap a coordinate onto a board axis of the given size (handles negatives)
 */
export function wrap(value: number, size: number): number {
  return ((value % size) + size) % size;
}

/**
 * Wrap a position onto the toroidal board
 */
export function wrapPosition(
  position: Position,
  width: number,
  height: number
): Position {
  return { x: wrap(position.x, width), y: wrap(position.y, height) };
}

/**
 * Kiểm tra xem hai vị trí có bằng nhau không
 */
export function positionsEqual(pos1: Position, pos2: Position): boolean {
  return pos1.x === pos2.x && pos1.y === pos2.y;
}

/**
 * Plain (non-wrapping) column distance between two cells
 */
export function horizontalSeparation(pos1: Position, pos2: Position): number {
  return Math.abs(pos1.x - pos2.x);
}

/**
 * Get the wrapped cell one step away in a direction
 */
export function getPositionInDirection(
  position: Position,
  direction: Direction,
  width: number,
  height: number
): Position {
  const vector = DIRECTION_VECTORS[direction];
  return wrapPosition(
    { x: position.x + vector.x, y: position.y + vector.y },
    width,
    height
  );
}

/**
 * Lấy tất cả các vị trí xung quanh (4 hướng), đã wrap
 */
export function getAdjacentPositions(
  position: Position,
  width: number,
  height: number
): Position[] {
  return [Direction.UP, Direction.DOWN, Direction.LEFT, Direction.RIGHT].map(
    (dir) => getPositionInDirection(position, dir, width, height)
  );
}

export function getOppositeDirection(direction: Direction): Direction {
  return OPPOSITE_DIRECTIONS[direction];
}

/**
 * Direction of a single (possibly wrapped) step between two adjacent cells.
 * Returns null when the cells are not neighbours.
 */
export function getDirectionFromStep(
  from: Position,
  to: Position,
  width: number,
  height: number
): Direction | null {
  const dx = wrap(to.x - from.x, width);
  const dy = wrap(to.y - from.y, height);

  if (dy === 0 && dx === 1) return Direction.RIGHT;
  if (dy === 0 && dx === width - 1) return Direction.LEFT;
  if (dx === 0 && dy === 1) return Direction.DOWN;
  if (dx === 0 && dy === height - 1) return Direction.UP;

  return null;
}
