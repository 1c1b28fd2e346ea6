import { Position } from "../types";
import { createCellKey } from "./constants";
import { getAdjacentPositions, wrapPosition } from "./position";

/**
 * Count the cells reachable from `start` without entering an occupied cell.
 *
 * Breadth-first over the wrapped 4-neighbourhood. Returns 0 when the start
 * cell is itself occupied. Cost is O(reachable area).
 *
 * @param occupied Set of cell keys (see createCellKey) treated as blocked
 */
export function floodFillArea(
  start: Position,
  occupied: ReadonlySet<string>,
  width: number,
  height: number
): number {
  const origin = wrapPosition(start, width, height);
  const originKey = createCellKey(origin);

  if (occupied.has(originKey)) {
    return 0;
  }

  const visited = new Set<string>([originKey]);
  const queue: Position[] = [origin];
  let head = 0;

  while (head < queue.length) {
    const cell = queue[head++];
    if (!cell) break;

    for (const next of getAdjacentPositions(cell, width, height)) {
      const key = createCellKey(next);
      if (visited.has(key) || occupied.has(key)) continue;

      visited.add(key);
      queue.push(next);
    }
  }

  return visited.size;
}

/**
 * Union of several key sets, used to add the exclusion region to the trails
 */
export function unionKeys(...sets: ReadonlySet<string>[]): Set<string> {
  const result = new Set<string>();
  for (const set of sets) {
    for (const key of set) {
      result.add(key);
    }
  }
  return result;
}
