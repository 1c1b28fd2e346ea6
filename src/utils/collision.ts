import { CellState, Position } from "../types";
import type { Grid } from "../game/grid";
import { createCellKey } from "./constants";
import { wrapPosition } from "./position";

/**
 * Return true if moving the head onto `target` would hit a trail.
 *
 * The grid is the source of truth; when it cannot classify the cell the
 * explicit trail set decides. Independently of the grid answer, a target in
 * the trail set is always fatal: both sources must agree a cell is safe.
 * The head itself is never consulted.
 */
export function isSuicidal(
  grid: Grid,
  _head: Position,
  target: Position,
  explicitOccupied: ReadonlySet<string>
): boolean {
  const key = createCellKey(wrapPosition(target, grid.width, grid.height));

  if (grid.resolve(target, explicitOccupied) !== CellState.EMPTY) {
    return true;
  }

  // Double-check against known trails
  return explicitOccupied.has(key);
}

/**
 * Build the explicit occupied set from any number of trails
 */
export function collectTrailKeys(...trails: Position[][]): Set<string> {
  const keys = new Set<string>();
  for (const trail of trails) {
    for (const cell of trail) {
      keys.add(createCellKey(cell));
    }
  }
  return keys;
}
