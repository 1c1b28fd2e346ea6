import { CellState, GridSnapshot, Position } from "../types";
import { createCellKey, EMPTY_CELL } from "../utils/constants";
import { wrapPosition } from "../utils/position";

/**
 * Read-only view over the board pushed by the game master.
 *
 * The board has no edges: every lookup wraps onto the torus. A cell the
 * snapshot cannot classify (missing row, non-numeric value) reads as UNKNOWN.
 */
export class Grid {
  constructor(
    private readonly cells: GridSnapshot,
    public readonly width: number,
    public readonly height: number
  ) {}

  public cellState(cell: Position): CellState {
    const { x, y } = wrapPosition(cell, this.width, this.height);
    const row = this.cells[y];
    if (!Array.isArray(row)) {
      return CellState.UNKNOWN;
    }

    const value: unknown = row[x];
    if (typeof value !== "number" || !Number.isFinite(value)) {
      return CellState.UNKNOWN;
    }

    return value === EMPTY_CELL ? CellState.EMPTY : CellState.OCCUPIED;
  }

  /**
   * Fail-closed classification: an UNKNOWN cell counts as occupied only when
   * the explicit trail set confirms it, otherwise it is treated as empty.
   */
  public resolve(cell: Position, occupied: ReadonlySet<string>): CellState {
    const state = this.cellState(cell);
    if (state !== CellState.UNKNOWN) {
      return state;
    }

    const wrapped = wrapPosition(cell, this.width, this.height);
    return occupied.has(createCellKey(wrapped))
      ? CellState.OCCUPIED
      : CellState.EMPTY;
  }
}
