import { Direction, MoveCandidate, Position } from "../types";
import { DIRECTION_ORDER } from "./constants";
import { floodFillArea, unionKeys } from "./floodFill";
import {
  getOppositeDirection,
  getPositionInDirection,
  positionsEqual,
} from "./position";

/**
 * Enumerate the moves available from `head`: every direction except the
 * reverse of the current heading, each paired with its wrapped target and
 * the reachable area behind it.
 *
 * The exclusion region is blocked for scoring only. Targets equal to the
 * head (a 1-wide axis) are dropped. The result may be empty.
 */
export function generateCandidates(
  head: Position,
  heading: Direction,
  occupied: ReadonlySet<string>,
  exclusion: ReadonlySet<string>,
  width: number,
  height: number
): MoveCandidate[] {
  const reverse = getOppositeDirection(heading);
  const scoringSet = unionKeys(occupied, exclusion);
  const candidates: MoveCandidate[] = [];

  for (const direction of DIRECTION_ORDER) {
    if (direction === reverse) continue;

    const target = getPositionInDirection(head, direction, width, height);
    if (positionsEqual(target, head)) continue;

    candidates.push({
      score: floodFillArea(target, scoringSet, width, height),
      direction,
      target,
    });
  }

  return candidates;
}

/**
 * Candidates ordered by descending score; ties keep enumeration order
 */
export function sortByScore(candidates: MoveCandidate[]): MoveCandidate[] {
  return [...candidates].sort((a, b) => b.score - a.score);
}
