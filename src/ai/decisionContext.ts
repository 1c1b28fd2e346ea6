import { Grid } from "../game/grid";
import { GameSnapshot, MatchSession, PlayerNumber } from "../types";
import type { DecisionContext } from "../strategies/baseStrategy";
import { generateCandidates } from "../utils/candidates";
import { collectTrailKeys } from "../utils/collision";
import { createCellKey } from "../utils/constants";
import { wrapPosition } from "../utils/position";
import { planCorridor } from "./phaseStateMachine";

/**
 * Derive everything one decision needs from a snapshot: wrapped head,
 * occupied set, corridor plan (the session's, once fixed) and scored
 * candidates.
 * Null when the player has no trail to move from.
 */
export function createDecisionContext(
  snapshot: GameSnapshot,
  player: PlayerNumber,
  session: MatchSession
): DecisionContext | null {
  const { width, height } = snapshot;
  const self = snapshot.agents[player];
  const opponent = snapshot.agents[player === 1 ? 2 : 1];

  // Trails are stored as received; wrap them onto this snapshot's board
  const selfTrail = self.trail.map((cell) => wrapPosition(cell, width, height));
  const opponentTrail = opponent.trail.map((cell) =>
    wrapPosition(cell, width, height)
  );

  const head = selfTrail[selfTrail.length - 1];
  const origin = selfTrail[0];
  if (!head || !origin) return null;

  const opponentHead = opponent.alive
    ? opponentTrail[opponentTrail.length - 1] ?? null
    : null;

  const occupied = collectTrailKeys(selfTrail, opponentTrail);
  const corridor = session.corridor ?? planCorridor(origin, height);

  // The corridor row is kept out of the space estimate
  const exclusion = new Set<string>();
  for (let x = 0; x < width; x++) {
    exclusion.add(createCellKey({ x, y: corridor.row }));
  }

  return {
    grid: new Grid(snapshot.grid, width, height),
    width,
    height,
    self,
    head,
    opponentHead,
    occupied,
    corridor,
    candidates: generateCandidates(
      head,
      self.direction,
      occupied,
      exclusion,
      width,
      height
    ),
  };
}
