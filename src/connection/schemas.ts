import { z } from "zod";

export const PlayerNumberSchema = z.union([z.literal(1), z.literal(2)]);

const CellSchema = z.tuple([z.number().int(), z.number().int()]);
const TrailSchema = z.array(CellSchema);
const CountSchema = z.number().int().nonnegative();

/**
 * State sync pushed by the game master. Every field is optional; unknown
 * keys are stripped. Board cell values are deliberately not validated:
 * the grid model reads anything it cannot classify as UNKNOWN.
 */
export const StateSyncSchema = z.object({
  board: z.array(z.array(z.unknown())).optional(),
  agent1_trail: TrailSchema.optional(),
  agent2_trail: TrailSchema.optional(),
  agent1_length: CountSchema.optional(),
  agent2_length: CountSchema.optional(),
  agent1_alive: z.boolean().optional(),
  agent2_alive: z.boolean().optional(),
  agent1_boosts: CountSchema.optional(),
  agent2_boosts: CountSchema.optional(),
  turn_count: CountSchema.optional(),
});

export const MoveQuerySchema = z.object({
  player_number: z.coerce.number().pipe(PlayerNumberSchema).optional(),
});

export type StateSyncPayload = z.infer<typeof StateSyncSchema>;

/**
 * Client-side problem with a request, answered with a 4xx
 */
export class SyncValidationError extends Error {
  public readonly statusCode = 400;
  public readonly code = "INVALID_REQUEST";

  constructor(message: string) {
    super(message);
    this.name = "SyncValidationError";
  }
}

/**
 * Validate a sync body; empty or non-object bodies are rejected outright
 */
export function parseStateSync(body: unknown): StateSyncPayload {
  if (
    body === null ||
    body === undefined ||
    typeof body !== "object" ||
    Array.isArray(body) ||
    Object.keys(body).length === 0
  ) {
    throw new SyncValidationError("no json body");
  }
  return StateSyncSchema.parse(body);
}
