import express, {
  ErrorRequestHandler,
  Express,
  NextFunction,
  Request,
  Response,
} from "express";
import { TrailBot, formatMove } from "../trailBot";
import { MoveQuerySchema, parseStateSync, StateSyncSchema } from "./schemas";
import { errorHandler } from "./errorHandler";
import { logger, LogCategory } from "../utils/smartLogger";

export interface AgentIdentity {
  participant: string;
  agentName: string;
}

/**
 * HTTP surface the game master talks to.
 *
 * Handlers are synchronous: a sync, a move query or a reset always runs to
 * completion before the next request touches the bot.
 */
export function createAgentServer(
  bot: TrailBot,
  identity: AgentIdentity
): Express {
  const app = express();
  const jsonBody = express.json({ limit: "1mb" });

  // The match reset must not depend on the final sync being readable
  const skipUnreadableBody: ErrorRequestHandler = (error, req, _res, next) => {
    logger.warn(
      LogCategory.HTTP,
      `Ignoring unreadable final sync on ${req.method} ${req.url}:`,
      error instanceof Error ? error.message : error
    );
    req.body = undefined;
    next();
  };

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(LogCategory.HTTP, `${req.method} ${req.url}`);
    next();
  });

  app.get("/", (_req, res) => {
    res.json({
      participant: identity.participant,
      agent_name: identity.agentName,
    });
  });

  app.post("/send-state", jsonBody, (req, res) => {
    const sync = parseStateSync(req.body);
    bot.syncState(sync);
    res.json({ status: "state received" });
  });

  app.get("/send-move", (req, res) => {
    const { player_number: player = 1 } = MoveQuerySchema.parse(req.query);
    const decision = bot.decideMove(player);
    res.json({ move: formatMove(decision) });
  });

  app.post("/end", jsonBody, skipUnreadableBody, (req: Request, res: Response) => {
    const body: unknown = req.body;
    const hasBody =
      typeof body === "object" &&
      body !== null &&
      Object.keys(body).length > 0;

    const parsed = hasBody ? StateSyncSchema.safeParse(body) : undefined;
    if (parsed && !parsed.success) {
      // The reset still happens; only the final sync is dropped
      logger.warn(
        LogCategory.HTTP,
        `Ignoring malformed final sync: ${parsed.error.issues[0]?.message ?? "invalid"}`
      );
    }

    bot.endMatch(parsed?.success ? parsed.data : undefined);
    res.json({ status: "acknowledged" });
  });

  app.use(errorHandler);

  return app;
}
