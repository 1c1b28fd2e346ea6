import dotenv from "dotenv";
import { Server } from "http";
import { TrailBot } from "./trailBot";
import { createAgentServer } from "./connection/agentServer";
import { loadConfig } from "./config";
import { logger, LogCategory } from "./utils/smartLogger";

dotenv.config();

export { TrailBot };
export { formatMove } from "./trailBot";
export * from "./types";
export * from "./ai";
export * from "./game";
export * from "./strategies";
export * from "./connection";
export * from "./config";
export * from "./utils";

function main(): Server {
  const config = loadConfig();
  logger.configure({
    minLevel: config.logLevel,
    isCompetitionMode: config.competitionMode,
  });

  const bot = new TrailBot({
    boost: config.boost,
    panicThreshold: config.panicThreshold,
  });
  const app = createAgentServer(bot, {
    participant: config.participant,
    agentName: config.agentName,
  });

  const server = app.listen(config.port, "0.0.0.0", () => {
    logger.info(
      LogCategory.GENERAL,
      `🏍️  Starting ${config.agentName} (${config.participant}) on port ${config.port}...`
    );
  });

  const shutdown = () => {
    logger.info(LogCategory.GENERAL, "🛑 Shutting down agent...");
    server.close(() => process.exit(0));
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  return server;
}

if (require.main === module) {
  try {
    main();
  } catch (error) {
    logger.error(LogCategory.GENERAL, "Failed to start agent:", error);
    process.exit(1);
  }
}
