import { LogLevel, logger, LogCategory, parseLogLevel } from "./utils/smartLogger";
import { BOOST_SPACE_THRESHOLD, PANIC_THRESHOLD } from "./utils/constants";

export interface BoostConfig {
  enabled: boolean;
  threshold: number;
}

export interface AgentConfig {
  port: number;
  participant: string;
  agentName: string;
  logLevel: LogLevel;
  competitionMode: boolean;
  boost: BoostConfig;
  panicThreshold: number;
}

const DEFAULT_PORT = 5008;

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    logger.warn(
      LogCategory.GENERAL,
      `${name}="${raw}" is not a non-negative integer, using ${fallback}`
    );
    return fallback;
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;

  logger.warn(
    LogCategory.GENERAL,
    `${name}="${raw}" is not a boolean, using ${fallback}`
  );
  return fallback;
}

/**
 * Build the agent configuration from environment variables (after dotenv)
 */
export function loadConfig(env: Env = process.env): AgentConfig {
  const logLevel = parseLogLevel(env.LOG_LEVEL);
  if (env.LOG_LEVEL && logLevel === undefined) {
    logger.warn(
      LogCategory.GENERAL,
      `LOG_LEVEL="${env.LOG_LEVEL}" is not a known level, using info`
    );
  }

  return {
    port: readInt(env, "PORT", DEFAULT_PORT),
    participant: env.PARTICIPANT || "participant",
    agentName: env.AGENT_NAME || "trail-bot",
    logLevel: logLevel ?? LogLevel.INFO,
    competitionMode: readBool(env, "COMPETITION_MODE", false),
    boost: {
      enabled: readBool(env, "BOOST_ENABLED", true),
      threshold: readInt(env, "BOOST_THRESHOLD", BOOST_SPACE_THRESHOLD),
    },
    panicThreshold: readInt(env, "PANIC_THRESHOLD", PANIC_THRESHOLD),
  };
}
