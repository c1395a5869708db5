import { PlatformIdentity, Vocabulary } from "../types";
import { ArchpickError } from "../util/errors";
import { parsePlatform } from "../util/platform";

export const PLATFORM_ENV = "ARCHPICK_PLATFORM";
export const VOCABULARY_ENV = "ARCHPICK_VOCABULARY";
export const LOG_LEVEL_ENV = "ARCHPICK_LOG_LEVEL";

export const DEFAULT_LOG_LEVEL = "info";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

const LOG_LEVELS = new Set<string>(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export function readPlatformOverride(
  env: NodeJS.ProcessEnv = process.env,
  vocabulary?: Vocabulary
): PlatformIdentity | undefined {
  const raw = readOptionalEnv(PLATFORM_ENV, env);
  if (raw === undefined) {
    return undefined;
  }

  try {
    return parsePlatform(raw, vocabulary);
  } catch (error) {
    throw new ArchpickError(`${PLATFORM_ENV}: ${(error as Error).message}`);
  }
}

export function readVocabularyPathOverride(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return readOptionalEnv(VOCABULARY_ENV, env);
}

export function readLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = readOptionalEnv(LOG_LEVEL_ENV, env);
  if (raw === undefined) {
    return DEFAULT_LOG_LEVEL;
  }

  const level = raw.toLowerCase();
  if (!isLogLevel(level)) {
    throw new ArchpickError(`${LOG_LEVEL_ENV} must be one of ${[...LOG_LEVELS].join("|")}, got '${raw}'`);
  }
  return level;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

function readOptionalEnv(name: string, env: NodeJS.ProcessEnv): string | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  return raw.trim();
}
