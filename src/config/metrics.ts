import { LOG_LEVELS, StructuredLogger, type LogLevel, type LoggerOptions } from "../logger.js";
import { DEFAULT_TIE_MODE, TIE_MODES, type TieMode } from "../types.js";
import { readEnum, readOptionalString, type EnvSource } from "./env.js";

/** Environment variables read by {@link loadMetricsConfig}. */
export const METRICS_ENV = {
  DEFAULT_MODE: "STRUCTURAL_HOLES_DEFAULT_MODE",
  LOG_LEVEL: "STRUCTURAL_HOLES_LOG_LEVEL",
  LOG_FILE: "STRUCTURAL_HOLES_LOG_FILE",
} as const;

export interface MetricsConfig {
  /** Mode applied by {@link analyzeNetwork} when the caller picks none. */
  readonly defaultMode: TieMode;
  readonly logLevel: LogLevel;
  /** File mirroring the log stream, `null` when disabled. */
  readonly logFile: string | null;
}

/** Resolves the configuration from `env`, falling back to defaults. */
export function loadMetricsConfig(env: EnvSource = process.env): MetricsConfig {
  return {
    defaultMode: readEnum(METRICS_ENV.DEFAULT_MODE, TIE_MODES, DEFAULT_TIE_MODE, env),
    logLevel: readEnum(METRICS_ENV.LOG_LEVEL, LOG_LEVELS, "warn", env),
    logFile: readOptionalString(METRICS_ENV.LOG_FILE, env) ?? null,
  };
}

/** Builds the logger described by `config`. */
export function createLogger(
  config: MetricsConfig = loadMetricsConfig(),
  overrides: Pick<LoggerOptions, "stream" | "onEntry"> = {},
): StructuredLogger {
  return new StructuredLogger({ level: config.logLevel, logFile: config.logFile, ...overrides });
}
