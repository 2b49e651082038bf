import {
  getDotPath,
  maxValue,
  minValue,
  object,
  optional,
  picklist,
  pipe,
  regex,
  safeParse,
  string,
  transform,
  type BaseIssue,
} from "valibot";
import { MAX_DIFFICULTY } from "./core/consensus";
import { ConfigError } from "./errors";
import { makeLogger, type ILogger, type LogLevel } from "./logging";

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const digits = (fallback: string) =>
  pipe(
    optional(string(), fallback),
    regex(/^\d+$/, "expected a non-negative integer"),
    transform(Number),
  );

const envSchema = object({
  LOG_LEVEL: optional(picklist(LEVELS), "info"),
  LOG_PRETTY: pipe(
    optional(picklist(["true", "false"]), "false"),
    transform((v) => v === "true"),
  ),
  CHAIN_DIFFICULTY: pipe(digits("16"), maxValue(MAX_DIFFICULTY)),
  MINE_BATCH: pipe(digits("1000"), minValue(1)),
});

export interface Config {
  readonly logLevel: LogLevel;
  readonly logPretty: boolean;
  readonly difficulty: number;
  readonly mineBatch: number;
}

export const formatIssues = (issues: readonly BaseIssue<unknown>[]): string[] =>
  issues.map((i) => `${getDotPath(i) ?? "(root)"}: ${i.message}`);

export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
): Config => {
  const res = safeParse(envSchema, env);
  if (!res.success) throw new ConfigError(formatIssues(res.issues));
  return {
    logLevel: res.output.LOG_LEVEL,
    logPretty: res.output.LOG_PRETTY,
    difficulty: res.output.CHAIN_DIFFICULTY,
    mineBatch: res.output.MINE_BATCH,
  };
};

export const loggerFor = (config: Config): ILogger =>
  makeLogger(config.logLevel, { pretty: config.logPretty });
