import {
  integer,
  minValue,
  number,
  object,
  optional,
  parse,
  picklist,
  pipe,
  string,
  transform,
} from "valibot";
import type pino from "pino";

type LevelWithSilent = pino.LevelWithSilent;

const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const satisfies readonly LevelWithSilent[];

export interface LedgerConfig {
  logLevel: LevelWithSilent;
  prettyLogs: boolean;
  poolLimit: number;
}

const logSchema = object({
  LOG_LEVEL: optional(picklist(LOG_LEVELS), "info"),
  LOG_PRETTY: optional(
    pipe(
      picklist(["true", "false"]),
      transform((v) => v === "true"),
    ),
    "false",
  ),
});

const poolSchema = object({
  POOL_LIMIT: optional(
    pipe(
      string(),
      transform((v: string) => Number(v)),
      number(),
      integer(),
      minValue(1),
    ),
    "10000",
  ),
});

type Env = Record<string, string | undefined>;

/* each loader parses only its own variables */
export const loadLogConfig = (
  env: Env = process.env,
): Pick<LedgerConfig, "logLevel" | "prettyLogs"> => {
  const parsed = parse(logSchema, env);
  return { logLevel: parsed.LOG_LEVEL, prettyLogs: parsed.LOG_PRETTY };
};

export const loadPoolLimit = (env: Env = process.env): number =>
  parse(poolSchema, env).POOL_LIMIT;

export const loadConfig = (env: Env = process.env): LedgerConfig => ({
  ...loadLogConfig(env),
  poolLimit: loadPoolLimit(env),
});
