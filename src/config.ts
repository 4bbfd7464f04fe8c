import {
  getDotPath,
  object,
  optional,
  picklist,
  pipe,
  regex,
  safeParse,
  string,
  transform,
} from "valibot";
import type pino from "pino";
import { ConfigError } from "./core/errors";

const digits = pipe(string(), regex(/^\d+$/, "must be a non-negative integer"));

const EnvSchema = object({
  LOG_LEVEL: optional(
    picklist(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
    "info",
  ),
  LOG_PRETTY: optional(picklist(["true", "false"]), "false"),
  ENGINE_MAX_CALL_DEPTH: optional(pipe(digits, transform(Number)), "256"),
  ENGINE_DEFAULT_GAS: optional(pipe(digits, transform<string, bigint>(BigInt)), "30000000"),
  ENGINE_DEPLOY_GAS: optional(pipe(digits, transform<string, bigint>(BigInt)), "3000000"),
});

export interface EngineConfig {
  logLevel: pino.LevelWithSilent;
  logPretty: boolean;
  maxCallDepth: number;
  /** budget for `call` when the host passes none */
  defaultGas: bigint;
  /** budget for `deploy` when the host passes none */
  deployGas: bigint;
}

export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
): EngineConfig => {
  const parsed = safeParse(EnvSchema, env);
  if (!parsed.success) {
    const issues = parsed.issues.map(
      (issue) => `${getDotPath(issue) ?? "env"}: ${issue.message}`,
    );
    throw new ConfigError(`invalid configuration: ${issues.join(", ")}`, issues);
  }
  const out = parsed.output;
  return {
    logLevel: out.LOG_LEVEL,
    logPretty: out.LOG_PRETTY === "true",
    maxCallDepth: out.ENGINE_MAX_CALL_DEPTH,
    defaultGas: out.ENGINE_DEFAULT_GAS,
    deployGas: out.ENGINE_DEPLOY_GAS,
  };
};

const ENV_KEYS = [
  ["logLevel", "LOG_LEVEL"],
  ["logPretty", "LOG_PRETTY"],
  ["maxCallDepth", "ENGINE_MAX_CALL_DEPTH"],
  ["defaultGas", "ENGINE_DEFAULT_GAS"],
  ["deployGas", "ENGINE_DEPLOY_GAS"],
] as const satisfies readonly (readonly [keyof EngineConfig, keyof typeof EnvSchema.entries])[];

/** Explicit settings win; only the variables they leave open are read from env. */
export const resolveConfig = (
  overrides: Partial<EngineConfig> = {},
  env: Record<string, string | undefined> = process.env,
): EngineConfig => {
  const open = { ...env };
  for (const [field, key] of ENV_KEYS) {
    if (overrides[field] !== undefined) delete open[key];
  }
  const base = loadConfig(open);
  return {
    logLevel: overrides.logLevel ?? base.logLevel,
    logPretty: overrides.logPretty ?? base.logPretty,
    maxCallDepth: overrides.maxCallDepth ?? base.maxCallDepth,
    defaultGas: overrides.defaultGas ?? base.defaultGas,
    deployGas: overrides.deployGas ?? base.deployGas,
  };
};
