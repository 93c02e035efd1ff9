/**
 * Environment-driven settings.
 *
 *   KERNSCOPE_DEBUG=1                 verbose tracing of trees, loops and estimates
 *   KERNSCOPE_MAX_BINARY_TOKENS=<n>   size cap for postfix expressions (default 50)
 *   KERNSCOPE_MAX_NARY_NODES=<n>      size cap for parenthesized expressions (default 100)
 */

export type EngineConfig = {
  debug: boolean;
  maxBinaryTokens: number;
  maxNaryNodes: number;
};

export const DEFAULT_CONFIG: Readonly<EngineConfig> = {
  debug: false,
  maxBinaryTokens: 50,
  maxNaryNodes: 100,
};

type Env = Record<string, string | undefined>;

function readCap(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    console.warn(`[config] ignoring ${key}=${raw}: expected a positive integer`);
    return fallback;
  }
  return parsed;
}

function readFlag(env: Env, key: string): boolean {
  const raw = env[key];
  return raw !== undefined && raw !== "" && raw !== "0" && raw !== "false";
}

export function loadConfig(env: Env = processEnv()): EngineConfig {
  return {
    debug: readFlag(env, "KERNSCOPE_DEBUG"),
    maxBinaryTokens: readCap(env, "KERNSCOPE_MAX_BINARY_TOKENS", DEFAULT_CONFIG.maxBinaryTokens),
    maxNaryNodes: readCap(env, "KERNSCOPE_MAX_NARY_NODES", DEFAULT_CONFIG.maxNaryNodes),
  };
}

function processEnv(): Env {
  return typeof process !== "undefined" && process.env ? process.env : {};
}

export const DEBUG_ENGINE =
  typeof process !== "undefined" && readFlag(processEnv(), "KERNSCOPE_DEBUG");
