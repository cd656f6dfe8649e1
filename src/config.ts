import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { ConfigError, errorMessage } from "./errors.js";
import { ConfigFileSchema } from "./schemas.js";

export type SchedulerConfig = {
  paths: {
    dataDir: string;
    dbPath: string;
    outputDir: string;
    configFile: string;
  };
  governor: {
    acquireTimeoutMs: number;
    /** Concurrency limit per canonical bucket; `_default` covers the rest. */
    limits: Record<string, number>;
  };
  enforcer: {
    parallelWindowMs: number;
    strict: boolean;
  };
  manager: {
    pollIntervalMs: number;
    cancelGraceMs: number;
    defaultTimeoutMs: number;
    blockTimeoutMs: number;
    progressLines: number;
  };
};

export type ConfigOverrides = {
  [K in keyof SchedulerConfig]?: Partial<SchedulerConfig[K]>;
};

const DATA_DIR = process.env.TASKWAVE_HOME ?? join(homedir(), ".taskwave");

export const DEFAULT_LIMITS: Readonly<Record<string, number>> = Object.freeze({
  opus: 2,
  sonnet: 5,
  haiku: 10,
  "gemini-flash": 10,
  "gemini-pro": 5,
  gpt: 3,
  _default: 5,
});

const DEFAULTS: SchedulerConfig = {
  paths: {
    dataDir: DATA_DIR,
    dbPath: join(DATA_DIR, "tasks.db"),
    outputDir: join(DATA_DIR, "runs"),
    configFile: process.env.TASKWAVE_CONFIG ?? join(DATA_DIR, "config.json"),
  },
  governor: {
    acquireTimeoutMs: 60_000,
    limits: { ...DEFAULT_LIMITS },
  },
  enforcer: {
    parallelWindowMs: 1_000,
    strict: true,
  },
  manager: {
    pollIntervalMs: 500,
    cancelGraceMs: 5_000,
    defaultTimeoutMs: 5 * 60 * 1000, // 5 minutes
    blockTimeoutMs: 30_000,
    progressLines: 20,
  },
};

let current: SchedulerConfig = structuredClone(DEFAULTS);

function merge(base: SchedulerConfig, overrides: ConfigOverrides): SchedulerConfig {
  return {
    paths: { ...base.paths, ...overrides.paths },
    governor: {
      ...base.governor,
      ...overrides.governor,
      limits: { ...base.governor.limits, ...overrides.governor?.limits },
    },
    enforcer: { ...base.enforcer, ...overrides.enforcer },
    manager: { ...base.manager, ...overrides.manager },
  };
}

/** Override config values. Merges with defaults, so earlier overrides are dropped. */
export function configure(overrides: ConfigOverrides): void {
  current = merge(structuredClone(DEFAULTS), overrides);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<SchedulerConfig> {
  return current;
}

/**
 * Read the user config file and turn it into overrides. A missing file
 * yields no overrides; a malformed one is a `ConfigError`.
 *
 * ```json
 * { "rateLimits": { "opus": 1, "gpt": 2 }, "parallelWindowMs": 2000 }
 * ```
 */
export function loadConfigFile(path: string = current.paths.configFile): ConfigOverrides {
  if (!existsSync(path)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Could not read config file ${path}: ${errorMessage(err)}`);
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid config file ${path}: ${msg}`);
  }

  const file = parsed.data;
  const overrides: ConfigOverrides = {};
  if (file.rateLimits || file.acquireTimeoutMs !== undefined) {
    overrides.governor = {};
    if (file.rateLimits) overrides.governor.limits = file.rateLimits;
    if (file.acquireTimeoutMs !== undefined) overrides.governor.acquireTimeoutMs = file.acquireTimeoutMs;
  }
  if (file.parallelWindowMs !== undefined || file.strict !== undefined) {
    overrides.enforcer = {};
    if (file.parallelWindowMs !== undefined) overrides.enforcer.parallelWindowMs = file.parallelWindowMs;
    if (file.strict !== undefined) overrides.enforcer.strict = file.strict;
  }
  if (file.manager) overrides.manager = file.manager;
  return overrides;
}

/** The default config values (frozen). */
export const defaults: Readonly<SchedulerConfig> = Object.freeze(structuredClone(DEFAULTS));
