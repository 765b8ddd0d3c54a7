import { ConfigError } from "./errors.js";
import { ConfigOverridesSchema, parseOrThrow } from "./schemas.js";
import type { ConfigOverrides } from "./schemas.js";
import { setLogLevel } from "./utils/logger.js";
import type { LogLevel } from "./utils/logger.js";

export type DagrunConfig = {
  logging: {
    level: LogLevel;
  };
  scheduler: {
    /** Log the end-of-run summary. */
    logSummary: boolean;
    /** Warn before cleaning up a node nothing in the graph depends on. */
    warnOnRootCleanup: boolean;
  };
  targets: {
    /** Infix of the temporary path a LocalTarget write goes through. */
    tmpMarker: string;
    /** Infix of the path a failed LocalTarget write is moved to. */
    failedMarker: string;
  };
};

const DEFAULTS: DagrunConfig = {
  logging: {
    level: "info",
  },
  scheduler: {
    logSummary: true,
    warnOnRootCleanup: true,
  },
  targets: {
    tmpMarker: "TMP",
    failedMarker: "FAILED",
  },
};

let current: DagrunConfig = structuredClone(DEFAULTS);

// Field by field: an override key present with `undefined` keeps the default.
function merge(base: DagrunConfig, overrides: ConfigOverrides): DagrunConfig {
  const { logging, scheduler, targets } = overrides;
  return {
    logging: {
      level: logging?.level ?? base.logging.level,
    },
    scheduler: {
      logSummary: scheduler?.logSummary ?? base.scheduler.logSummary,
      warnOnRootCleanup: scheduler?.warnOnRootCleanup ?? base.scheduler.warnOnRootCleanup,
    },
    targets: {
      tmpMarker: targets?.tmpMarker ?? base.targets.tmpMarker,
      failedMarker: targets?.failedMarker ?? base.targets.failedMarker,
    },
  };
}

/**
 * Override config values. Merges deeply with defaults; invalid overrides
 * throw a ConfigError and leave the current config untouched.
 */
export function configure(overrides: ConfigOverrides): void {
  const parsed = parseOrThrow(ConfigOverridesSchema, overrides, (message) => new ConfigError(`Invalid configuration: ${message}`));
  current = merge(DEFAULTS, parsed);
  setLogLevel(current.logging.level);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
  setLogLevel(current.logging.level);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<DagrunConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<DagrunConfig> = Object.freeze(structuredClone(DEFAULTS));
