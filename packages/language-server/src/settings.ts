import type { ConfigurationItem } from "vscode-languageserver/node.js";
import { ConfigurationTimeoutError, formatError } from "./errors.js";
import type { Logger } from "./services/types.js";

export const CONFIGURATION_SECTION = "yalafi";

export const CONFIGURATION_TIMEOUT_MS = 3000;

export interface YalafiSettings {
  /** Extra arguments passed to `yalafi.shell` before the file name. */
  commandLineOptions: string[];
  /** Interpreter used to run `-m yalafi.shell`. */
  pythonPath: string;
}

export function defaultSettings(): YalafiSettings {
  return { commandLineOptions: [], pythonPath: "python3" };
}

/** The slice of `connection.workspace` used to read settings. */
export interface ConfigurationSource {
  getConfiguration(item: ConfigurationItem): Promise<unknown>;
}

function normalizeStringArray(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((entry): entry is string => typeof entry === "string" && entry.length > 0);
  }
  if (typeof value === "string") {
    return value
      .split(/\s+/)
      .map((entry) => entry.trim())
      .filter(Boolean);
  }
  return [];
}

export function normalizeSettings(value: unknown): YalafiSettings {
  if (typeof value !== "object" || value === null) {
    return defaultSettings();
  }
  const { commandLineOptions, pythonPath } = value as Record<string, unknown>;
  return {
    commandLineOptions: normalizeStringArray(commandLineOptions),
    pythonPath: typeof pythonPath === "string" && pythonPath.trim() ? pythonPath.trim() : defaultSettings().pythonPath,
  };
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ConfigurationTimeoutError(timeoutMs)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Ask the client for the `yalafi` section. Never fails: a missing source, a
 * rejected request or a request slower than `timeoutMs` falls back to the
 * defaults (no extra options).
 */
export async function fetchSettings(
  source: ConfigurationSource | null,
  logger: Logger,
  options: { scopeUri?: string; timeoutMs?: number } = {},
): Promise<YalafiSettings> {
  const timeoutMs = options.timeoutMs ?? CONFIGURATION_TIMEOUT_MS;
  if (!source) return defaultSettings();
  try {
    logger.log("[config] fetching configuration");
    const value = await withTimeout(source.getConfiguration({ scopeUri: options.scopeUri, section: CONFIGURATION_SECTION }), timeoutMs);
    logger.log("[config] fetched configuration");
    return normalizeSettings(value);
  } catch (e) {
    logger.warn(`[config] could not fetch configuration: ${formatError(e)}`);
    return defaultSettings();
  }
}
