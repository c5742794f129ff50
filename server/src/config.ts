/**
 * Gateway Configuration
 *
 * Built once from the environment (after dotenv has loaded `.env`) into a
 * deeply frozen object. Nothing reads process.env after startup; a reload
 * builds a new config and swaps it into the ConfigHolder.
 */

import { config as loadDotenvFile } from "dotenv";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { fileURLToPath } from "url";
import { DEFAULT_RESPONSE_RESERVE, DEFAULT_THRESHOLD, DEFAULT_WARN_THRESHOLD, type CompactionSettings } from "./compaction/index.js";
import { ConfigurationError, toErrorMessage } from "./errors.js";
import { parseHooksConfig, type HooksConfig, type PermissionMode } from "./hooks/index.js";
import { defaultModelFor, getAdapter, normalizeProviderId, PROVIDER_IDS, type ProviderCapabilitySet, type ProviderId } from "./llm/index.js";
import { DEFAULT_GUARDRAILS, type GuardMode, type GuardrailSettings } from "./guardrails/index.js";
import { createComponentLogger } from "./logging.js";
import {
  DEFAULT_MAX_CORE_BLOCK_CHARS,
  DEFAULT_RECENT_SESSION_HOURS,
  DEFAULT_RECENT_SESSION_LIMIT,
  DEFAULT_SEARCH_CAP,
} from "./memory/index.js";
import { DEFAULT_HISTORY_DEPTH } from "./session/index.js";

const log = createComponentLogger("config");

// ============================================
// TYPES
// ============================================

export interface ProviderSettings {
  baseUrl?: string;
  apiKey?: string;
  /** Overrides the model table for every model served by this provider */
  contextWindow?: number;
  capabilities?: Partial<ProviderCapabilitySet>;
}

export interface GatewayConfig {
  port: number;
  host: string;
  /** SQLite database and log files live here */
  dataDir: string;
  /** Working directory for command hooks and attachment resolution */
  projectDir: string;
  defaultProvider: string;
  defaultModel: string;
  /** Keyed by provider identifier as configured */
  providers: Record<string, ProviderSettings>;
  hooks: HooksConfig;
  context: {
    systemPrompt?: string;
    rulesFiles: string[];
    sourceTimeoutMs: number;
  };
  session: {
    historyDepth: number;
  };
  compaction: CompactionSettings;
  memory: {
    maxCoreBlockChars: number;
    searchCap: number;
  };
  continuity: {
    /** Ended sessions and activity older than this are dropped */
    expiryHours: number;
    recentLimit: number;
  };
  guardrails: GuardrailSettings;
  upstream: {
    timeoutMs: number;
    maxRetries: number;
    /** 0 = unlimited */
    maxToolRounds: number;
  };
  permissionMode: PermissionMode;
}

export type Env = Record<string, string | undefined>;

// ============================================
// CONSTANTS
// ============================================

export const DEFAULT_PORT = 8787;
export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PROVIDER = "anthropic";

const PERMISSION_MODES: readonly PermissionMode[] = ["default", "plan", "acceptEdits", "bypassPermissions"];
const GUARD_MODES: readonly GuardMode[] = ["strict", "advisory"];

/** Extra environment names accepted for a provider's API key */
const KEY_ALIASES: Partial<Record<ProviderId, string[]>> = {
  google: ["GEMINI_API_KEY"],
  qwen: ["DASHSCOPE_API_KEY"],
  glm: ["ZAI_API_KEY"],
};

// ============================================
// ENV PARSING
// ============================================

function stringVar(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function numberVar(env: Env, name: string, fallback: number, options: { integer?: boolean; min?: number } = {}): number {
  const raw = stringVar(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || (options.integer && !Number.isInteger(value)) || (options.min !== undefined && value < options.min)) {
    throw new ConfigurationError(`${name} must be ${options.integer ? "an integer" : "a number"}${options.min !== undefined ? ` >= ${options.min}` : ""}, got "${raw}"`);
  }
  return value;
}

function listVar(env: Env, name: string): string[] {
  return (stringVar(env, name) ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function permissionModeVar(env: Env): PermissionMode {
  const raw = stringVar(env, "GATEWAY_PERMISSION_MODE");
  if (raw === undefined) return "default";
  const mode = PERMISSION_MODES.find((m) => m === raw);
  if (!mode) throw new ConfigurationError(`GATEWAY_PERMISSION_MODE must be one of ${PERMISSION_MODES.join(", ")}, got "${raw}"`);
  return mode;
}

function guardModeVar(env: Env): GuardMode {
  const raw = stringVar(env, "GATEWAY_GUARD_MODE");
  if (raw === undefined) return DEFAULT_GUARDRAILS.mode;
  const mode = GUARD_MODES.find((m) => m === raw);
  if (!mode) throw new ConfigurationError(`GATEWAY_GUARD_MODE must be one of ${GUARD_MODES.join(", ")}, got "${raw}"`);
  return mode;
}

function envPrefix(id: ProviderId): string {
  return id.toUpperCase();
}

function providersFromEnv(env: Env, defaultProvider: string): Record<string, ProviderSettings> {
  const providers: Record<string, ProviderSettings> = {};
  for (const id of PROVIDER_IDS) {
    const prefix = envPrefix(id);
    const keyNames = [`${prefix}_API_KEY`, ...(KEY_ALIASES[id] ?? [])];
    const apiKey = keyNames.map((name) => stringVar(env, name)).find((v) => v !== undefined);
    const baseUrl = stringVar(env, `${prefix}_BASE_URL`);
    const contextWindow = stringVar(env, `${prefix}_CONTEXT_WINDOW`)
      ? numberVar(env, `${prefix}_CONTEXT_WINDOW`, 0, { integer: true, min: 1 })
      : undefined;
    const streaming = stringVar(env, `${prefix}_STREAMING`);

    const isDefault = normalizeProviderId(defaultProvider) === id;
    if (!apiKey && !baseUrl && !contextWindow && !streaming && !isDefault) continue;

    const settings: ProviderSettings = {};
    if (apiKey) settings.apiKey = apiKey;
    if (baseUrl) settings.baseUrl = baseUrl;
    if (contextWindow) settings.contextWindow = contextWindow;
    if (streaming) settings.capabilities = { streaming: streaming !== "false" && streaming !== "0" };
    providers[id] = settings;
  }
  // Keep an unrecognized default visible so validation can reject it
  if (!normalizeProviderId(defaultProvider)) providers[defaultProvider] = {};
  return providers;
}

function loadHooksFile(file: string | undefined, projectDir: string): HooksConfig {
  if (!file) return {};
  const resolved = path.resolve(projectDir, file);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot read hooks file ${resolved}: ${toErrorMessage(err)}`, { cause: err });
  }
  return parseHooksConfig(raw);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const item of Object.values(value)) deepFreeze(item);
  }
  return value;
}

// ============================================
// LOADING
// ============================================

/**
 * Load `.env` into process.env. Values already set in the environment win.
 * Default location: the repository root.
 */
export function loadDotenv(file?: string): void {
  const root = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../..");
  loadDotenvFile({ path: file ?? path.join(root, ".env") });
}

/** Build a frozen config from environment variables */
export function loadConfig(env: Env = process.env): Readonly<GatewayConfig> {
  const projectDir = path.resolve(stringVar(env, "GATEWAY_PROJECT_DIR") ?? process.cwd());
  const defaultProvider = stringVar(env, "GATEWAY_PROVIDER") ?? DEFAULT_PROVIDER;
  const providerId = normalizeProviderId(defaultProvider);

  const config: GatewayConfig = {
    port: numberVar(env, "GATEWAY_PORT", DEFAULT_PORT, { integer: true, min: 0 }),
    host: stringVar(env, "GATEWAY_HOST") ?? DEFAULT_HOST,
    dataDir: path.resolve(stringVar(env, "GATEWAY_DATA_DIR") ?? path.join(os.homedir(), ".modelgate")),
    projectDir,
    defaultProvider,
    defaultModel: stringVar(env, "GATEWAY_MODEL") ?? (providerId ? defaultModelFor(providerId) : ""),
    providers: providersFromEnv(env, defaultProvider),
    hooks: loadHooksFile(stringVar(env, "GATEWAY_HOOKS_FILE"), projectDir),
    context: {
      systemPrompt: stringVar(env, "GATEWAY_SYSTEM_PROMPT"),
      rulesFiles: listVar(env, "GATEWAY_RULES_FILES").map((f) => path.resolve(projectDir, f)),
      sourceTimeoutMs: numberVar(env, "GATEWAY_SOURCE_TIMEOUT_MS", 1000, { integer: true, min: 1 }),
    },
    session: {
      historyDepth: numberVar(env, "GATEWAY_HISTORY_DEPTH", DEFAULT_HISTORY_DEPTH, { integer: true, min: 0 }),
    },
    compaction: {
      threshold: numberVar(env, "GATEWAY_COMPACTION_THRESHOLD", DEFAULT_THRESHOLD),
      responseReserve: numberVar(env, "GATEWAY_RESPONSE_RESERVE", DEFAULT_RESPONSE_RESERVE, { integer: true, min: 0 }),
      preserveRecentTurns: numberVar(env, "GATEWAY_PRESERVE_RECENT_TURNS", 0, { integer: true, min: 0 }),
      warnThreshold: numberVar(env, "GATEWAY_WARN_THRESHOLD", DEFAULT_WARN_THRESHOLD),
    },
    memory: {
      maxCoreBlockChars: numberVar(env, "GATEWAY_MAX_CORE_BLOCK_CHARS", DEFAULT_MAX_CORE_BLOCK_CHARS, { integer: true, min: 1 }),
      searchCap: numberVar(env, "GATEWAY_SEARCH_CAP", DEFAULT_SEARCH_CAP, { integer: true, min: 1 }),
    },
    continuity: {
      expiryHours: numberVar(env, "GATEWAY_RECENT_SESSION_HOURS", DEFAULT_RECENT_SESSION_HOURS, { min: 0 }),
      recentLimit: numberVar(env, "GATEWAY_RECENT_SESSION_LIMIT", DEFAULT_RECENT_SESSION_LIMIT, { integer: true, min: 1 }),
    },
    guardrails: {
      mode: guardModeVar(env),
      allowedPaths: listVar(env, "GATEWAY_ALLOWED_PATHS"),
      deniedPaths: listVar(env, "GATEWAY_DENIED_PATHS"),
      maxFilesPerTurn: numberVar(env, "GATEWAY_MAX_FILES_PER_TURN", DEFAULT_GUARDRAILS.maxFilesPerTurn, { integer: true, min: 0 }),
      maxLinesChanged: numberVar(env, "GATEWAY_MAX_LINES_CHANGED", DEFAULT_GUARDRAILS.maxLinesChanged, { integer: true, min: 0 }),
      maxFilesChanged: numberVar(env, "GATEWAY_MAX_FILES_CHANGED", DEFAULT_GUARDRAILS.maxFilesChanged, { integer: true, min: 0 }),
    },
    upstream: {
      timeoutMs: numberVar(env, "GATEWAY_UPSTREAM_TIMEOUT_MS", 120_000, { integer: true, min: 1 }),
      maxRetries: numberVar(env, "GATEWAY_MAX_RETRIES", 2, { integer: true, min: 0 }),
      maxToolRounds: numberVar(env, "GATEWAY_MAX_TOOL_ROUNDS", 8, { integer: true, min: 0 }),
    },
    permissionMode: permissionModeVar(env),
  };

  return deepFreeze(config);
}

// ============================================
// VALIDATION
// ============================================

function checkFraction(name: string, value: number): void {
  if (!(value > 0 && value <= 1)) {
    throw new ConfigurationError(`${name} must be in (0, 1], got ${value}`);
  }
}

/**
 * Reject configs the gateway cannot serve with: unknown provider
 * identifiers, a missing default model, thresholds outside (0, 1].
 */
export function validateConfig(config: Readonly<GatewayConfig>): void {
  getAdapter(config.defaultProvider);
  for (const identifier of Object.keys(config.providers)) getAdapter(identifier);
  if (!config.defaultModel) throw new ConfigurationError("No default model configured (set GATEWAY_MODEL)");
  checkFraction("compaction.threshold", config.compaction.threshold);
  checkFraction("compaction.warnThreshold", config.compaction.warnThreshold);
}

/** Settings for a provider, looked up by canonical id or any alias it was configured under */
export function providerSettings(config: Readonly<GatewayConfig>, provider: ProviderId): ProviderSettings {
  for (const [identifier, settings] of Object.entries(config.providers)) {
    if (normalizeProviderId(identifier) === provider) return settings;
  }
  return {};
}

// ============================================
// HOT RELOAD
// ============================================

/**
 * Holds the live config. Exchanges take a snapshot with current() when they
 * start, so a swap only affects exchanges that begin afterwards.
 */
export class ConfigHolder {
  private config: Readonly<GatewayConfig>;
  private listeners = new Set<(next: Readonly<GatewayConfig>) => void>();

  constructor(initial: Readonly<GatewayConfig>) {
    validateConfig(initial);
    this.config = initial;
  }

  current(): Readonly<GatewayConfig> {
    return this.config;
  }

  /** Validate and install a new config. An invalid config leaves the current one in place. */
  swap(next: Readonly<GatewayConfig>): void {
    validateConfig(next);
    this.config = next;
    log.info("Configuration reloaded", { provider: next.defaultProvider, model: next.defaultModel });
    for (const listener of this.listeners) listener(next);
  }

  onSwap(listener: (next: Readonly<GatewayConfig>) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }
}
