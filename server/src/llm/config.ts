/**
 * Model Tables: context windows, model-to-provider routing and default models.
 *
 * The tables live in ./models.json; this module loads and queries them.
 */

import { readFileSync } from "fs";
import type { ProviderId } from "./types.js";
import { normalizeProviderId } from "./factory.js";
import { isRecord, asArray, asNumber, asString } from "./wire.js";

interface PrefixEntry<T> {
  prefix: string;
  value: T;
}

interface ModelTables {
  defaultContextWindow: number;
  contextWindows: PrefixEntry<number>[];
  routes: PrefixEntry<ProviderId>[];
  defaultModels: Partial<Record<ProviderId, string>>;
}

function loadTables(): ModelTables {
  const raw: unknown = JSON.parse(readFileSync(new URL("./models.json", import.meta.url), "utf-8"));
  if (!isRecord(raw)) throw new Error("models.json must be an object");

  const contextWindows = asArray(raw.contextWindows).flatMap((e): PrefixEntry<number>[] => {
    if (!isRecord(e)) return [];
    const prefix = asString(e.prefix);
    const value = asNumber(e.contextWindow);
    return prefix && value ? [{ prefix, value }] : [];
  });

  const routes = asArray(raw.routes).flatMap((e): PrefixEntry<ProviderId>[] => {
    if (!isRecord(e)) return [];
    const prefix = asString(e.prefix);
    const provider = normalizeProviderId(asString(e.provider) ?? "");
    return prefix && provider ? [{ prefix, value: provider }] : [];
  });

  const defaultModels: Partial<Record<ProviderId, string>> = {};
  if (isRecord(raw.defaultModels)) {
    for (const [key, model] of Object.entries(raw.defaultModels)) {
      const provider = normalizeProviderId(key);
      const name = asString(model);
      if (provider && name) defaultModels[provider] = name;
    }
  }

  // Longest prefix first so "gpt-4o" wins over "gpt-4"
  const byLength = <T>(a: PrefixEntry<T>, b: PrefixEntry<T>) => b.prefix.length - a.prefix.length;
  return {
    defaultContextWindow: asNumber(raw.defaultContextWindow) ?? 128_000,
    contextWindows: contextWindows.sort(byLength),
    routes: routes.sort(byLength),
    defaultModels,
  };
}

const TABLES = loadTables();

function matchPrefix<T>(entries: PrefixEntry<T>[], model: string): T | undefined {
  const name = bareModelName(model).toLowerCase();
  return entries.find((e) => name.startsWith(e.prefix))?.value;
}

/** "anthropic/claude-x" -> "claude-x"; also strips vendor folders like "models/" */
export function bareModelName(model: string): string {
  const slash = model.lastIndexOf("/");
  return slash >= 0 ? model.slice(slash + 1) : model;
}

export function contextWindowFor(model: string, override?: number): number {
  return override ?? matchPrefix(TABLES.contextWindows, model) ?? TABLES.defaultContextWindow;
}

export function defaultModelFor(provider: ProviderId): string {
  return TABLES.defaultModels[provider] ?? "default";
}

/**
 * Pick a provider for a model: an explicit "provider/model" prefix first,
 * then the routing table, then the configured default.
 */
export function resolveProvider(model: string, fallback: ProviderId): ProviderId {
  const slash = model.indexOf("/");
  if (slash > 0) {
    const explicit = normalizeProviderId(model.slice(0, slash));
    if (explicit) return explicit;
  }
  return matchPrefix(TABLES.routes, model) ?? fallback;
}

/** Model name as sent upstream: an explicit provider prefix is removed */
export function upstreamModelName(model: string): string {
  const slash = model.indexOf("/");
  if (slash > 0 && normalizeProviderId(model.slice(0, slash))) return model.slice(slash + 1);
  return model;
}
