/**
 * Hooks configuration parsing.
 *
 * Accepts the JSON document users write:
 *
 *   { "hooks": { "PreToolUse": [ { "matcher": "Write|Edit",
 *       "hooks": [ { "type": "command", "command": "./check.sh", "timeout": 5 } ] } ] } }
 *
 * Event keys may be PascalCase or snake_case; `timeout` is in seconds,
 * `timeoutMs` in milliseconds.
 */

import { isJsonObject } from "../canonical/messages.js";
import type { JsonObject, JsonValue } from "../canonical/types.js";
import { ConfigurationError } from "../errors.js";
import { compileMatcher } from "./matcher.js";
import {
  HOOK_EVENT_NAMES,
  isHookEventKind,
  type HookEventKind,
  type HookMatcherGroup,
  type HooksConfig,
  type HookSpec,
} from "./types.js";

const KIND_BY_NAME = new Map<string, HookEventKind>(
  Object.entries(HOOK_EVENT_NAMES).flatMap(([kind, name]): Array<[string, HookEventKind]> =>
    isHookEventKind(kind) ? [[name, kind]] : [],
  ),
);

function eventKind(key: string): HookEventKind {
  if (isHookEventKind(key)) return key;
  const kind = KIND_BY_NAME.get(key);
  if (!kind) {
    throw new ConfigurationError(`hooks: unknown event "${key}". Valid events: ${[...KIND_BY_NAME.keys()].join(", ")}`);
  }
  return kind;
}

function parseTimeout(entry: JsonObject, path: string): number | undefined {
  const ms = entry.timeoutMs;
  const seconds = entry.timeout;
  const value = typeof ms === "number" ? ms : typeof seconds === "number" ? seconds * 1000 : undefined;
  if ((ms !== undefined && typeof ms !== "number") || (seconds !== undefined && typeof seconds !== "number")) {
    throw new ConfigurationError(`${path}: timeout must be a number`);
  }
  if (value !== undefined && !(value > 0)) {
    throw new ConfigurationError(`${path}: timeout must be positive`);
  }
  return value;
}

function parseSpec(raw: JsonValue, path: string): HookSpec {
  if (!isJsonObject(raw)) throw new ConfigurationError(`${path}: expected an object`);
  const timeoutMs = parseTimeout(raw, path);
  const type = raw.type ?? "command";

  if (type === "command") {
    const command = raw.command;
    if (typeof command !== "string" || command.trim() === "") {
      throw new ConfigurationError(`${path}: command hook needs a "command" string`);
    }
    return timeoutMs === undefined ? { type, command } : { type, command, timeoutMs };
  }
  if (type === "prompt") {
    const prompt = raw.prompt;
    if (typeof prompt !== "string" || prompt.trim() === "") {
      throw new ConfigurationError(`${path}: prompt hook needs a "prompt" string`);
    }
    return timeoutMs === undefined ? { type, prompt } : { type, prompt, timeoutMs };
  }
  throw new ConfigurationError(`${path}: unknown hook type ${JSON.stringify(type)}`);
}

function parseGroup(raw: JsonValue, path: string): HookMatcherGroup {
  if (!isJsonObject(raw)) throw new ConfigurationError(`${path}: expected an object`);
  const hooks = raw.hooks;
  const rawMatcher = raw.matcher;
  let matcher: string | undefined;
  if (rawMatcher !== undefined) {
    if (typeof rawMatcher !== "string") throw new ConfigurationError(`${path}.matcher: expected a string`);
    matcher = rawMatcher;
  }
  try {
    compileMatcher(matcher);
  } catch (err) {
    throw new ConfigurationError(`${path}.matcher: invalid pattern ${JSON.stringify(matcher)}`, { cause: err });
  }
  if (!Array.isArray(hooks)) throw new ConfigurationError(`${path}.hooks: expected an array`);
  const specs = hooks.map((h, i) => parseSpec(h, `${path}.hooks[${i}]`));
  return matcher === undefined ? { hooks: specs } : { matcher, hooks: specs };
}

/** Validate an untyped hooks document. Throws ConfigurationError on the first invalid entry. */
export function parseHooksConfig(raw: unknown): HooksConfig {
  if (raw === undefined || raw === null) return {};
  if (!isJsonObject(raw)) throw new ConfigurationError("hooks: expected an object");
  const root = isJsonObject(raw.hooks) ? raw.hooks : raw;

  const config: HooksConfig = {};
  for (const [key, groups] of Object.entries(root)) {
    const kind = eventKind(key);
    if (!Array.isArray(groups)) throw new ConfigurationError(`hooks.${key}: expected an array of matcher groups`);
    config[kind] = [...(config[kind] ?? []), ...groups.map((g, i) => parseGroup(g, `hooks.${key}[${i}]`))];
  }
  return config;
}

export function countHandlers(config: HooksConfig): number {
  return Object.values(config).reduce((sum, groups) => sum + (groups ?? []).reduce((n, g) => n + g.hooks.length, 0), 0);
}
