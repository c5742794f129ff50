/**
 * File-backed context sources.
 */

import { promises as fs } from "fs";
import { extname, isAbsolute, relative, resolve } from "path";
import type { Message } from "../canonical/types.js";
import { userText } from "../canonical/messages.js";
import { createComponentLogger } from "../logging.js";
import type { AttachmentResolver, RulesSource } from "./injector.js";

const log = createComponentLogger("context.sources");

/** Rules files read fresh on every exchange, in configured order. Missing files are skipped. */
export class FileRulesSource implements RulesSource {
  constructor(private readonly paths: readonly string[]) {}

  async load(signal: AbortSignal): Promise<string[]> {
    const blobs: string[] = [];
    for (const path of this.paths) {
      try {
        blobs.push(await fs.readFile(path, { encoding: "utf-8", signal }));
      } catch (err) {
        if (signal.aborted) throw err;
        log.warn("Rules file unreadable", { path, error: err instanceof Error ? err.message : String(err) });
      }
    }
    return blobs;
  }
}

const TEXT_EXTENSIONS = new Set([
  ".txt", ".md", ".json", ".yaml", ".yml", ".toml", ".ts", ".tsx", ".js", ".mjs", ".cjs",
  ".py", ".rs", ".go", ".java", ".c", ".h", ".cpp", ".css", ".html", ".sql", ".sh", ".csv",
]);

const MAX_FILE_CHARS = 100_000;

/**
 * Inlines attachments that reference a text file inside the project
 * directory and carry no data of their own.
 */
export class ProjectFileResolver implements AttachmentResolver {
  readonly name = "project_files";

  constructor(private readonly projectDir: string) {}

  async resolve(message: Message, signal: AbortSignal): Promise<Message[]> {
    const resolved: Message[] = [];
    for (const segment of message.content) {
      if (segment.type !== "attachment" || segment.data !== undefined) continue;
      const path = this.insideProject(segment.ref);
      if (!path || !TEXT_EXTENSIONS.has(extname(path).toLowerCase())) continue;

      const text = await fs.readFile(path, { encoding: "utf-8", signal });
      const body = text.length > MAX_FILE_CHARS ? `${text.slice(0, MAX_FILE_CHARS)}\n[truncated]` : text;
      resolved.push(userText(`<file path="${segment.ref}">\n${body}\n</file>`));
    }
    return resolved;
  }

  private insideProject(ref: string): string | null {
    const path = resolve(this.projectDir, ref);
    const rel = relative(this.projectDir, path);
    return rel.startsWith("..") || isAbsolute(rel) ? null : path;
  }
}
