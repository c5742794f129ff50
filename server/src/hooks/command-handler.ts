/**
 * Command Hook Handler
 *
 * Runs a shell command with the event as JSON on stdin. Exit 0 means the
 * stdout is a HookOutput, exit 2 blocks with stderr as the reason, any
 * other code is a non-blocking failure.
 */

import { spawn } from "child_process";
import { HookCrashError } from "../errors.js";
import { createComponentLogger } from "../logging.js";
import { defaultHookOutput, parseHookOutput, toWireInput } from "./output.js";
import { HOOK_EVENT_NAMES, outcome, type HandlerOutcome, type HookEvent, type HookHandler } from "./types.js";

const log = createComponentLogger("hooks.command");

export const DEFAULT_COMMAND_TIMEOUT_MS = 60_000;
const KILL_GRACE_MS = 1000;
const BLOCKING_EXIT_CODE = 2;
/** POSIX: run the shell in its own process group so abort reaches its children */
const USE_PROCESS_GROUP = process.platform !== "win32";

/** Events whose plain-text stdout is taken as a system message */
const PLAIN_TEXT_EVENTS = new Set<HookEvent["kind"]>(["user_prompt_submit", "session_start"]);

export interface CommandHandlerOptions {
  id: string;
  command: string;
  timeoutMs?: number;
  /** Working directory and GATEWAY_PROJECT_DIR */
  projectDir: string;
}

export class CommandHookHandler implements HookHandler {
  readonly kind = "command" as const;
  readonly id: string;
  readonly timeoutMs: number;
  private readonly command: string;
  private readonly projectDir: string;

  constructor(options: CommandHandlerOptions) {
    this.id = options.id;
    this.command = options.command;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.projectDir = options.projectDir;
  }

  run(event: HookEvent, signal: AbortSignal): Promise<HandlerOutcome> {
    return new Promise((resolve) => {
      const proc = spawn(this.command, {
        shell: true,
        cwd: this.projectDir,
        stdio: ["pipe", "pipe", "pipe"],
        detached: USE_PROCESS_GROUP,
        env: {
          ...process.env,
          GATEWAY_PROJECT_DIR: this.projectDir,
          GATEWAY_HOOK_EVENT: HOOK_EVENT_NAMES[event.kind],
        },
      });
      let stdout = "";
      let stderr = "";
      let killTimer: NodeJS.Timeout | undefined;
      let closed = false;

      const kill = (sig: NodeJS.Signals) => {
        if (USE_PROCESS_GROUP && proc.pid !== undefined) {
          try {
            process.kill(-proc.pid, sig);
            return;
          } catch (err) {
            log.debug("Process group kill failed", { handler: this.id, error: err instanceof Error ? err.message : String(err) });
          }
        }
        proc.kill(sig);
      };

      proc.stdout.on("data", (d: Buffer) => { stdout += d.toString(); });
      proc.stderr.on("data", (d: Buffer) => { stderr += d.toString(); });

      // The command may exit without reading its input
      proc.stdin.on("error", (err) => {
        log.debug("Hook stdin closed early", { handler: this.id, error: err.message });
      });

      const onAbort = () => {
        kill("SIGTERM");
        killTimer = setTimeout(() => {
          if (!closed) kill("SIGKILL");
        }, KILL_GRACE_MS);
        killTimer.unref();
      };
      if (signal.aborted) onAbort();
      else signal.addEventListener("abort", onAbort, { once: true });

      proc.on("error", (err) => {
        signal.removeEventListener("abort", onAbort);
        resolve(outcome.failed(err));
      });

      proc.on("close", (code) => {
        closed = true;
        signal.removeEventListener("abort", onAbort);
        if (killTimer) clearTimeout(killTimer);
        if (signal.aborted) {
          resolve(outcome.failed(new HookCrashError(this.id, code, stderr, `Hook handler ${this.id} was aborted`)));
          return;
        }
        resolve(this.interpret(event, code, stdout, stderr));
      });

      proc.stdin.end(`${JSON.stringify(toWireInput(event))}\n`);
    });
  }

  private interpret(event: HookEvent, code: number | null, stdout: string, stderr: string): HandlerOutcome {
    if (code === BLOCKING_EXIT_CODE) {
      return outcome.blocking(stderr.trim() || stdout.trim() || `Blocked by hook ${this.id}`);
    }
    if (code !== 0) {
      return outcome.failed(new HookCrashError(this.id, code, stderr));
    }

    const text = stdout.trim();
    if (text === "") return outcome.ok(defaultHookOutput());

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      if (PLAIN_TEXT_EVENTS.has(event.kind)) {
        return outcome.ok({ ...defaultHookOutput(), systemMessage: text });
      }
      return outcome.failed(new HookCrashError(this.id, 0, stderr, `Hook handler ${this.id} printed output that is not JSON`));
    }
    return outcome.ok(parseHookOutput(parsed));
  }
}
