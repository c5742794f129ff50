import { describe, it, expect } from "vitest";
import { parseHookOutput, toWireInput } from "./output.js";
import { createHookEvent } from "./types.js";

describe("parseHookOutput", () => {
  it("defaults to continue with nothing to add", () => {
    expect(parseHookOutput({})).toEqual({ continue: true, suppressOutput: false });
    expect(parseHookOutput("not an object")).toEqual({ continue: true, suppressOutput: false });
  });

  it("reads snake_case keys", () => {
    const output = parseHookOutput({
      continue: false,
      stop_reason: "policy",
      suppress_output: true,
      system_message: "note",
      decision: "deny",
      reason: "protected",
      updated_input: { path: "b" },
    });
    expect(output).toEqual({
      continue: false,
      stopReason: "policy",
      suppressOutput: true,
      systemMessage: "note",
      decision: "deny",
      reason: "protected",
      updatedInput: { path: "b" },
    });
  });

  it("reads camelCase keys and legacy decision words", () => {
    const output = parseHookOutput({ systemMessage: "hi", decision: "approve", updatedInput: "rewritten prompt" });
    expect(output.systemMessage).toBe("hi");
    expect(output.decision).toBe("allow");
    expect(output.updatedInput).toBe("rewritten prompt");
    expect(parseHookOutput({ decision: "block" }).decision).toBe("deny");
  });

  it("lets hookSpecificOutput override top-level fields", () => {
    const output = parseHookOutput({
      decision: "allow",
      hookSpecificOutput: {
        permissionDecision: "ask",
        permissionDecisionReason: "confirm first",
        additionalContext: "repo is read-only",
        updatedInput: { path: "safe.txt" },
      },
    });
    expect(output.decision).toBe("ask");
    expect(output.reason).toBe("confirm first");
    expect(output.additionalContext).toBe("repo is read-only");
    expect(output.updatedInput).toEqual({ path: "safe.txt" });
  });

  it("ignores unknown decisions and keys", () => {
    expect(parseHookOutput({ decision: "maybe", extra: 1 })).toEqual({ continue: true, suppressOutput: false });
  });
});

describe("toWireInput", () => {
  it("encodes common fields and the payload in snake_case", () => {
    const event = createHookEvent(
      "pre_tool_use",
      { sessionId: "sess_1", cwd: "/work", permissionMode: "acceptEdits" },
      { toolName: "Write", toolInput: { path: "a.txt", content: "x" }, toolUseId: "call_1" },
    );
    expect(toWireInput(event)).toEqual({
      session_id: "sess_1",
      cwd: "/work",
      permission_mode: "acceptEdits",
      hook_event_name: "PreToolUse",
      tool_name: "Write",
      tool_input: { path: "a.txt", content: "x" },
      tool_use_id: "call_1",
    });
  });

  it("omits absent optional payload fields", () => {
    const event = createHookEvent("stop", { sessionId: "s", cwd: "/", permissionMode: "default" }, {});
    expect(toWireInput(event)).toEqual({ session_id: "s", cwd: "/", permission_mode: "default", hook_event_name: "Stop" });
  });
});
