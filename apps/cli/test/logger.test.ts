import { afterEach, describe, expect, it, vi } from "vitest";
import {
  buildCommandLog,
  buildErrorLog,
  log,
  shouldLog,
  toPrettyLine
} from "../src/logger.js";

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe("buildCommandLog", () => {
  it("carries command, mode, input count and duration", () => {
    expect(
      buildCommandLog({ command: "sort", mode: "caseless", inputs: 3, duration_ms: 2 })
    ).toEqual({
      level: "info",
      msg: "command",
      command: "sort",
      mode: "caseless",
      inputs: 3,
      duration_ms: 2
    });
  });
});

describe("buildErrorLog", () => {
  it("keeps the error code when there is one", () => {
    const err = Object.assign(new Error("bad text"), { code: "MALFORMED_TEXT" });
    expect(buildErrorLog(err)).toEqual({
      level: "error",
      msg: "command_error",
      code: "MALFORMED_TEXT",
      error: "bad text"
    });
  });

  it("stringifies non-errors", () => {
    expect(buildErrorLog("boom")).toMatchObject({ code: undefined, error: "boom" });
  });
});

describe("toPrettyLine", () => {
  it("formats command entries on one line", () => {
    const entry = buildCommandLog({ command: "compare", mode: "path", inputs: 2, duration_ms: 1 });
    expect(toPrettyLine(entry)).toBe("INFO compare mode=path inputs=2 (1ms)");
  });

  it("formats errors with their code", () => {
    expect(toPrettyLine({ level: "error", msg: "command_error", error: "x" })).toBe(
      'ERROR command failed code=UNKNOWN error="x"'
    );
  });

  it("sorts extra fields for other messages", () => {
    expect(toPrettyLine({ level: "info", msg: "loaded", b: 2, a: "x" })).toBe(
      'INFO loaded a="x" b=2'
    );
  });
});

describe("log", () => {
  it("is silent under tests unless a level is set", () => {
    vi.stubEnv("LOG_LEVEL", "");
    expect(shouldLog("error")).toBe(false);
    vi.stubEnv("LOG_LEVEL", "error");
    expect(shouldLog("error")).toBe(true);
    expect(shouldLog("info")).toBe(false);
  });

  it("writes JSON when asked to", () => {
    vi.stubEnv("LOG_LEVEL", "info");
    vi.stubEnv("LOG_FORMAT", "json");
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    log({ level: "info", msg: "hello", n: 1 });
    expect(spy).toHaveBeenCalledWith('{"level":"info","msg":"hello","n":1}');
  });
});
