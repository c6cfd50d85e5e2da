type Level = "info" | "error";

export type LogEntry = {
  level: Level;
  msg: string;
  [key: string]: unknown;
};

type LogLevelSetting = "silent" | "error" | "info";

function isTestRuntime(): boolean {
  return (
    process.env.NODE_ENV === "test" ||
    process.env.VITEST === "true" ||
    typeof process.env.VITEST_WORKER_ID === "string"
  );
}

function getConfiguredLevel(): LogLevelSetting {
  const raw = String(process.env.LOG_LEVEL || "").toLowerCase();
  if (raw === "silent" || raw === "error" || raw === "info") return raw;
  if (isTestRuntime()) return "silent";
  return "info";
}

export function shouldLog(entryLevel: Level): boolean {
  const configured = getConfiguredLevel();
  if (configured === "silent") return false;
  if (configured === "error") return entryLevel === "error";
  return true;
}

function wantsPrettyOutput(): boolean {
  const raw = String(process.env.LOG_FORMAT || "").toLowerCase();
  if (raw === "json") return false;
  if (raw === "pretty") return true;
  return isTestRuntime();
}

function formatKeyValue(key: string, value: unknown): string {
  if (value === undefined) return "";
  if (value === null) return `${key}=null`;
  if (typeof value === "string") return `${key}="${value}"`;
  if (typeof value === "number" || typeof value === "boolean") return `${key}=${value}`;
  try {
    return `${key}=${JSON.stringify(value)}`;
  } catch {
    return `${key}=[unserializable]`;
  }
}

export function toPrettyLine(entry: LogEntry): string {
  const { level, msg, ...rest } = entry;

  if (msg === "command") {
    const command = rest.command ? String(rest.command) : "?";
    const mode = rest.mode ? String(rest.mode) : "?";
    const inputs = typeof rest.inputs === "number" ? rest.inputs : "?";
    const duration =
      typeof rest.duration_ms === "number" ? `${rest.duration_ms}ms` : "?ms";
    return `${level.toUpperCase()} ${command} mode=${mode} inputs=${inputs} (${duration})`;
  }

  if (msg === "command_error") {
    const code = rest.code ? String(rest.code) : "UNKNOWN";
    const error = rest.error ? String(rest.error) : "Unknown error";
    return `${level.toUpperCase()} command failed code=${code} error="${error}"`;
  }

  const extras = Object.keys(rest)
    .sort()
    .map((k) => formatKeyValue(k, rest[k]))
    .filter(Boolean)
    .join(" ");
  return `${level.toUpperCase()} ${msg}${extras ? ` ${extras}` : ""}`;
}

export function log(entry: LogEntry) {
  if (!shouldLog(entry.level)) return;
  // eslint-disable-next-line no-console
  console.log(wantsPrettyOutput() ? toPrettyLine(entry) : JSON.stringify(entry));
}

export function buildCommandLog(input: {
  command: string;
  mode: string;
  inputs: number;
  duration_ms: number;
}): LogEntry {
  return {
    level: "info",
    msg: "command",
    command: input.command,
    mode: input.mode,
    inputs: input.inputs,
    duration_ms: input.duration_ms
  };
}

export function buildErrorLog(err: unknown): LogEntry {
  const code =
    err && typeof err === "object" && "code" in err && typeof err.code === "string"
      ? err.code
      : undefined;
  return {
    level: "error",
    msg: "command_error",
    code,
    error: err instanceof Error ? err.message : String(err)
  };
}
