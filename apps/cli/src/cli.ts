import {
  CanonicalString,
  type CanonicalPolicy,
  type Canonicalizer,
  createCanonicalizer
} from "@canonical-text/core";
import type { CliConfig } from "./config/env.js";
import { buildCommandLog, log } from "./logger.js";

export const commands = ["normalize", "compare", "sort"] as const;
export type CommandName = (typeof commands)[number];

const knownFlags = ["caseless", "path", "json", "unique"] as const;
type Flag = (typeof knownFlags)[number];

export type ParsedArgs = {
  command: CommandName;
  flags: ReadonlySet<Flag>;
  positionals: string[];
};

export type CliIo = {
  out: (line: string) => void;
  err: (line: string) => void;
};

export const usage = [
  "Usage:",
  "  canon normalize [--caseless] [--path] [--json] <text>",
  "  canon compare [--caseless] [--path] <a> <b>",
  "  canon sort [--caseless] [--path] [--unique] <text...>"
].join("\n");

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function isCommand(value: string): value is CommandName {
  return (commands as readonly string[]).includes(value);
}

function isFlag(value: string): value is Flag {
  return (knownFlags as readonly string[]).includes(value);
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const [command, ...rest] = argv;
  if (!command || !isCommand(command)) {
    throw new UsageError(command ? `Unknown command: ${command}` : "Missing command");
  }

  const flags = new Set<Flag>();
  const positionals: string[] = [];
  let flagsDone = false;
  for (const arg of rest) {
    if (!flagsDone && arg === "--") {
      flagsDone = true;
      continue;
    }
    if (!flagsDone && arg.startsWith("--")) {
      const name = arg.slice(2);
      if (!isFlag(name)) throw new UsageError(`Unknown flag: ${arg}`);
      flags.add(name);
      continue;
    }
    positionals.push(arg);
  }
  return { command, flags, positionals };
}

export function resolvePolicy(args: ParsedArgs, config: CliConfig): CanonicalPolicy {
  return {
    caseless: args.flags.has("caseless") || config.defaultMode === "caseless",
    path: args.flags.has("path")
  };
}

function describePolicy(policy: CanonicalPolicy): string {
  if (policy.caseless) return policy.path ? "caseless-path" : "caseless";
  return policy.path ? "path" : "text";
}

export function formatCodePoint(cp: number): string {
  return `U+${cp.toString(16).toUpperCase().padStart(4, "0")}`;
}

function expectCount(args: ParsedArgs, count: number) {
  if (args.positionals.length !== count) {
    throw new UsageError(
      `${args.command} takes ${count} argument${count === 1 ? "" : "s"}, received ${args.positionals.length}`
    );
  }
}

function execute(
  args: ParsedArgs,
  canonicalizer: Canonicalizer,
  policy: CanonicalPolicy
): string[] {
  const canonical = (text: string) => CanonicalString.create(text, policy, canonicalizer);

  switch (args.command) {
    case "normalize": {
      expectCount(args, 1);
      const value = canonical(args.positionals[0] ?? "");
      if (!args.flags.has("json")) return [value.asText()];
      return [
        JSON.stringify({
          text: value.asText(),
          codePoints: value.codePoints().map(formatCodePoint),
          sha256: value.digest()
        })
      ];
    }
    case "compare": {
      expectCount(args, 2);
      const [a, b] = args.positionals.map(canonical);
      if (!a || !b) return [];
      const order = a.compareTo(b);
      return [order === 0 ? "equal" : order < 0 ? "less" : "greater"];
    }
    case "sort": {
      if (args.positionals.length === 0) {
        throw new UsageError("sort takes at least one argument");
      }
      const sorted = args.positionals.map(canonical).sort(CanonicalString.compare);
      const kept = args.flags.has("unique")
        ? sorted.filter((value, i) => i === 0 || !value.equals(sorted[i - 1] ?? ""))
        : sorted;
      return kept.map((value) => value.asText());
    }
  }
}

/** Runs one command and returns the process exit code. */
export function runCli(argv: readonly string[], config: CliConfig, io: CliIo): number {
  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    io.err(`${err.message}\n${usage}`);
    return 2;
  }

  const started = Date.now();
  const policy = resolvePolicy(args, config);
  const canonicalizer = createCanonicalizer({ fastPath: config.fastPath });

  let lines: string[];
  try {
    lines = execute(args, canonicalizer, policy);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    io.err(`${err.message}\n${usage}`);
    return 2;
  }

  lines.forEach((line) => io.out(line));
  log(
    buildCommandLog({
      command: args.command,
      mode: describePolicy(policy),
      inputs: args.positionals.length,
      duration_ms: Date.now() - started
    })
  );
  return 0;
}
