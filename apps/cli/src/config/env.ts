export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const defaultModes = ["text", "caseless"] as const;
export type DefaultMode = (typeof defaultModes)[number];

export type CliConfig = {
  defaultMode: DefaultMode;
  fastPath: boolean;
};

function isDefaultMode(value: string): value is DefaultMode {
  return (defaultModes as readonly string[]).includes(value);
}

function parseDefaultMode(value: string | undefined): DefaultMode {
  if (value === undefined || value.trim() === "") return "text";
  const normalized = value.trim().toLowerCase();
  if (isDefaultMode(normalized)) return normalized;
  throw new ConfigError(
    `CANON_DEFAULT_MODE must be one of ${defaultModes.join(", ")}, received: ${value}`
  );
}

function parseOptionalBool(key: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") return fallback;
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) return true;
  if (["false", "0", "no", "off"].includes(normalized)) return false;
  throw new ConfigError(`${key} must be a boolean (true/false), received: ${value}`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const defaultMode = parseDefaultMode(env.CANON_DEFAULT_MODE);
  const fastPath = parseOptionalBool("CANON_FAST_PATH", env.CANON_FAST_PATH, true);
  return { defaultMode, fastPath };
}
