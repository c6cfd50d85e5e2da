import "dotenv/config";

import { runCli } from "./cli.js";
import { loadConfig } from "./config/env.js";
import { buildErrorLog, log } from "./logger.js";

function main() {
  const config = loadConfig();
  process.exitCode = runCli(process.argv.slice(2), config, {
    // eslint-disable-next-line no-console
    out: (line) => console.log(line),
    // eslint-disable-next-line no-console
    err: (line) => console.error(line)
  });
}

try {
  main();
} catch (err) {
  log(buildErrorLog(err));
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
}
