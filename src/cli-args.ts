export type ParsedFlags = { flags: Record<string, string>; extras: string[] };

// Switches that never take a value from the following argument.
const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(["dry-run"]);

export function parseFlags(args: string[]): ParsedFlags {
  const flags: Record<string, string> = {};
  const extras: string[] = [];

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg.startsWith("--")) {
      extras.push(arg);
      continue;
    }

    const [key, maybeValue] = arg.slice(2).split("=", 2);
    if (maybeValue !== undefined) {
      flags[key] = maybeValue;
      continue;
    }

    const next = args[i + 1];
    if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith("--")) {
      flags[key] = next;
      i += 1;
    } else {
      flags[key] = "1";
    }
  }

  return { flags, extras };
}

/** Maps CLI flags onto the environment variables `loadConfig` reads. */
export function flagsToEnv(flags: Record<string, string>): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {};
  if (flags.input) env.INPUT_PATH = flags.input;
  if (flags.output) env.OUTPUT_PATH = flags.output;
  if (flags.bucket) env.SPEECHLINE_BUCKET = flags.bucket;
  if (flags["dry-run"]) env.SPEECHLINE_DRY_RUN = "1";
  if (flags["log-level"]) env.LOG_LEVEL = flags["log-level"];
  return env;
}
