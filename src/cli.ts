#!/usr/bin/env node

import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { flagsToEnv, parseFlags } from "./cli-args.js";
import { loadConfig } from "./config.js";
import { loadEnvFile } from "./env-file.js";
import { makeLogger } from "./logger.js";
import { runPipeline } from "./run.js";

async function handleRun(args: string[]): Promise<void> {
  const { flags } = parseFlags(args);
  const envPath = flags["env-path"];
  const baseEnv = await loadEnvFile(resolve(envPath ?? ".env"), process.env, envPath !== undefined);
  const config = loadConfig({ ...baseEnv, ...flagsToEnv(flags) });
  const logger = makeLogger(config.logLevel);

  const report = await runPipeline(config, logger);
  if (report.status === "failed" && report.failure) {
    die(`${report.failure.stage} failed: ${report.failure.message}`, false);
  }
  process.stdout.write(
    `[speechline] processed ${report.records.length} record(s), skipped ${report.skippedBlank} blank line(s)\n`,
  );
}

async function main(argv: string[]): Promise<void> {
  const [command, ...rest] = argv;
  if (command === "--version" || command === "-v" || command === "version") {
    process.stdout.write(`${cliVersion()}\n`);
    return;
  }
  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return;
  }

  switch (command) {
    case "run": {
      await handleRun(rest);
      return;
    }
    default: {
      die(`unknown command: ${command}`);
    }
  }
}

function die(message: string, usageHint = true): never {
  process.stderr.write(`[speechline] ${message}\n`);
  if (usageHint) process.stderr.write("[speechline] run `speechline help` for usage\n");
  process.exit(1);
}

function printHelp(): void {
  process.stdout.write(`speechline ${cliVersion()}\n\n`);
  process.stdout.write(`Usage:\n`);
  process.stdout.write(`  speechline run [--input PATH] [--output PATH] [--bucket NAME] [--env-path PATH]\n`);
  process.stdout.write(`                 [--dry-run] [--log-level debug|info|warn|error]\n`);
  process.stdout.write(`  speechline version\n\n`);
  process.stdout.write(`Each non-blank input line is translated, synthesized to speech, uploaded\n`);
  process.stdout.write(`to the bucket and submitted for transcription. The first failure stops the run.\n`);
  process.stdout.write(`Settings come from the environment (see .env.example); flags override them.\n`);
}

function cliVersion(): string {
  try {
    const pkgPath = resolve(dirname(fileURLToPath(import.meta.url)), "..", "package.json");
    const parsed = JSON.parse(readFileSync(pkgPath, "utf8")) as { version?: string };
    return parsed.version ?? "0.0.0";
  } catch {
    return "0.0.0";
  }
}

void main(process.argv.slice(2)).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  die(message, false);
});
