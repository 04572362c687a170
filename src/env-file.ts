import { readFile } from "node:fs/promises";

export type EnvMap = Record<string, string>;

const KEY_PATTERN = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=(.*)$/;

export function parseEnvFile(text: string): EnvMap {
  const out: EnvMap = {};

  for (const line of text.split(/\r?\n/)) {
    if (line.trimStart().startsWith("#")) continue;
    const match = line.match(KEY_PATTERN);
    if (!match) continue;
    out[match[1]] = parseValue(match[2] ?? "");
  }

  return out;
}

function parseValue(raw: string): string {
  const trimmed = raw.trim();
  if (
    trimmed.length >= 2 &&
    ((trimmed.startsWith('"') && trimmed.endsWith('"')) ||
      (trimmed.startsWith("'") && trimmed.endsWith("'")))
  ) {
    return trimmed.slice(1, -1);
  }
  const comment = trimmed.search(/\s#/);
  return comment === -1 ? trimmed : trimmed.slice(0, comment).trimEnd();
}

/**
 * Reads an env file and overlays `env` on top, so variables already set in
 * the process win. A missing file is only an error when `required` is set.
 */
export async function loadEnvFile(
  path: string,
  env: NodeJS.ProcessEnv,
  required = false,
): Promise<NodeJS.ProcessEnv> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (!required && error instanceof Error && "code" in error && error.code === "ENOENT") {
      return { ...env };
    }
    throw error;
  }
  return { ...parseEnvFile(text), ...env };
}
