import assert from "node:assert/strict";
import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import { loadEnvFile, parseEnvFile } from "../env-file.js";

test("parseEnvFile reads plain, quoted, exported and commented values", () => {
  const parsed = parseEnvFile(
    [
      "SPEECHLINE_BUCKET=test-bucket",
      'POLLY_VOICE="Joanna"',
      "export AWS_REGION=us-west-2",
      "# SOURCE_LANGUAGE=fr",
      "TARGET_LANGUAGE=en # trailing note",
      "",
    ].join("\n"),
  );

  assert.deepEqual(parsed, {
    SPEECHLINE_BUCKET: "test-bucket",
    POLLY_VOICE: "Joanna",
    AWS_REGION: "us-west-2",
    TARGET_LANGUAGE: "en",
  });
});

test("loadEnvFile lets the process environment win over the file", async () => {
  const dir = await mkdtemp(join(tmpdir(), "speechline-env-"));
  const path = join(dir, ".env");
  await writeFile(path, "SPEECHLINE_BUCKET=from-file\nPOLLY_VOICE=Matthew\n");

  const env = await loadEnvFile(path, { SPEECHLINE_BUCKET: "from-env" });

  assert.equal(env.SPEECHLINE_BUCKET, "from-env");
  assert.equal(env.POLLY_VOICE, "Matthew");
});

test("loadEnvFile tolerates a missing optional file but not a required one", async () => {
  const dir = await mkdtemp(join(tmpdir(), "speechline-env-"));
  const path = join(dir, ".env");

  assert.deepEqual(await loadEnvFile(path, { LOG_LEVEL: "debug" }), { LOG_LEVEL: "debug" });
  await assert.rejects(loadEnvFile(path, {}, true), /ENOENT/);
});
