import assert from "node:assert/strict";
import { existsSync } from "node:fs";
import { mkdtemp, readdir, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import { loadConfig } from "../config.js";
import { makeLogger } from "../logger.js";
import { runPipeline } from "../run.js";

test("runPipeline performs a dry run against the local store", async () => {
  const dir = await mkdtemp(join(tmpdir(), "speechline-run-"));
  const inputPath = join(dir, "input.txt");
  await writeFile(inputPath, "こんにちは\n\nありがとう\n", "utf8");
  const config = loadConfig({
    SPEECHLINE_DRY_RUN: "1",
    SPEECHLINE_BUCKET: "test-bucket",
    INPUT_PATH: inputPath,
    OUTPUT_PATH: join(dir, "translated_text.txt"),
    STAGING_DIR: join(dir, "staging"),
    LOCAL_STORE_DIR: join(dir, "store"),
    TRANSCRIPT_PUBLISH_KEY: "translated_text.txt",
  });
  let tick = 0;

  const report = await runPipeline(config, makeLogger("error", () => undefined), {
    clock: () => new Date(2024, 0, 2, 3, 4, 5 + tick++),
  });

  assert.equal(report.status, "completed");
  assert.equal(report.skippedBlank, 1);
  assert.deepEqual(
    report.records.map((record) => record.job?.jobName),
    ["transcription-job-20240102030406", "transcription-job-20240102030408"],
  );
  assert.deepEqual((await readdir(join(dir, "store", "test-bucket"))).sort(), [
    "audioFile-20240102030405-output.mp3",
    "audioFile-20240102030407-output.mp3",
    "translated_text.txt",
  ]);
  assert.equal(
    await readFile(join(dir, "store", "test-bucket", "audioFile-20240102030405-output.mp3"), "utf8"),
    "stub-audio:[en] こんにちは",
  );
  assert.equal(
    await readFile(join(dir, "store", "test-bucket", "translated_text.txt"), "utf8"),
    "[en] こんにちは\n[en] ありがとう\n",
  );
  assert.deepEqual(await readdir(join(dir, "staging")), []);
  assert.equal(existsSync(config.outputPath), false);
});

test("runPipeline reports a missing input file as an io failure", async () => {
  const dir = await mkdtemp(join(tmpdir(), "speechline-run-"));
  const config = loadConfig({
    SPEECHLINE_DRY_RUN: "1",
    INPUT_PATH: join(dir, "missing.txt"),
    OUTPUT_PATH: join(dir, "translated_text.txt"),
    LOCAL_STORE_DIR: join(dir, "store"),
  });

  const report = await runPipeline(config, makeLogger("error", () => undefined));

  assert.equal(report.status, "failed");
  assert.equal(report.failure?.stage, "io");
  assert.deepEqual(report.records, []);
  assert.equal(existsSync(config.outputPath), false);
});
