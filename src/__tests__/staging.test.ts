import assert from "node:assert/strict";
import { existsSync } from "node:fs";
import { mkdtemp, readdir, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import { IoError, SynthesisError } from "../domain/errors.js";
import { makeLogger } from "../logger.js";
import { StagingArea } from "../pipeline/staging.js";

const logger = makeLogger("error", () => undefined);

async function* chunks(...parts: string[]): AsyncGenerator<Uint8Array> {
  for (const part of parts) yield Buffer.from(part);
}

test("materialize drains the stream so the bytes can be read back", async () => {
  const dir = join(await mkdtemp(join(tmpdir(), "speechline-staging-")), "audio");
  const staging = new StagingArea(dir, logger);

  const file = await staging.materialize("clip.mp3", chunks("ab", "cd", "ef"));

  assert.equal(file.path, join(dir, "clip.mp3"));
  assert.equal(file.sizeBytes, 6);
  assert.equal((await staging.read(file)).toString("utf8"), "abcdef");
  assert.equal((await staging.read(file)).toString("utf8"), "abcdef");
});

test("release deletes the staged file", async () => {
  const dir = await mkdtemp(join(tmpdir(), "speechline-staging-"));
  const staging = new StagingArea(dir, logger);
  const file = await staging.materialize("clip.mp3", chunks("x"));

  assert.equal(await staging.release(file), undefined);
  assert.equal(existsSync(file.path), false);
});

test("release reports a failed deletion instead of throwing", async () => {
  const dir = await mkdtemp(join(tmpdir(), "speechline-staging-"));
  const staging = new StagingArea(dir, logger);
  const file = await staging.materialize("clip.mp3", chunks("x"));
  await staging.release(file);

  assert.match((await staging.release(file)) ?? "", /ENOENT/);
});

test("a source stream that breaks mid-way is a synthesis failure and leaves no partial file", async () => {
  const dir = await mkdtemp(join(tmpdir(), "speechline-staging-"));
  const staging = new StagingArea(dir, logger);
  async function* broken(): AsyncGenerator<Uint8Array> {
    yield Buffer.from("partial");
    throw new Error("connection reset");
  }

  await assert.rejects(staging.materialize("clip.mp3", broken()), (error: unknown) => {
    assert.ok(error instanceof SynthesisError);
    assert.equal(error.stage, "synthesize");
    assert.equal(error.message, "audio stream broke while draining: connection reset");
    return true;
  });
  assert.deepEqual(await readdir(dir), []);
});

test("a local write failure stays an io failure", async () => {
  const root = await mkdtemp(join(tmpdir(), "speechline-staging-"));
  const blocker = join(root, "not-a-dir");
  await writeFile(blocker, "x");
  const staging = new StagingArea(blocker, logger);

  await assert.rejects(staging.materialize("clip.mp3", chunks("x")), (error: unknown) => {
    assert.ok(error instanceof IoError);
    assert.equal(error.stage, "io");
    assert.match(error.message, /^failed to stage audio at .*clip\.mp3: EEXIST/);
    return true;
  });
});
