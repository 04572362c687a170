import assert from "node:assert/strict";
import test from "node:test";
import { loadConfig } from "../config.js";

test("loadConfig applies reference defaults", () => {
  const config = loadConfig({ SPEECHLINE_BUCKET: "test-bucket" });

  assert.equal(config.awsRegion, "ap-northeast-1");
  assert.equal(config.bucket, "test-bucket");
  assert.equal(config.sourceLanguage, "ja");
  assert.equal(config.targetLanguage, "en");
  assert.equal(config.voice, "Joanna");
  assert.equal(config.audioFormat, "mp3");
  assert.equal(config.transcribeLanguage, "en-US");
  assert.equal(config.inputPath, "./input.txt");
  assert.equal(config.outputPath, "translated_text.txt");
  assert.equal(config.mediaUriScheme, "s3");
  assert.equal(config.translationProvider, "aws");
  assert.equal(config.ttsProvider, "polly");
  assert.equal(config.transcriptPublishKey, undefined);
  assert.equal(config.dryRun, false);
});

test("loadConfig requires a bucket outside dry runs", () => {
  assert.throws(() => loadConfig({}), /Invalid SPEECHLINE_BUCKET/);
  assert.throws(() => loadConfig({ SPEECHLINE_BUCKET: "  " }), /Invalid SPEECHLINE_BUCKET/);
});

test("loadConfig supplies a placeholder bucket for dry runs", () => {
  const config = loadConfig({ SPEECHLINE_DRY_RUN: "1" });

  assert.equal(config.dryRun, true);
  assert.equal(config.bucket, "speechline-dry-run");
});

test("loadConfig rejects unknown enum values", () => {
  assert.throws(
    () => loadConfig({ SPEECHLINE_BUCKET: "b", AUDIO_FORMAT: "wav" }),
    /Invalid AUDIO_FORMAT: wav \(expected one of mp3, ogg_vorbis\)/,
  );
  assert.throws(() => loadConfig({ SPEECHLINE_BUCKET: "b", LOG_LEVEL: "trace" }), /Invalid LOG_LEVEL/);
  assert.throws(() => loadConfig({ SPEECHLINE_BUCKET: "b", TTS_PROVIDER: "azure" }), /Invalid TTS_PROVIDER/);
});

test("loadConfig requires a google key when a google provider is selected", () => {
  assert.throws(
    () => loadConfig({ SPEECHLINE_BUCKET: "b", TRANSLATION_PROVIDER: "google" }),
    /Invalid GOOGLE_CLOUD_API_KEY/,
  );

  const config = loadConfig({
    SPEECHLINE_BUCKET: "b",
    TTS_PROVIDER: "google",
    GOOGLE_CLOUD_API_KEY: "test-key",
  });
  assert.equal(config.googleCloudApiKey, "test-key");
  assert.equal(config.googleTtsVoice, "en-US-Standard-C");
});

test("loadConfig reads naming and publish overrides", () => {
  const config = loadConfig({
    SPEECHLINE_BUCKET: "b",
    AUDIO_NAME_PREFIX: "speech",
    AUDIO_NAME_SUFFIX: "ja-en",
    JOB_NAME_PREFIX: "job",
    TRANSCRIPT_PUBLISH_KEY: "transcripts/out.txt",
  });

  assert.equal(config.audioNamePrefix, "speech");
  assert.equal(config.audioNameSuffix, "ja-en");
  assert.equal(config.jobNamePrefix, "job");
  assert.equal(config.transcriptPublishKey, "transcripts/out.txt");
});
