import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { loadRuntimeConfig, parsePageRanges } from "../runtimeConfig.js";

describe("loadRuntimeConfig", () => {
  it("falls back to mock mode without an API key", () => {
    const config = loadRuntimeConfig({});

    assert.equal(config.mode, "mock");
    assert.equal(config.pipeline.questionCount, 5);
    assert.deepEqual(config.pipeline.questionTypes, ["tf", "mcq"]);
    assert.equal(config.pipeline.pageFilter, null);
    assert.equal(config.quality.quoteMinChars, 20);
  });

  it("uses live mode when a key is present", () => {
    const config = loadRuntimeConfig({ AI_GATEWAY_API_KEY: "test-key" });
    assert.equal(config.mode, "live");
    assert.equal(config.gatewayApiKey, "test-key");
  });

  it("rejects live mode without a key", () => {
    assert.throws(() => loadRuntimeConfig({ GROUNDQUIZ_AGENT_MODE: "live" }), /AI_GATEWAY_API_KEY is required/);
  });

  it("reads pipeline settings and question types", () => {
    const config = loadRuntimeConfig({
      GROUNDQUIZ_QUESTION_COUNT: "8",
      GROUNDQUIZ_QUESTION_TYPES: "short, calc, short",
      GROUNDQUIZ_PAGES: "3-1,7",
      GROUNDQUIZ_CHAPTER: " 第2章 ",
      GROUNDQUIZ_MAX_PAGES: "4",
      GROUNDQUIZ_EMBED_CACHE: "off"
    });

    assert.equal(config.pipeline.questionCount, 8);
    assert.deepEqual(config.pipeline.questionTypes, ["short", "calc"]);
    assert.deepEqual(config.pipeline.pageFilter, [1, 2, 3, 7]);
    assert.equal(config.pipeline.chapterFilter, "第2章");
    assert.equal(config.pipeline.maxPages, 4);
    assert.equal(config.pipeline.embedCacheEnabled, false);
  });

  it("throws on invalid values", () => {
    assert.throws(() => loadRuntimeConfig({ GROUNDQUIZ_QUESTION_COUNT: "zero" }), /GROUNDQUIZ_QUESTION_COUNT/);
    assert.throws(() => loadRuntimeConfig({ GROUNDQUIZ_QUESTION_TYPES: "essay" }), /question types/);
    assert.throws(() => loadRuntimeConfig({ GROUNDQUIZ_QUOTE_MIN_ALLOWED_RATIO: "1.5" }), /ratio/);
    assert.throws(() => loadRuntimeConfig({ GROUNDQUIZ_EMBED_CACHE: "maybe" }), /boolean/);
    assert.throws(() => loadRuntimeConfig({ GROUNDQUIZ_QUESTION_COUNT: "2.5" }), {
      message: "GROUNDQUIZ_QUESTION_COUNT must be a whole number. Received: 2.5"
    });
    assert.throws(() => loadRuntimeConfig({ GROUNDQUIZ_MAP_CONCURRENCY: "1.5" }), /GROUNDQUIZ_MAP_CONCURRENCY must be a whole number/);
    assert.equal(loadRuntimeConfig({ GROUNDQUIZ_TEMPERATURE: "0.7" }).temperature, 0.7);
  });

  it("returns a frozen configuration", () => {
    const config = loadRuntimeConfig({});
    assert.ok(Object.isFrozen(config));
    assert.ok(Object.isFrozen(config.pipeline));
    assert.ok(Object.isFrozen(config.quality));
  });
});

describe("parsePageRanges", () => {
  it("skips malformed parts", () => {
    assert.deepEqual(parsePageRanges("5, x, 2-3,,"), [2, 3, 5]);
  });

  it("treats an empty value as no filter", () => {
    assert.equal(parsePageRanges(""), null);
    assert.equal(parsePageRanges("abc"), null);
    assert.equal(parsePageRanges(undefined), null);
  });
});
