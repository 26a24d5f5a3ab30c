import assert from "node:assert/strict";
import { test } from "node:test";

import {
  MessageLog,
  MemoryMessageSink,
  createConsoleSink,
  errorMessage,
  formatMessage,
  isLevelEnabled,
} from "../../src/sprites/messages.js";
import type { Message } from "../../src/sprites/messages.js";

const malformedUrl: Message = {
  level: "warning",
  type: "MALFORMED_URL",
  args: ["none"],
  cssPath: "css/style.css",
  line: 3,
};

test("formatMessage prefixes the location it has", () => {
  assert.equal(formatMessage(malformedUrl), "css/style.css:3: Malformed URL: none");
  assert.equal(
    formatMessage({ ...malformedUrl, line: undefined }),
    "css/style.css: Malformed URL: none",
  );
  assert.equal(
    formatMessage({ level: "info", type: "WRITING_CSS", args: ["out.css"] }),
    "Writing rewritten stylesheet out.css",
  );
});

test("formatMessage fills placeholders in order", () => {
  assert.equal(
    formatMessage({
      level: "warning",
      type: "UNSUPPORTED_ALIGNMENT_FOR_LAYOUT",
      args: ["left", "horizontal", "top"],
    }),
    "Alignment left is not supported in horizontal sprites, using top",
  );
});

test("MessageLog fans messages out to every sink", () => {
  const first = new MemoryMessageSink();
  const second = new MemoryMessageSink();
  const log = new MessageLog(first, second);

  log.info("READING_SPRITE_IMAGE_DIRECTIVES", {}, "a.css");
  log.warning("SPRITE_ID_NOT_FOUND", { cssPath: "a.css", line: 2 });

  assert.equal(first.messages.length, 2);
  assert.deepEqual(second.messages[1], {
    level: "warning",
    type: "SPRITE_ID_NOT_FOUND",
    args: [],
    cssPath: "a.css",
    line: 2,
  });
  assert.equal(first.count("warning"), 1);
});

test("isLevelEnabled orders debug below info below warning", () => {
  assert.equal(isLevelEnabled("debug", "info"), false);
  assert.equal(isLevelEnabled("info", "info"), true);
  assert.equal(isLevelEnabled("warning", "debug"), true);
});

test("createConsoleSink filters by level and routes warnings to stderr", (t) => {
  const log = t.mock.method(console, "log", () => undefined);
  const warn = t.mock.method(console, "warn", () => undefined);
  const sink = createConsoleSink("info");

  sink.add({ level: "debug", type: "WRITING_CSS", args: ["x.css"] });
  sink.add({ level: "info", type: "WRITING_CSS", args: ["x.css"] });
  sink.add(malformedUrl);

  assert.equal(log.mock.callCount(), 1);
  assert.deepEqual(log.mock.calls[0].arguments, [
    "ℹ️ Writing rewritten stylesheet x.css",
  ]);
  assert.deepEqual(warn.mock.calls[0].arguments, [
    "⚠️ css/style.css:3: Malformed URL: none",
  ]);
});

test("errorMessage reads errors and other thrown values", () => {
  assert.equal(errorMessage(new Error("boom")), "boom");
  assert.equal(errorMessage("plain"), "plain");
});
