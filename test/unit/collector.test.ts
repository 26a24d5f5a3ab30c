import assert from "node:assert/strict";
import { test } from "node:test";

import {
  collectImageOccurrences,
  collectImageOccurrencesByFile,
  collectReferenceOccurrences,
  extractReferenceCssProperty,
  mergeImageOccurrences,
  mergeReferenceOccurrences,
  toDirectiveMap,
} from "../../src/sprites/collector.js";
import { createTestLog, messageTypes } from "../helpers/images.js";
import { createMemoryResources } from "../helpers/memory-resources.js";

const STYLE_CSS = [
  "/** sprite: icons; sprite-image: url('../img/icons.png'); */",
  ".a { background-image: url(../img/a.png); /** sprite-ref: icons; */ }",
  ".b {",
  '  background-image: url("../img/b.png") !important;',
  "  /** sprite-ref: icons; sprite-alignment: right; */",
  "}",
].join("\n");

test("collectImageOccurrences records directives with 1-based lines", () => {
  const resources = createMemoryResources({ "/site/css/style.css": STYLE_CSS });
  const { log, sink } = createTestLog();

  const occurrences = collectImageOccurrences(
    "/site/css/style.css",
    resources,
    log,
  );

  assert.equal(occurrences.length, 1);
  assert.equal(occurrences[0].line, 1);
  assert.equal(occurrences[0].directive.spriteId, "icons");
  assert.equal(occurrences[0].directive.imagePath, "../img/icons.png");
  assert.deepEqual(messageTypes(sink, "info"), [
    "READING_SPRITE_IMAGE_DIRECTIVES",
  ]);
});

test("collectReferenceOccurrences handles same-line and dual-line references", () => {
  const resources = createMemoryResources({ "/site/css/style.css": STYLE_CSS });
  const { log, sink } = createTestLog();
  const images = collectImageOccurrencesByFile(
    ["/site/css/style.css"],
    resources,
    log,
  );
  const directives = toDirectiveMap(mergeImageOccurrences(images, log));

  const references = collectReferenceOccurrences(
    "/site/css/style.css",
    directives,
    resources,
    log,
  );

  assert.equal(references.length, 2);
  assert.deepEqual(
    references.map((reference) => ({
      imagePath: reference.imagePath,
      line: reference.line,
      important: reference.important,
      dualLine: reference.dualLine,
      alignment: reference.directive.alignment,
    })),
    [
      {
        imagePath: "/site/img/a.png",
        line: 2,
        important: false,
        dualLine: false,
        alignment: "left",
      },
      {
        imagePath: "/site/img/b.png",
        line: 4,
        important: true,
        dualLine: true,
        alignment: "right",
      },
    ],
  );
  assert.deepEqual(messageTypes(sink, "warning"), []);
});

test("extractReferenceCssProperty warns about both lines when neither has a declaration", () => {
  const { log, sink } = createTestLog();

  const extracted = extractReferenceCssProperty(
    "/** sprite-ref: icons; */",
    "}",
    log,
    { cssPath: "a.css", line: 10 },
  );

  assert.equal(extracted, undefined);
  assert.deepEqual(
    sink.messages.map((message) => [message.type, message.line, message.args]),
    [
      ["NO_BACKGROUND_IMAGE_RULE_NEXT_TO_SPRITE_REFERENCE_DIRECTIVE", 9, ["}"]],
      [
        "NO_BACKGROUND_IMAGE_RULE_NEXT_TO_SPRITE_REFERENCE_DIRECTIVE",
        10,
        ["/** sprite-ref: icons; */"],
      ],
    ],
  );
});

test("extractReferenceCssProperty rejects lines with other declarations", () => {
  const cases: Array<[string, string]> = [
    [
      "background-image: url(a.png); width: 3px; /** sprite-ref: icons; */",
      "MORE_THAN_ONE_RULE_NEXT_TO_SPRITE_REFERENCE_DIRECTIVE",
    ],
    [
      "background: url(a.png); /** sprite-ref: icons; */",
      "NO_BACKGROUND_IMAGE_RULE_NEXT_TO_SPRITE_REFERENCE_DIRECTIVE",
    ],
  ];

  for (const [line, expected] of cases) {
    const { log, sink } = createTestLog();

    assert.equal(extractReferenceCssProperty(line, undefined, log), undefined);
    assert.deepEqual(messageTypes(sink, "warning"), [expected]);
  }
});

test("extractReferenceCssProperty warns once on the first line of a file", () => {
  const { log, sink } = createTestLog();

  assert.equal(
    extractReferenceCssProperty("/** sprite-ref: icons; */", undefined, log),
    undefined,
  );
  assert.equal(sink.count("warning"), 1);
});

test("collectReferenceOccurrences does not borrow a declaration another reference owns", () => {
  const resources = createMemoryResources({
    "/site/style.css": [
      "/** sprite: icons; sprite-image: url(icons.png); */",
      ".a { background-image: url(a.png); /** sprite-ref: icons; */ }",
      "  /** sprite-ref: icons; sprite-alignment: right; */",
    ].join("\n"),
  });
  const { log, sink } = createTestLog();
  const directives = toDirectiveMap(
    mergeImageOccurrences(
      collectImageOccurrencesByFile(["/site/style.css"], resources, log),
      log,
    ),
  );

  const references = collectReferenceOccurrences(
    "/site/style.css",
    directives,
    resources,
    log,
  );

  assert.deepEqual(
    references.map((reference) => [reference.line, reference.dualLine]),
    [[2, false]],
  );
  assert.deepEqual(
    sink.ofLevel("warning").map((message) => [message.type, message.line]),
    [["NO_BACKGROUND_IMAGE_RULE_NEXT_TO_SPRITE_REFERENCE_DIRECTIVE", 3]],
  );
});

test("mergeImageOccurrences keeps the first definition of a sprite id", () => {
  const resources = createMemoryResources({
    "/site/a.css": "/** sprite: icons; sprite-image: url(first.png); */",
    "/site/b.css": "\n/** sprite: icons; sprite-image: url(second.png); */",
  });
  const { log, sink } = createTestLog();
  const byFile = collectImageOccurrencesByFile(
    ["/site/a.css", "/site/b.css"],
    resources,
    log,
  );

  const merged = mergeImageOccurrences(byFile, log);

  assert.equal(merged.get("icons")?.directive.imagePath, "first.png");
  const warnings = sink.ofLevel("warning");
  assert.equal(warnings.length, 1);
  assert.equal(warnings[0].type, "IGNORING_SPRITE_IMAGE_REDEFINITION");
  assert.equal(warnings[0].cssPath, "/site/b.css");
  assert.equal(warnings[0].line, 2);
});

test("mergeReferenceOccurrences groups references by sprite in scan order", () => {
  const resources = createMemoryResources({
    "/site/a.css": [
      "/** sprite: one; sprite-image: url(one.png); */",
      "/** sprite: two; sprite-image: url(two.png); */",
      ".x { background-image: url(x.png); /** sprite-ref: two; */ }",
    ].join("\n"),
    "/site/b.css": [
      ".y { background-image: url(y.png); /** sprite-ref: one; */ }",
      ".z { background-image: url(z.png); /** sprite-ref: two; */ }",
    ].join("\n"),
  });
  const { log } = createTestLog();
  const directives = toDirectiveMap(
    mergeImageOccurrences(
      collectImageOccurrencesByFile(["/site/a.css", "/site/b.css"], resources, log),
      log,
    ),
  );
  const byFile = new Map([
    ["/site/a.css", collectReferenceOccurrences("/site/a.css", directives, resources, log)],
    ["/site/b.css", collectReferenceOccurrences("/site/b.css", directives, resources, log)],
  ]);

  const grouped = mergeReferenceOccurrences(byFile);

  assert.deepEqual(Array.from(grouped.keys()), ["two", "one"]);
  assert.deepEqual(
    grouped.get("two")?.map((reference) => reference.imagePath),
    ["/site/x.png", "/site/z.png"],
  );
});
