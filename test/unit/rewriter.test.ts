import assert from "node:assert/strict";
import { test } from "node:test";

import {
  buildSpriteDeclarations,
  rewriteStylesheet,
} from "../../src/sprites/rewriter.js";
import type {
  SpriteReferenceOccurrence,
  SpriteReferenceReplacement,
} from "../../src/sprites/types.js";

const occurrence = (
  line: number,
  important = false,
): SpriteReferenceOccurrence => ({
  directive: {
    spriteRef: "icons",
    alignment: "left",
    margins: { top: 0, right: 0, bottom: 0, left: 0 },
  },
  imagePath: "/site/img/a.png",
  cssPath: "/site/css/style.css",
  line,
  important,
  dualLine: false,
});

const replacement = (
  line: number,
  verticalPosition: number,
  options: { important?: boolean; includeDimensions?: boolean } = {},
): SpriteReferenceReplacement => ({
  spriteId: "icons",
  occurrence: occurrence(line, options.important),
  horizontalPosition: "left",
  verticalPosition,
  imageWidth: 16,
  imageHeight: 12,
  includeDimensions: options.includeDimensions ?? false,
});

test("buildSpriteDeclarations carries importance and dimensions", () => {
  assert.equal(
    buildSpriteDeclarations({
      replacement: replacement(1, 12, { important: true, includeDimensions: true }),
      spriteUrl: "../img/icons.png?abc",
    }),
    "background-image: url('../img/icons.png?abc') !important; " +
      "background-position: left -12px !important; " +
      "width: 16px !important; height: 12px !important;",
  );
});

test("rewriteStylesheet replaces declarations and drops directive comments", () => {
  const css = [
    "/** sprite: icons; sprite-image: url('../img/icons.png'); */",
    ".a { background-image: url(../img/a.png); /** sprite-ref: icons; */ }",
    ".b {",
    "  background-image: url('../img/b.png') !important;",
    "  /** sprite-ref: icons; */",
    "",
    "  color: red;",
    "}",
  ].join("\n");

  const rewritten = rewriteStylesheet(css, [
    { replacement: replacement(2, 0), spriteUrl: "../img/icons.png" },
    {
      replacement: replacement(4, 12, { important: true }),
      spriteUrl: "../img/icons.png",
    },
  ]);

  assert.equal(
    rewritten,
    [
      ".a { background-image: url('../img/icons.png'); background-position: left 0; }",
      ".b {",
      "  background-image: url('../img/icons.png') !important; background-position: left -12px !important;",
      "",
      "  color: red;",
      "}",
    ].join("\n"),
  );
});

test("rewriteStylesheet leaves lines without a replacement untouched", () => {
  const css = ".x { background-image: url(x.png); }\n  ";

  assert.equal(rewriteStylesheet(css, []), css);
});
