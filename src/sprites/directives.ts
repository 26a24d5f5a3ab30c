import path from "node:path";
import { z } from "zod";

import { parseDeclarations, unpackUrl } from "./css-syntax.js";
import type { MessageLocation, MessageLog } from "./messages.js";
import type {
  CrossPlacement,
  RgbColor,
  SpriteAlignment,
  SpriteImageDirective,
  SpriteImageFormat,
  SpriteLayout,
  SpriteMargins,
  SpriteReferenceDirective,
} from "./types.js";

const layoutSchema = z.enum(["vertical", "horizontal"]);
const uidTypeSchema = z.enum(["none", "date", "md5"]);
const formatSchema = z.enum(["png", "gif", "jpg", "webp"]);
const alignmentSchema = z.enum([
  "left",
  "right",
  "top",
  "bottom",
  "center",
  "repeat",
]);
const booleanSchema = z
  .enum(["true", "false"])
  .transform((value) => value === "true");
const marginSchema = z
  .string()
  .regex(/^\d+(px)?$/i)
  .transform((value) => Number.parseInt(value, 10));

const SPRITE_VARIABLE = /\$\{sprite\}/g;
const HEX_COLOR = /^#([0-9a-f]{3}|[0-9a-f]{6})$/i;

const IMAGE_DIRECTIVE_KEYS = new Set([
  "sprite",
  "sprite-image",
  "sprite-layout",
  "sprite-image-uid",
  "sprite-matte-color",
  "sprite-include-dimensions",
]);

const REFERENCE_DIRECTIVE_KEYS = new Set([
  "sprite-ref",
  "sprite-alignment",
  "sprite-margin",
  "sprite-margin-top",
  "sprite-margin-right",
  "sprite-margin-bottom",
  "sprite-margin-left",
]);

interface LayoutAlignmentRules {
  defaultAlignment: SpriteAlignment;
  placements: Partial<Record<SpriteAlignment, CrossPlacement>>;
}

/** How each alignment keyword reads in a sprite of the given layout. */
export const ALIGNMENT_RULES: Record<SpriteLayout, LayoutAlignmentRules> = {
  vertical: {
    defaultAlignment: "left",
    placements: {
      left: "start",
      right: "end",
      center: "center",
      repeat: "repeat",
    },
  },
  horizontal: {
    defaultAlignment: "top",
    placements: {
      top: "start",
      bottom: "end",
      center: "center",
      repeat: "repeat",
    },
  },
};

export const toCrossPlacement = (
  alignment: SpriteAlignment,
  layout: SpriteLayout,
): CrossPlacement => ALIGNMENT_RULES[layout].placements[alignment] ?? "start";

export const ZERO_MARGINS: Readonly<SpriteMargins> = {
  top: 0,
  right: 0,
  bottom: 0,
  left: 0,
};

const fromSchema =
  <S extends z.ZodTypeAny>(schema: S) =>
  (raw: string): z.output<S> | undefined => {
    const parsed = schema.safeParse(raw.trim().toLowerCase());
    return parsed.success ? parsed.data : undefined;
  };

const parseLayout = fromSchema(layoutSchema);
const parseUidType = fromSchema(uidTypeSchema);
const parseFormat = fromSchema(formatSchema);
const parseAlignment = fromSchema(alignmentSchema);
const parseBoolean = fromSchema(booleanSchema);
const parseMargin = fromSchema(marginSchema);

/** Directive text is a `key: value;` list; later keys override earlier ones. */
const toPropertyMap = (directiveText: string): Map<string, string> => {
  const properties = new Map<string, string>();
  for (const property of parseDeclarations(directiveText)) {
    properties.set(property.rule, property.value);
  }
  return properties;
};

const findUnsupportedKeys = (
  properties: Map<string, string>,
  supported: Set<string>,
): string[] => Array.from(properties.keys()).filter((key) => !supported.has(key));

const parseColor = (raw: string): RgbColor | undefined => {
  const match = HEX_COLOR.exec(raw.trim());
  if (!match) {
    return undefined;
  }

  const hex =
    match[1].length === 3
      ? Array.from(match[1], (digit) => `${digit}${digit}`).join("")
      : match[1];
  return {
    r: Number.parseInt(hex.slice(0, 2), 16),
    g: Number.parseInt(hex.slice(2, 4), 16),
    b: Number.parseInt(hex.slice(4, 6), 16),
  };
};

export const formatFromImagePath = (
  imagePath: string,
): SpriteImageFormat | undefined => {
  const withoutQuery = imagePath.replace(/[?#].*$/, "");
  const extension = path.posix.extname(withoutQuery).slice(1).toLowerCase();
  return parseFormat(extension === "jpeg" ? "jpg" : extension);
};

type Parsed<T> = { ok: true; value: T } | { ok: false };

/** Read an optional keyword property; unknown values warn and fail. */
const readOptional = <T>(
  properties: Map<string, string>,
  key: string,
  parse: (raw: string) => T | undefined,
  fallback: T,
  messageLog: MessageLog,
  location: MessageLocation,
): Parsed<T> => {
  const raw = properties.get(key);
  if (raw === undefined) {
    return { ok: true, value: fallback };
  }

  const value = parse(raw);
  if (value === undefined) {
    messageLog.warning("UNSUPPORTED_VALUE", location, key, raw);
    return { ok: false };
  }
  return { ok: true, value };
};

/**
 * Parse the text of a `sprite: ...` directive. Returns undefined after
 * emitting one warning when the directive cannot be used.
 */
export const parseImageDirective = (
  directiveText: string,
  messageLog: MessageLog,
  location: MessageLocation = {},
): SpriteImageDirective | undefined => {
  const properties = toPropertyMap(directiveText);

  const spriteId = properties.get("sprite");
  if (!spriteId) {
    messageLog.warning("SPRITE_ID_NOT_FOUND", location);
    return undefined;
  }

  const imageValue = properties.get("sprite-image");
  if (imageValue === undefined) {
    messageLog.warning("SPRITE_IMAGE_URL_NOT_FOUND", location);
    return undefined;
  }

  const imageUrl = unpackUrl(imageValue, messageLog, location);
  if (imageUrl === undefined) {
    return undefined;
  }

  const imagePath = imageUrl.replace(SPRITE_VARIABLE, spriteId);
  const format = formatFromImagePath(imagePath);
  if (format === undefined) {
    messageLog.warning("UNSUPPORTED_FORMAT", location, imagePath);
    return undefined;
  }

  const layout = readOptional(
    properties,
    "sprite-layout",
    parseLayout,
    "vertical",
    messageLog,
    location,
  );
  if (!layout.ok) {
    return undefined;
  }

  const uidType = readOptional(
    properties,
    "sprite-image-uid",
    parseUidType,
    "none",
    messageLog,
    location,
  );
  if (!uidType.ok) {
    return undefined;
  }

  const includeDimensions = readOptional(
    properties,
    "sprite-include-dimensions",
    parseBoolean,
    false,
    messageLog,
    location,
  );
  if (!includeDimensions.ok) {
    return undefined;
  }

  const matteRaw = properties.get("sprite-matte-color");
  const matteColor = matteRaw === undefined ? undefined : parseColor(matteRaw);
  if (matteRaw !== undefined && matteColor === undefined) {
    messageLog.warning("MALFORMED_COLOR", location, matteRaw);
    return undefined;
  }

  const unsupported = findUnsupportedKeys(properties, IMAGE_DIRECTIVE_KEYS);
  if (unsupported.length > 0) {
    messageLog.warning(
      "UNSUPPORTED_PROPERTIES_FOUND",
      location,
      unsupported.join(", "),
    );
  }

  return {
    spriteId,
    imagePath,
    layout: layout.value,
    format,
    uidType: uidType.value,
    includeDimensions: includeDimensions.value,
    ...(matteColor ? { matteColor } : {}),
  };
};

/** Expand a 1-4 value `sprite-margin` shorthand in CSS box order. */
const parseMarginShorthand = (raw: string): SpriteMargins | undefined => {
  const values = raw
    .trim()
    .split(/\s+/)
    .map((token) => parseMargin(token));
  if (values.length === 0 || values.length > 4) {
    return undefined;
  }

  const numbers: number[] = [];
  for (const value of values) {
    if (value === undefined) {
      return undefined;
    }
    numbers.push(value);
  }

  const [top, right = top, bottom = top, left = right] = numbers;
  return { top, right, bottom, left };
};

const MARGIN_SIDES = ["top", "right", "bottom", "left"] as const;

const parseMargins = (
  properties: Map<string, string>,
  messageLog: MessageLog,
  location: MessageLocation,
): SpriteMargins | undefined => {
  const margins: SpriteMargins = { ...ZERO_MARGINS };

  const shorthand = properties.get("sprite-margin");
  if (shorthand !== undefined) {
    const expanded = parseMarginShorthand(shorthand);
    if (!expanded) {
      messageLog.warning("INVALID_MARGIN", location, shorthand);
      return undefined;
    }
    Object.assign(margins, expanded);
  }

  for (const side of MARGIN_SIDES) {
    const raw = properties.get(`sprite-margin-${side}`);
    if (raw === undefined) {
      continue;
    }

    const value = parseMargin(raw);
    if (value === undefined) {
      messageLog.warning("INVALID_MARGIN", location, raw);
      return undefined;
    }
    margins[side] = value;
  }

  return margins;
};

/**
 * Parse the text of a `sprite-ref: ...` directive against the sprites
 * declared so far. Returns undefined after emitting one warning on failure.
 */
export const parseReferenceDirective = (
  directiveText: string,
  imageDirectives: ReadonlyMap<string, SpriteImageDirective>,
  messageLog: MessageLog,
  location: MessageLocation = {},
): SpriteReferenceDirective | undefined => {
  const properties = toPropertyMap(directiveText);

  const spriteRef = properties.get("sprite-ref");
  if (!spriteRef) {
    messageLog.warning("SPRITE_REF_NOT_FOUND", location);
    return undefined;
  }

  const imageDirective = imageDirectives.get(spriteRef);
  if (!imageDirective) {
    messageLog.warning("REFERENCED_SPRITE_NOT_FOUND", location, spriteRef);
    return undefined;
  }

  const rules = ALIGNMENT_RULES[imageDirective.layout];
  const alignment = readOptional(
    properties,
    "sprite-alignment",
    parseAlignment,
    rules.defaultAlignment,
    messageLog,
    location,
  );
  if (!alignment.ok) {
    return undefined;
  }

  const margins = parseMargins(properties, messageLog, location);
  if (!margins) {
    return undefined;
  }

  let effectiveAlignment = alignment.value;
  if (rules.placements[effectiveAlignment] === undefined) {
    messageLog.warning(
      "UNSUPPORTED_ALIGNMENT_FOR_LAYOUT",
      location,
      effectiveAlignment,
      imageDirective.layout,
      rules.defaultAlignment,
    );
    effectiveAlignment = rules.defaultAlignment;
  }

  const unsupported = findUnsupportedKeys(properties, REFERENCE_DIRECTIVE_KEYS);
  if (unsupported.length > 0) {
    messageLog.warning(
      "UNSUPPORTED_PROPERTIES_FOUND",
      location,
      unsupported.join(", "),
    );
  }

  return { spriteRef, alignment: effectiveAlignment, margins };
};

