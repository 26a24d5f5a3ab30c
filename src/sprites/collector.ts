import { extractProperties, unpackUrl } from "./css-syntax.js";
import type { CssProperty } from "./css-syntax.js";
import { parseImageDirective, parseReferenceDirective } from "./directives.js";
import type { MessageLocation, MessageLog } from "./messages.js";
import type { ResourceHandler } from "./resources.js";
import type {
  SpriteImageDirective,
  SpriteImageOccurrence,
  SpriteReferenceOccurrence,
} from "./types.js";

const SPRITE_IMAGE_DIRECTIVE = /\/\*+\s+(sprite:[^*]*)\*+\//;
const SPRITE_REFERENCE_DIRECTIVE = /\/\*+\s+(sprite-ref:[^*]*)\*+\//;
const SPRITE_REFERENCE_DIRECTIVE_ALL = new RegExp(
  SPRITE_REFERENCE_DIRECTIVE.source,
  "g",
);
const DIRECTIVE_COMMENT_WITH_SPACING = new RegExp(
  `\\s*(?:${SPRITE_IMAGE_DIRECTIVE.source}|${SPRITE_REFERENCE_DIRECTIVE.source})`,
  "g",
);

export const splitLines = (text: string): string[] => text.split(/\r?\n/);

export const extractImageDirectiveString = (
  cssLine: string,
): string | undefined => SPRITE_IMAGE_DIRECTIVE.exec(cssLine)?.[1]?.trim();

export const extractReferenceDirectiveString = (
  cssLine: string,
): string | undefined => SPRITE_REFERENCE_DIRECTIVE.exec(cssLine)?.[1]?.trim();

export const stripReferenceDirectives = (cssLine: string): string =>
  cssLine.replace(SPRITE_REFERENCE_DIRECTIVE_ALL, "").trim();

/** Remove both kinds of directive comment with the whitespace before them. */
export const removeDirectiveComments = (cssLine: string): string =>
  cssLine.replace(DIRECTIVE_COMMENT_WITH_SPACING, "").trimEnd();

export interface ExtractedProperty {
  property: CssProperty;
  /** The declaration sat on the line before the directive. */
  dualLine: boolean;
}

/**
 * Find the single background-image declaration next to a sprite-ref
 * directive: on the directive's own line, or failing that on the line
 * immediately before it unless that line has a sprite-ref of its own.
 */
export const extractReferenceCssProperty = (
  cssLine: string,
  previousLine: string | undefined,
  messageLog: MessageLog,
  location: MessageLocation = {},
): ExtractedProperty | undefined => {
  let properties = extractProperties(stripReferenceDirectives(cssLine));
  let dualLine = false;

  if (properties.length === 0) {
    // A declaration already claimed by its own sprite-ref is not shared.
    if (
      previousLine === undefined ||
      extractReferenceDirectiveString(previousLine) !== undefined
    ) {
      messageLog.warning(
        "NO_BACKGROUND_IMAGE_RULE_NEXT_TO_SPRITE_REFERENCE_DIRECTIVE",
        location,
        cssLine,
      );
      return undefined;
    }

    properties = extractProperties(stripReferenceDirectives(previousLine));
    if (properties.length === 0) {
      const previousLocation =
        location.line === undefined
          ? location
          : { ...location, line: location.line - 1 };
      messageLog.warning(
        "NO_BACKGROUND_IMAGE_RULE_NEXT_TO_SPRITE_REFERENCE_DIRECTIVE",
        previousLocation,
        previousLine,
      );
      messageLog.warning(
        "NO_BACKGROUND_IMAGE_RULE_NEXT_TO_SPRITE_REFERENCE_DIRECTIVE",
        location,
        cssLine,
      );
      return undefined;
    }
    dualLine = true;
  }

  if (properties.length > 1) {
    messageLog.warning(
      "MORE_THAN_ONE_RULE_NEXT_TO_SPRITE_REFERENCE_DIRECTIVE",
      location,
      cssLine,
    );
    return undefined;
  }

  const [property] = properties;
  if (property.rule !== "background-image") {
    messageLog.warning(
      "NO_BACKGROUND_IMAGE_RULE_NEXT_TO_SPRITE_REFERENCE_DIRECTIVE",
      location,
      cssLine,
    );
    return undefined;
  }

  return { property, dualLine };
};

/** Collect the sprite image directives of one stylesheet. */
export const collectImageOccurrences = (
  cssPath: string,
  resources: ResourceHandler,
  messageLog: MessageLog,
): SpriteImageOccurrence[] => {
  messageLog.info("READING_SPRITE_IMAGE_DIRECTIVES", {}, cssPath);
  const lines = splitLines(resources.readText(cssPath));
  const occurrences: SpriteImageOccurrence[] = [];

  lines.forEach((cssLine, index) => {
    const line = index + 1;
    const directiveText = extractImageDirectiveString(cssLine);
    if (directiveText === undefined) {
      return;
    }

    const directive = parseImageDirective(directiveText, messageLog, {
      cssPath,
      line,
    });
    if (directive) {
      occurrences.push({ directive, cssPath, line });
    }
  });

  return occurrences;
};

/** Collect the sprite references of one stylesheet. */
export const collectReferenceOccurrences = (
  cssPath: string,
  imageDirectives: ReadonlyMap<string, SpriteImageDirective>,
  resources: ResourceHandler,
  messageLog: MessageLog,
): SpriteReferenceOccurrence[] => {
  messageLog.info("READING_SPRITE_REFERENCE_DIRECTIVES", {}, cssPath);
  const lines = splitLines(resources.readText(cssPath));
  const occurrences: SpriteReferenceOccurrence[] = [];

  lines.forEach((cssLine, index) => {
    const line = index + 1;
    const location = { cssPath, line };
    const directiveText = extractReferenceDirectiveString(cssLine);
    if (directiveText === undefined) {
      return;
    }

    const extracted = extractReferenceCssProperty(
      cssLine,
      index > 0 ? lines[index - 1] : undefined,
      messageLog,
      location,
    );
    if (!extracted) {
      return;
    }

    const imageUrl = unpackUrl(extracted.property.value, messageLog, location);
    if (imageUrl === undefined) {
      return;
    }

    const directive = parseReferenceDirective(
      directiveText,
      imageDirectives,
      messageLog,
      location,
    );
    if (!directive) {
      return;
    }

    occurrences.push({
      directive,
      imagePath: resources.resolvePath(cssPath, imageUrl),
      cssPath,
      line: extracted.dualLine ? line - 1 : line,
      important: extracted.property.important,
      dualLine: extracted.dualLine,
    });
  });

  return occurrences;
};

export const collectImageOccurrencesByFile = (
  cssPaths: readonly string[],
  resources: ResourceHandler,
  messageLog: MessageLog,
): Map<string, SpriteImageOccurrence[]> => {
  const byFile = new Map<string, SpriteImageOccurrence[]>();
  for (const cssPath of cssPaths) {
    byFile.set(cssPath, collectImageOccurrences(cssPath, resources, messageLog));
  }
  return byFile;
};

export const collectReferenceOccurrencesByFile = (
  cssPaths: readonly string[],
  imageDirectives: ReadonlyMap<string, SpriteImageDirective>,
  resources: ResourceHandler,
  messageLog: MessageLog,
): Map<string, SpriteReferenceOccurrence[]> => {
  const byFile = new Map<string, SpriteReferenceOccurrence[]>();
  for (const cssPath of cssPaths) {
    byFile.set(
      cssPath,
      collectReferenceOccurrences(
        cssPath,
        imageDirectives,
        resources,
        messageLog,
      ),
    );
  }
  return byFile;
};

/** Index image occurrences by sprite id; the first definition of an id wins. */
export const mergeImageOccurrences = (
  occurrencesByFile: ReadonlyMap<string, readonly SpriteImageOccurrence[]>,
  messageLog: MessageLog,
): Map<string, SpriteImageOccurrence> => {
  const bySpriteId = new Map<string, SpriteImageOccurrence>();

  for (const occurrences of occurrencesByFile.values()) {
    for (const occurrence of occurrences) {
      const spriteId = occurrence.directive.spriteId;
      if (bySpriteId.has(spriteId)) {
        messageLog.warning("IGNORING_SPRITE_IMAGE_REDEFINITION", {
          cssPath: occurrence.cssPath,
          line: occurrence.line,
        });
        continue;
      }
      bySpriteId.set(spriteId, occurrence);
    }
  }

  return bySpriteId;
};

/** Group references by the sprite they join, keeping scan order. */
export const mergeReferenceOccurrences = (
  occurrencesByFile: ReadonlyMap<string, readonly SpriteReferenceOccurrence[]>,
): Map<string, SpriteReferenceOccurrence[]> => {
  const bySpriteId = new Map<string, SpriteReferenceOccurrence[]>();

  for (const occurrences of occurrencesByFile.values()) {
    for (const occurrence of occurrences) {
      const spriteId = occurrence.directive.spriteRef;
      const group = bySpriteId.get(spriteId);
      if (group) {
        group.push(occurrence);
      } else {
        bySpriteId.set(spriteId, [occurrence]);
      }
    }
  }

  return bySpriteId;
};

export const toDirectiveMap = (
  occurrences: ReadonlyMap<string, SpriteImageOccurrence>,
): Map<string, SpriteImageDirective> => {
  const directives = new Map<string, SpriteImageDirective>();
  for (const [spriteId, occurrence] of occurrences) {
    directives.set(spriteId, occurrence.directive);
  }
  return directives;
};
