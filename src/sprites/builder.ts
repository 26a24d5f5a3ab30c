import { createHash } from "node:crypto";

import {
  collectImageOccurrencesByFile,
  collectReferenceOccurrencesByFile,
  mergeImageOccurrences,
  mergeReferenceOccurrences,
  toDirectiveMap,
} from "./collector.js";
import { decodeImage, encodeSprite, renderSprite } from "./compositor.js";
import { layoutSprite } from "./layout.js";
import { errorMessage } from "./messages.js";
import type { MessageLog } from "./messages.js";
import { buildReplacements } from "./replacement.js";
import type { ResourceHandler } from "./resources.js";
import { rewriteStylesheet } from "./rewriter.js";
import type { ResolvedReplacement } from "./rewriter.js";
import type {
  RgbaImage,
  SpriteBuildOptions,
  SpriteBuildResult,
  SpriteImageOccurrence,
  SpriteImageUidType,
  SpriteMember,
  SpriteReferenceOccurrence,
  SpriteReferenceReplacement,
  WrittenSprite,
} from "./types.js";
import { toCssOutputPath, toOutputPath, toSpriteUrl } from "./workflow.js";

export const computeSpriteUid = (
  uidType: SpriteImageUidType,
  encoded: Buffer,
  now: () => number = Date.now,
): string => {
  if (uidType === "md5") {
    return createHash("md5").update(encoded).digest("hex");
  }
  if (uidType === "date") {
    return String(now());
  }
  return "";
};

/** Read and decode member images, dropping the ones that cannot be loaded. */
const loadMembers = async (
  references: readonly SpriteReferenceOccurrence[],
  resources: ResourceHandler,
  messageLog: MessageLog,
): Promise<SpriteMember[]> => {
  const decoded = new Map<string, RgbaImage>();
  const members: SpriteMember[] = [];

  for (const occurrence of references) {
    let image = decoded.get(occurrence.imagePath);
    if (!image) {
      try {
        image = await decodeImage(resources.readBinary(occurrence.imagePath));
      } catch (error) {
        messageLog.warning(
          "CANNOT_READ_IMAGE",
          { cssPath: occurrence.cssPath, line: occurrence.line },
          occurrence.imagePath,
          errorMessage(error),
        );
        continue;
      }
      decoded.set(occurrence.imagePath, image);
    }
    members.push({ occurrence, image });
  }

  return members;
};

interface SpriteOutput {
  sprite: WrittenSprite;
  replacements: SpriteReferenceReplacement[];
}

const buildSprite = async (
  imageOccurrence: SpriteImageOccurrence,
  references: readonly SpriteReferenceOccurrence[],
  options: SpriteBuildOptions,
  resources: ResourceHandler,
  messageLog: MessageLog,
): Promise<SpriteOutput | undefined> => {
  const { directive } = imageOccurrence;
  const members = await loadMembers(references, resources, messageLog);
  if (members.length === 0) {
    messageLog.warning(
      "SKIPPING_EMPTY_SPRITE",
      { cssPath: imageOccurrence.cssPath, line: imageOccurrence.line },
      directive.spriteId,
    );
    return undefined;
  }

  const layout = layoutSprite(directive.spriteId, directive.layout, members);
  for (const member of layout.members) {
    messageLog.debug(
      "PLACING_IMAGE",
      { cssPath: member.occurrence.cssPath, line: member.occurrence.line },
      member.occurrence.imagePath,
      directive.spriteId,
      String(member.offset),
    );
  }
  const rendered = await renderSprite(layout);
  const encoded = await encodeSprite(
    rendered,
    directive.format,
    directive.matteColor,
  );

  const outputPath = toOutputPath(
    resources.resolvePath(imageOccurrence.cssPath, directive.imagePath),
    options,
  );
  messageLog.info(
    "WRITING_SPRITE_IMAGE",
    {},
    String(layout.width),
    String(layout.height),
    outputPath,
  );
  resources.writeBinary(outputPath, encoded);

  return {
    sprite: {
      spriteId: directive.spriteId,
      outputPath,
      uid: computeSpriteUid(directive.uidType, encoded),
      width: layout.width,
      height: layout.height,
      memberCount: members.length,
      bytes: encoded.length,
    },
    replacements: buildReplacements(layout, directive),
  };
};

const hasOccurrences = (
  byFile: ReadonlyMap<string, readonly unknown[]>,
  cssPath: string,
): boolean => (byFile.get(cssPath)?.length ?? 0) > 0;

/**
 * Run the whole pipeline over a set of stylesheets: collect directives,
 * render one sprite per sprite id and write rewritten stylesheets.
 * Unreadable stylesheets throw; every other problem is reported to the log.
 */
export const buildSprites = async (
  cssPaths: readonly string[],
  options: SpriteBuildOptions,
  resources: ResourceHandler,
  messageLog: MessageLog,
): Promise<SpriteBuildResult> => {
  const imageOccurrencesByFile = collectImageOccurrencesByFile(
    cssPaths,
    resources,
    messageLog,
  );
  const imageOccurrences = mergeImageOccurrences(
    imageOccurrencesByFile,
    messageLog,
  );
  const referenceOccurrencesByFile = collectReferenceOccurrencesByFile(
    cssPaths,
    toDirectiveMap(imageOccurrences),
    resources,
    messageLog,
  );
  const referencesBySpriteId = mergeReferenceOccurrences(
    referenceOccurrencesByFile,
  );

  const sprites: WrittenSprite[] = [];
  const spritesById = new Map<string, WrittenSprite>();
  const replacements = new Map<
    SpriteReferenceOccurrence,
    SpriteReferenceReplacement
  >();

  for (const [spriteId, references] of referencesBySpriteId) {
    const imageOccurrence = imageOccurrences.get(spriteId);
    if (!imageOccurrence) {
      continue;
    }

    const output = await buildSprite(
      imageOccurrence,
      references,
      options,
      resources,
      messageLog,
    );
    if (!output) {
      continue;
    }

    sprites.push(output.sprite);
    spritesById.set(spriteId, output.sprite);
    for (const replacement of output.replacements) {
      replacements.set(replacement.occurrence, replacement);
    }
  }

  const cssFiles: string[] = [];
  for (const cssPath of cssPaths) {
    if (
      !hasOccurrences(imageOccurrencesByFile, cssPath) &&
      !hasOccurrences(referenceOccurrencesByFile, cssPath)
    ) {
      continue;
    }

    const cssOutputPath = toCssOutputPath(cssPath, options);
    const resolved: ResolvedReplacement[] = [];
    for (const occurrence of referenceOccurrencesByFile.get(cssPath) ?? []) {
      const replacement = replacements.get(occurrence);
      const sprite = spritesById.get(occurrence.directive.spriteRef);
      if (!replacement || !sprite) {
        continue;
      }
      resolved.push({
        replacement,
        spriteUrl: toSpriteUrl(cssOutputPath, sprite.outputPath, sprite.uid),
      });
    }

    messageLog.info("WRITING_CSS", {}, cssOutputPath);
    resources.writeText(
      cssOutputPath,
      rewriteStylesheet(resources.readText(cssPath), resolved),
    );
    cssFiles.push(cssOutputPath);
  }

  return { sprites, cssFiles, replacements };
};
