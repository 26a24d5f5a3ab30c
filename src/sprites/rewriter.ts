import {
  extractImageDirectiveString,
  extractReferenceDirectiveString,
  removeDirectiveComments,
  splitLines,
} from "./collector.js";
import { formatBackgroundPosition } from "./replacement.js";
import type { SpriteReferenceReplacement } from "./types.js";

const BACKGROUND_IMAGE_DECLARATION =
  /background-image\s*:\s*url\((?:'[^']*'|"[^"]*"|[^)]*)\)\s*(?:!\s*important)?\s*;?/i;

export interface ResolvedReplacement {
  replacement: SpriteReferenceReplacement;
  /** Sprite url relative to the rewritten stylesheet. */
  spriteUrl: string;
}

export const buildSpriteDeclarations = ({
  replacement,
  spriteUrl,
}: ResolvedReplacement): string => {
  const important = replacement.occurrence.important ? " !important" : "";
  const declarations = [
    `background-image: url('${spriteUrl}')${important};`,
    `background-position: ${formatBackgroundPosition(replacement)}${important};`,
  ];
  if (replacement.includeDimensions) {
    declarations.push(
      `width: ${replacement.imageWidth}px${important};`,
      `height: ${replacement.imageHeight}px${important};`,
    );
  }
  return declarations.join(" ");
};

/**
 * Point each replaced background-image declaration at its sprite, then drop
 * every directive comment. Lines left empty by the removal are dropped.
 */
export const rewriteStylesheet = (
  cssText: string,
  replacements: readonly ResolvedReplacement[],
): string => {
  const lines = splitLines(cssText);

  for (const resolved of replacements) {
    const index = resolved.replacement.occurrence.line - 1;
    const line = lines[index];
    if (line === undefined) {
      continue;
    }
    const declarations = buildSpriteDeclarations(resolved);
    lines[index] = line.replace(BACKGROUND_IMAGE_DECLARATION, () => declarations);
  }

  return lines
    .flatMap((line) => {
      if (
        extractImageDirectiveString(line) === undefined &&
        extractReferenceDirectiveString(line) === undefined
      ) {
        return [line];
      }
      const stripped = removeDirectiveComments(line);
      return stripped.trim().length > 0 ? [stripped] : [];
    })
    .join("\n");
};
