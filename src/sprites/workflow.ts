import fs from "node:fs";
import path from "node:path";

import type { SpriteBuildOptions } from "./types.js";

const CSS_EXTENSION = ".css";

/** True when `targetPath` lies inside `baseDir` (or is `baseDir` itself). */
export const isPathWithin = (baseDir: string, targetPath: string): boolean => {
  const relative = path.relative(path.resolve(baseDir), path.resolve(targetPath));
  return !relative.startsWith("..") && !path.isAbsolute(relative);
};

/**
 * Map a file under the root directory to its place under the output
 * directory. Without an output directory, or for files outside the root,
 * the path is kept.
 */
export const toOutputPath = (
  filePath: string,
  options: Pick<SpriteBuildOptions, "rootDir" | "outputDir">,
): string => {
  if (!options.outputDir || !isPathWithin(options.rootDir, filePath)) {
    return filePath;
  }

  const relative = path.relative(
    path.resolve(options.rootDir),
    path.resolve(filePath),
  );
  return path.join(options.outputDir, relative);
};

export const toCssOutputPath = (
  cssPath: string,
  options: SpriteBuildOptions,
): string => {
  const extension = path.extname(cssPath);
  const stem = extension ? cssPath.slice(0, -extension.length) : cssPath;
  return toOutputPath(`${stem}${options.cssFileSuffix}${extension}`, options);
};

/** Url of the sprite as seen from the rewritten stylesheet. */
export const toSpriteUrl = (
  cssOutputPath: string,
  spriteOutputPath: string,
  uid: string,
): string => {
  const relative = path
    .relative(path.dirname(cssOutputPath), spriteOutputPath)
    .split(path.sep)
    .join("/");
  return uid.length > 0 ? `${relative}?${uid}` : relative;
};

/**
 * List stylesheets under `rootDir` in a stable order, skipping the ones a
 * previous run generated.
 */
export const findCssFiles = (rootDir: string, cssFileSuffix: string): string[] => {
  const generatedSuffix = `${cssFileSuffix}${CSS_EXTENSION}`;
  const found: string[] = [];

  const walk = (dirPath: string): void => {
    const entries = fs.readdirSync(dirPath, { withFileTypes: true });
    entries.sort((left, right) => left.name.localeCompare(right.name));
    for (const entry of entries) {
      const entryPath = path.join(dirPath, entry.name);
      if (entry.isDirectory()) {
        walk(entryPath);
        continue;
      }
      if (!entry.isFile() || !entry.name.endsWith(CSS_EXTENSION)) {
        continue;
      }
      if (cssFileSuffix.length > 0 && entry.name.endsWith(generatedSuffix)) {
        continue;
      }
      found.push(entryPath);
    }
  };

  walk(rootDir);
  return found;
};
