import type { SpriteBuildResult, WrittenSprite } from "./types.js";

const formatKilobytes = (bytes: number): string =>
  `${(bytes / 1024).toFixed(1)} KB`;

export const describeSprite = (sprite: WrittenSprite): string => {
  const uid = sprite.uid.length > 0 ? ` uid=${sprite.uid}` : "";
  return (
    `${sprite.spriteId}: ${sprite.width}x${sprite.height}, ` +
    `${sprite.memberCount} image(s), ${formatKilobytes(sprite.bytes)}${uid}`
  );
};

export const logBuildOutcome = (
  result: SpriteBuildResult,
  warningCount: number,
  verbose: boolean,
): void => {
  console.log(
    `✅ Built ${result.sprites.length} sprite(s), rewrote ${result.cssFiles.length} stylesheet(s)`,
  );

  if (verbose) {
    for (const sprite of result.sprites) {
      console.log(`🧩 ${describeSprite(sprite)} -> ${sprite.outputPath}`);
    }
    for (const cssFile of result.cssFiles) {
      console.log(`🗂️ ${cssFile}`);
    }
  }

  if (warningCount > 0) {
    console.warn(`⚠️ ${warningCount} warning(s) reported during the build`);
  }
};
