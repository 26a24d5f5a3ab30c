import sharp from "sharp";

import type {
  RgbColor,
  RgbaImage,
  SpriteImage,
  SpriteImageFormat,
} from "./types.js";

const RGBA_CHANNELS = 4;
const SPRITE_JPEG_QUALITY = 90;
const TRANSPARENT = { r: 0, g: 0, b: 0, alpha: 0 };
const DEFAULT_MATTE: RgbColor = { r: 255, g: 255, b: 255 };

const toRawOptions = (
  image: RgbaImage,
): { raw: { width: number; height: number; channels: 4 } } => ({
  raw: { width: image.width, height: image.height, channels: RGBA_CHANNELS },
});

/** Decode any format sharp reads into 8-bit sRGB with an alpha channel. */
export const decodeImage = async (bytes: Buffer): Promise<RgbaImage> => {
  const { data, info } = await sharp(bytes)
    .toColourspace("srgb")
    .ensureAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });
  if (info.channels !== RGBA_CHANNELS) {
    throw new Error(
      `Expected ${RGBA_CHANNELS} channels after decoding, got ${info.channels}`,
    );
  }
  return { data, width: info.width, height: info.height };
};

/** Copy a rectangle out of an RGBA image. */
export const cropImage = (
  image: RgbaImage,
  left: number,
  top: number,
  width: number,
  height: number,
): RgbaImage => {
  const rowBytes = width * RGBA_CHANNELS;
  const data = Buffer.alloc(rowBytes * height);
  for (let row = 0; row < height; row += 1) {
    const sourceStart = ((top + row) * image.width + left) * RGBA_CHANNELS;
    image.data.copy(data, row * rowBytes, sourceStart, sourceStart + rowBytes);
  }
  return { data, width, height };
};

const buildOverlays = (sprite: SpriteImage): sharp.OverlayOptions[] => {
  const overlays: sharp.OverlayOptions[] = [];

  for (const member of sprite.members) {
    for (const origin of member.origins) {
      const width = Math.min(member.image.width, sprite.width - origin.x);
      const height = Math.min(member.image.height, sprite.height - origin.y);
      if (width <= 0 || height <= 0) {
        continue;
      }

      // Tiles at the far edge of a repeat run are cut to fit the canvas.
      const tile =
        width === member.image.width && height === member.image.height
          ? member.image
          : cropImage(member.image, 0, 0, width, height);
      overlays.push({
        input: tile.data,
        ...toRawOptions(tile),
        left: origin.x,
        top: origin.y,
      });
    }
  }

  return overlays;
};

/** Draw every member at its origins, in member order, onto a transparent canvas. */
export const renderSprite = async (sprite: SpriteImage): Promise<RgbaImage> => {
  const { data, info } = await sharp({
    create: {
      width: sprite.width,
      height: sprite.height,
      channels: RGBA_CHANNELS,
      background: TRANSPARENT,
    },
  })
    .composite(buildOverlays(sprite))
    .raw()
    .toBuffer({ resolveWithObject: true });

  return { data, width: info.width, height: info.height };
};

/**
 * Encode a rendered sprite. JPEG has no alpha so it is flattened on the matte
 * colour; GIF is flattened only when a matte colour is given.
 */
export const encodeSprite = async (
  image: RgbaImage,
  format: SpriteImageFormat,
  matteColor?: RgbColor,
): Promise<Buffer> => {
  const pipeline = sharp(image.data, toRawOptions(image));

  switch (format) {
    case "png":
      return pipeline.png().toBuffer();
    case "webp":
      return pipeline.webp({ lossless: true }).toBuffer();
    case "gif":
      return matteColor
        ? pipeline.flatten({ background: matteColor }).gif().toBuffer()
        : pipeline.gif().toBuffer();
    case "jpg":
      return pipeline
        .flatten({ background: matteColor ?? DEFAULT_MATTE })
        .jpeg({ quality: SPRITE_JPEG_QUALITY })
        .toBuffer();
  }
};
