export type SpriteLayout = "vertical" | "horizontal";
export type SpriteImageFormat = "png" | "gif" | "jpg" | "webp";
export type SpriteImageUidType = "none" | "date" | "md5";
export type SpriteAlignment =
  | "left"
  | "right"
  | "top"
  | "bottom"
  | "center"
  | "repeat";

/** Where a member sits on the axis perpendicular to packing. */
export type CrossPlacement = "start" | "end" | "center" | "repeat";

export type HorizontalAnchor = "left" | "right" | "center";
export type VerticalAnchor = "top" | "bottom" | "center";

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

export interface Point {
  x: number;
  y: number;
}

export interface ImageSize {
  width: number;
  height: number;
}

export interface SpriteMargins {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export interface SpriteImageDirective {
  readonly spriteId: string;
  readonly imagePath: string;
  readonly layout: SpriteLayout;
  readonly format: SpriteImageFormat;
  readonly uidType: SpriteImageUidType;
  readonly matteColor?: RgbColor;
  readonly includeDimensions: boolean;
}

export interface SpriteReferenceDirective {
  readonly spriteRef: string;
  readonly alignment: SpriteAlignment;
  readonly margins: Readonly<SpriteMargins>;
}

export interface SpriteImageOccurrence {
  readonly directive: SpriteImageDirective;
  readonly cssPath: string;
  readonly line: number;
}

export interface SpriteReferenceOccurrence {
  readonly directive: SpriteReferenceDirective;
  /** Image file path resolved against the stylesheet or document root. */
  readonly imagePath: string;
  readonly cssPath: string;
  /** 1-based; points at the background-image line for dual-line occurrences. */
  readonly line: number;
  readonly important: boolean;
  readonly dualLine: boolean;
}

/** Decoded RGBA pixels, 4 bytes per pixel, row-major. */
export interface RgbaImage extends ImageSize {
  data: Buffer;
}

export interface SpriteMember {
  occurrence: SpriteReferenceOccurrence;
  image: RgbaImage;
}

export interface PlacedSpriteMember extends SpriteMember {
  /** Start of the member's slot along the packing axis. */
  readonly offset: number;
  readonly footprint: ImageSize;
  readonly placement: CrossPlacement;
  /** Drawing origins; more than one only for repeated members. */
  readonly origins: readonly Point[];
}

export interface SpriteImage {
  readonly spriteId: string;
  readonly layout: SpriteLayout;
  readonly width: number;
  readonly height: number;
  readonly members: readonly PlacedSpriteMember[];
}

export interface SpriteReferenceReplacement {
  readonly spriteId: string;
  readonly occurrence: SpriteReferenceOccurrence;
  readonly horizontalPosition: number | HorizontalAnchor;
  readonly verticalPosition: number | VerticalAnchor;
  readonly imageWidth: number;
  readonly imageHeight: number;
  readonly includeDimensions: boolean;
}

export interface WrittenSprite {
  spriteId: string;
  /** Path the encoded sprite was written to. */
  outputPath: string;
  /** Query-string suffix appended to the sprite url, empty for uid "none". */
  uid: string;
  width: number;
  height: number;
  memberCount: number;
  bytes: number;
}

export interface SpriteBuildOptions {
  rootDir: string;
  outputDir?: string;
  cssFileSuffix: string;
}

export interface SpriteBuildResult {
  sprites: WrittenSprite[];
  cssFiles: string[];
  replacements: Map<SpriteReferenceOccurrence, SpriteReferenceReplacement>;
}
