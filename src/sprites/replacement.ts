import type {
  CrossPlacement,
  HorizontalAnchor,
  PlacedSpriteMember,
  SpriteImage,
  SpriteImageDirective,
  SpriteReferenceReplacement,
  VerticalAnchor,
} from "./types.js";

const HORIZONTAL_ANCHORS: Record<CrossPlacement, HorizontalAnchor> = {
  start: "left",
  end: "right",
  center: "center",
  repeat: "left",
};

const VERTICAL_ANCHORS: Record<CrossPlacement, VerticalAnchor> = {
  start: "top",
  end: "bottom",
  center: "center",
  repeat: "top",
};

export const buildReplacement = (
  sprite: SpriteImage,
  member: PlacedSpriteMember,
  directive: SpriteImageDirective,
): SpriteReferenceReplacement => {
  const base = {
    spriteId: sprite.spriteId,
    occurrence: member.occurrence,
    imageWidth: member.image.width,
    imageHeight: member.image.height,
    includeDimensions: directive.includeDimensions,
  };

  if (sprite.layout === "vertical") {
    return {
      ...base,
      horizontalPosition: HORIZONTAL_ANCHORS[member.placement],
      verticalPosition: member.offset,
    };
  }
  return {
    ...base,
    horizontalPosition: member.offset,
    verticalPosition: VERTICAL_ANCHORS[member.placement],
  };
};

export const buildReplacements = (
  sprite: SpriteImage,
  directive: SpriteImageDirective,
): SpriteReferenceReplacement[] =>
  sprite.members.map((member) => buildReplacement(sprite, member, directive));

/** Offsets shift the sprite up or left, so they render negative. */
export const formatPosition = (position: number | string): string => {
  if (typeof position === "string") {
    return position;
  }
  return position === 0 ? "0" : `-${position}px`;
};

export const formatBackgroundPosition = (
  replacement: SpriteReferenceReplacement,
): string =>
  `${formatPosition(replacement.horizontalPosition)} ${formatPosition(replacement.verticalPosition)}`;
