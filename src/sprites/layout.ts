import { toCrossPlacement } from "./directives.js";
import type {
  CrossPlacement,
  ImageSize,
  PlacedSpriteMember,
  Point,
  SpriteImage,
  SpriteLayout,
  SpriteMember,
} from "./types.js";

const packingSize = (size: ImageSize, layout: SpriteLayout): number =>
  layout === "vertical" ? size.height : size.width;

const crossSize = (size: ImageSize, layout: SpriteLayout): number =>
  layout === "vertical" ? size.width : size.height;

const greatestCommonDivisor = (left: number, right: number): number =>
  right === 0 ? left : greatestCommonDivisor(right, left % right);

export const leastCommonMultiple = (values: readonly number[]): number =>
  values.reduce(
    (result, value) => (result * value) / greatestCommonDivisor(result, value),
    1,
  );

/**
 * Width a member occupies in the sprite. Repeated members of a vertical
 * sprite tile across the whole width, so their side margins do not count.
 */
export const requiredWidth = (
  member: SpriteMember,
  layout: SpriteLayout,
): number => {
  const { alignment, margins } = member.occurrence.directive;
  if (alignment === "repeat" && layout === "vertical") {
    return member.image.width;
  }
  return member.image.width + margins.left + margins.right;
};

/** Height counterpart of {@link requiredWidth} for horizontal sprites. */
export const requiredHeight = (
  member: SpriteMember,
  layout: SpriteLayout,
): number => {
  const { alignment, margins } = member.occurrence.directive;
  if (alignment === "repeat" && layout === "horizontal") {
    return member.image.height;
  }
  return member.image.height + margins.top + margins.bottom;
};

/**
 * Extent of the sprite across the packing axis: the widest member, grown to
 * a multiple of every repeated member's size so tiles join without seams.
 */
export const computeCrossExtent = (
  members: readonly SpriteMember[],
  layout: SpriteLayout,
): number => {
  const widest = members.reduce((max, member) => {
    const footprint = {
      width: requiredWidth(member, layout),
      height: requiredHeight(member, layout),
    };
    return Math.max(max, crossSize(footprint, layout));
  }, 0);

  const repeatSizes = members
    .filter((member) => member.occurrence.directive.alignment === "repeat")
    .map((member) => crossSize(member.image, layout))
    .filter((size) => size > 0);
  if (repeatSizes.length === 0) {
    return widest;
  }

  const unit = leastCommonMultiple(repeatSizes);
  return Math.ceil(widest / unit) * unit;
};

const computeCrossCoordinates = (
  member: SpriteMember,
  placement: CrossPlacement,
  layout: SpriteLayout,
  crossExtent: number,
): number[] => {
  const { margins } = member.occurrence.directive;
  const leadingMargin = layout === "vertical" ? margins.left : margins.top;
  const trailingMargin = layout === "vertical" ? margins.right : margins.bottom;
  const size = crossSize(member.image, layout);

  if (placement === "end") {
    return [crossExtent - trailingMargin - size];
  }
  if (placement === "center") {
    return [Math.floor((crossExtent - size) / 2)];
  }
  if (placement === "repeat" && size > 0) {
    const tiles: number[] = [];
    for (let position = 0; position < crossExtent; position += size) {
      tiles.push(position);
    }
    return tiles;
  }
  return [leadingMargin];
};

interface LayoutAccumulator {
  placed: readonly PlacedSpriteMember[];
  total: number;
}

/**
 * Stack members along the sprite's packing axis in the given order and
 * compute the canvas size. Each member's offset is the total footprint of
 * the members before it.
 */
export const layoutSprite = (
  spriteId: string,
  layout: SpriteLayout,
  members: readonly SpriteMember[],
): SpriteImage => {
  const crossExtent = computeCrossExtent(members, layout);

  const { placed, total } = members.reduce<LayoutAccumulator>(
    (accumulator, member) => {
      const footprint = {
        width: requiredWidth(member, layout),
        height: requiredHeight(member, layout),
      };
      const placement = toCrossPlacement(
        member.occurrence.directive.alignment,
        layout,
      );
      const { margins } = member.occurrence.directive;
      const packingOrigin =
        accumulator.total + (layout === "vertical" ? margins.top : margins.left);
      const origins: Point[] = computeCrossCoordinates(
        member,
        placement,
        layout,
        crossExtent,
      ).map((cross) =>
        layout === "vertical"
          ? { x: cross, y: packingOrigin }
          : { x: packingOrigin, y: cross },
      );

      return {
        placed: [
          ...accumulator.placed,
          {
            ...member,
            offset: accumulator.total,
            footprint,
            placement,
            origins,
          },
        ],
        total: accumulator.total + packingSize(footprint, layout),
      };
    },
    { placed: [], total: 0 },
  );

  return {
    spriteId,
    layout,
    width: layout === "vertical" ? crossExtent : total,
    height: layout === "vertical" ? total : crossExtent,
    members: placed,
  };
};
