import type {
  AngledOffset,
  Expression,
  Hull,
  RoundedOffset,
  Union,
} from "../ir.js";
import { union } from "./booleans.js";
import { hull, offset } from "./transforms.js";
import type { OffsetOptions } from "./transforms.js";

// The union of the hulls around each consecutive pair of shapes.
export const pairwiseHull = (...shapes: Expression[]): Union<"2D"> | Union<"3D"> => {
  const hulls: (Hull<"2D"> | Hull<"3D">)[] = [];
  for (let i = 1; i < shapes.length; i += 1) {
    hulls.push(hull(shapes[i - 1], shapes[i]));
  }
  return union(...hulls);
};

/**
 * Round the corners of 2D shapes with a pair of offsets: inward by the
 * radius, then back out. The shapes must be large enough to survive the
 * inward step.
 */
export const roundCorners = (
  radius: number,
  shapes: Expression[],
  opts: Omit<OffsetOptions, "distance"> = {}
): RoundedOffset | AngledOffset => {
  const inner = offset({ ...opts, distance: -radius }, ...shapes);
  return offset({ ...opts, distance: radius }, inner);
};

// Similar to an OpenSCAD for statement.
export const unionMap = <T>(
  fn: (item: T, index: number) => Expression,
  items: Iterable<T>
): Union<"2D"> | Union<"3D"> => union(...Array.from(items, fn));
