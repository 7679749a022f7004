import type { Expression, LinearExtrude, RotateExtrude, Vec2 } from "../ir.js";
import { ConstructionError } from "../errors.js";
import { ensureFinite, ensurePositive } from "../validate.js";
import { compact, requireMembers } from "./utils.js";

export type LinearExtrudeOptions = {
  height: number;
  center?: boolean;
  convexity?: number;
  // Radians.
  twist?: number;
  slices?: number;
  scale?: number | Vec2;
  rotate?: false;
  angle?: undefined;
};

export type RotateExtrudeOptions = {
  rotate?: boolean;
  // Radians, a full turn by default.
  angle?: number;
  convexity?: number;
  height?: undefined;
};

export type ExtrudeOptions = LinearExtrudeOptions | RotateExtrudeOptions;

export function isRotational(opts: ExtrudeOptions): opts is RotateExtrudeOptions {
  return opts.rotate === true || opts.angle !== undefined;
}

function ensureSlices(slices: number): number {
  if (!Number.isInteger(slices) || slices < 1) {
    throw new ConstructionError(
      "construction_slices",
      `slices must be a positive whole number, not ${String(slices)}`
    );
  }
  return slices;
}

export const linearExtrude = (
  opts: LinearExtrudeOptions,
  ...children: Expression[]
): LinearExtrude => {
  const scale = opts.scale ?? 1;
  const factor: number | Vec2 = typeof scale === "number" ? scale : [scale[0], scale[1]];
  return compact({
    kind: "extrude.linear",
    dim: "3D",
    height: ensurePositive(opts.height, "construction_height", "extrusion height"),
    center: opts.center ?? false,
    convexity: opts.convexity ?? 1,
    twist: ensureFinite(opts.twist ?? 0, "construction_angle", "twist"),
    slices: opts.slices === undefined ? undefined : ensureSlices(opts.slices),
    scale: factor,
    children: requireMembers("2D", children, "extrude"),
  });
};

export const rotateExtrude = (
  opts: RotateExtrudeOptions,
  ...children: Expression[]
): RotateExtrude => ({
  kind: "extrude.rotational",
  dim: "3D",
  angle: ensureFinite(opts.angle ?? 2 * Math.PI, "construction_angle", "extrusion angle"),
  convexity: opts.convexity ?? 1,
  children: requireMembers("2D", children, "extrude"),
});

// Linear by default; rotational when asked to rotate or given an angle.
export const extrude = (
  opts: ExtrudeOptions,
  ...children: Expression[]
): LinearExtrude | RotateExtrude =>
  isRotational(opts) ? rotateExtrude(opts, ...children) : linearExtrude(opts, ...children);
