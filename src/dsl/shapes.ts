import { extname } from "node:path";
import type {
  Circle,
  Cube,
  Cylinder,
  Frustum,
  Import2D,
  Import3D,
  Polygon,
  Polyhedron,
  Rectangle,
  Sphere,
  Square,
  Surface,
  Text,
  Vec2,
  Vec3,
} from "../ir.js";
import { ConstructionError } from "../errors.js";
import { ensureFinite, ensureIndexLists, ensurePositive, ensureVector } from "../validate.js";
import { compact } from "./utils.js";

const IMPORT_DIMENSIONS: Record<string, "2D" | "3D"> = {
  ".3mf": "3D",
  ".amf": "3D",
  ".dxf": "2D",
  ".off": "3D",
  ".stl": "3D",
  ".svg": "2D",
};

export const circle = (radius: number): Circle => ({
  kind: "shape.circle",
  dim: "2D",
  radius: ensurePositive(radius, "construction_radius", "circle radius"),
});

// A scalar size makes a square, a pair makes a rectangle.
export const square = (size: number | Vec2, center = true): Square | Rectangle => {
  if (typeof size === "number") {
    ensurePositive(size, "construction_size", "square size");
    return { kind: "shape.square", dim: "2D", size, center };
  }
  ensureVector(size, [2], "construction_size", "rectangle size");
  return { kind: "shape.rectangle", dim: "2D", size: [size[0], size[1]], center };
};

export const polygon = (
  points: Vec2[],
  opts?: { paths?: number[][]; convexity?: number }
): Polygon => {
  for (const point of points) ensureVector(point, [2], "construction_points", "polygon point");
  if (opts?.paths) {
    ensureIndexLists(opts.paths, points.length, 3, "construction_paths", "polygon paths");
  }
  return compact({
    kind: "shape.polygon",
    dim: "2D",
    points: points.map((point): Vec2 => [point[0], point[1]]),
    paths: opts?.paths?.map((path) => [...path]),
    convexity: opts?.convexity ?? 1,
  });
};

export type TextOptions = Partial<Omit<Text, "kind" | "dim" | "text">>;

export const text = (value: string, opts: TextOptions = {}): Text =>
  compact({
    kind: "shape.text",
    dim: "2D",
    text: value,
    size: opts.size ?? 10,
    font: opts.font,
    halign: opts.halign ?? "left",
    valign: opts.valign ?? "baseline",
    spacing: opts.spacing ?? 1,
    direction: opts.direction ?? "ltr",
    language: opts.language ?? "en",
    script: opts.script ?? "latin",
  });

// The file suffix decides whether the import is 2D or 3D.
export const importFile = (
  file: string,
  opts: { layer?: string; convexity?: number } = {}
): Import2D | Import3D => {
  const suffix = extname(file).toLowerCase();
  const dim = IMPORT_DIMENSIONS[suffix];
  if (dim === undefined) {
    throw new ConstructionError(
      "construction_import_suffix",
      `Unknown file suffix for ${file}.`,
      { file, suffix }
    );
  }
  const convexity = opts.convexity ?? 1;
  if (dim === "2D") {
    return compact({ kind: "shape.import", dim, file, layer: opts.layer, convexity });
  }
  if (opts.layer !== undefined) {
    throw new ConstructionError(
      "construction_import_layer",
      `Layers apply to 2D imports only, not ${file}.`,
      { file }
    );
  }
  return { kind: "shape.import", dim, file, convexity };
};

export const sphere = (radius: number): Sphere => ({
  kind: "shape.sphere",
  dim: "3D",
  radius: ensurePositive(radius, "construction_radius", "sphere radius"),
});

export const cube = (size: Vec3, center = true): Cube => {
  ensureVector(size, [3], "construction_size", "cube size");
  return { kind: "shape.cube", dim: "3D", size: [size[0], size[1], size[2]], center };
};

// A scalar radius makes a cylinder, a pair of radii makes a frustum.
export const cylinder = (
  radius: number | Vec2,
  height: number,
  center = true
): Cylinder | Frustum => {
  ensurePositive(height, "construction_height", "cylinder height");
  if (typeof radius === "number") {
    ensurePositive(radius, "construction_radius", "cylinder radius");
    return { kind: "shape.cylinder", dim: "3D", radius, height, center };
  }
  ensureVector(radius, [2], "construction_radius", "frustum radii");
  return {
    kind: "shape.frustum",
    dim: "3D",
    radius1: radius[0],
    radius2: radius[1],
    height,
    center,
  };
};

export const polyhedron = (
  points: Vec3[],
  faces: number[][],
  opts?: { convexity?: number }
): Polyhedron => {
  for (const point of points) ensureVector(point, [3], "construction_points", "polyhedron point");
  ensureIndexLists(faces, points.length, 3, "construction_faces", "polyhedron faces");
  return {
    kind: "shape.polyhedron",
    dim: "3D",
    points: points.map((point): Vec3 => [point[0], point[1], point[2]]),
    faces: faces.map((face) => [...face]),
    convexity: ensureFinite(opts?.convexity ?? 1, "construction_convexity", "convexity"),
  };
};

export const surface = (
  file: string,
  opts: { center?: boolean; invert?: boolean; convexity?: number } = {}
): Surface => ({
  kind: "shape.surface",
  dim: "3D",
  file,
  center: opts.center ?? true,
  invert: opts.invert ?? false,
  convexity: opts.convexity ?? 1,
});
