import type {
  AngledOffset,
  Color,
  ColorValue,
  Expression,
  Hull,
  Members,
  Minkowski,
  Mirror,
  Multmatrix,
  Projection,
  Render,
  Resize,
  Rotate,
  RoundedOffset,
  Scale,
  Translate,
  Vec2,
  Vec3,
  Vec4,
} from "../ir.js";
import { classifyDimensioned, matchAgainstArgument } from "../dimensionality.js";
import { ConstructionError, DimensionalityMismatchError } from "../errors.js";
import { ensureFinite, ensureVector } from "../validate.js";
import { container, grouped, membersOf, requireMembers, withConvexity } from "./utils.js";
import type { ConvexityOptions } from "./utils.js";

export type { ConvexityOptions } from "./utils.js";

type Vectored<K extends string> =
  | { kind: K; dim: "2D"; vector: Vec2; children: Members["2D"][] }
  | { kind: K; dim: "3D"; vector: Vec3; children: Members["3D"][] };

// Translation, scaling and resizing take their dimensionality from the argument.
function vectored<K extends string>(
  kind: K,
  verb: string,
  vector: Vec2 | Vec3,
  children: readonly Expression[]
): Vectored<K> {
  matchAgainstArgument(verb, vector, children);
  for (const entry of vector) ensureFinite(entry, "construction_vector", `${verb} argument`);
  if (vector.length === 2) {
    return {
      kind,
      dim: "2D",
      vector: [vector[0], vector[1]],
      children: membersOf("2D", children, verb),
    };
  }
  return {
    kind,
    dim: "3D",
    vector: [vector[0], vector[1], vector[2]],
    children: membersOf("3D", children, verb),
  };
}

export const translate = (
  vector: Vec2 | Vec3,
  ...children: Expression[]
): Translate<"2D"> | Translate<"3D"> =>
  vectored("transform.translate", "translate", vector, children);

export const scale = (
  vector: Vec2 | Vec3,
  ...children: Expression[]
): Scale<"2D"> | Scale<"3D"> => vectored("transform.scale", "scale", vector, children);

export const resize = (
  size: Vec2 | Vec3,
  ...children: Expression[]
): Resize<"2D"> | Resize<"3D"> => {
  const node = vectored("transform.resize", "resize", size, children);
  if (node.dim === "2D") {
    return { kind: node.kind, dim: node.dim, size: node.vector, children: node.children };
  }
  return { kind: node.kind, dim: node.dim, size: node.vector, children: node.children };
};

/**
 * Rotate by radians. A scalar angle rotates 2D children, a vector of three
 * angles rotates 3D children.
 */
export const rotate = (
  angle: number | Vec3,
  ...children: Expression[]
): Rotate<"2D"> | Rotate<"3D"> => {
  if (typeof angle === "number") {
    ensureFinite(angle, "construction_angle", "rotation angle");
    const found = classifyDimensioned(children, "rotate");
    if (found === "3D") {
      const suffix = children.length === 1 ? "" : "s";
      throw new DimensionalityMismatchError(
        "dimensionality_argument",
        `Cannot rotate 3D OpenSCAD expression${suffix} with scalar angle ${angle}.`,
        { verb: "rotate", expected: "2D", actual: found }
      );
    }
    return {
      kind: "transform.rotate",
      dim: "2D",
      angle,
      children: membersOf("2D", children, "rotate"),
    };
  }
  matchAgainstArgument("rotate", angle, children);
  ensureVector(angle, [3], "construction_angle", "rotation angles");
  return {
    kind: "transform.rotate",
    dim: "3D",
    angle: [angle[0], angle[1], angle[2]],
    children: membersOf("3D", children, "rotate"),
  };
};

// The axes need not match the dimensionality of the children.
export const mirror = (
  vector: Vec3,
  ...children: Expression[]
): Mirror<"2D"> | Mirror<"3D"> => {
  ensureVector(vector, [3], "construction_vector", "mirror axes");
  if (!vector.every((entry) => Number.isInteger(entry))) {
    throw new ConstructionError(
      "construction_vector",
      `mirror axes must be whole numbers, not [${vector.join(", ")}]`
    );
  }
  const axes: Vec3 = [vector[0], vector[1], vector[2]];
  return container("transform.mirror", grouped(children, "mirror"), { vector: axes });
};

export const multmatrix = (
  matrix: Vec4[],
  ...children: Expression[]
): Multmatrix<"2D"> | Multmatrix<"3D"> => {
  if (matrix.length < 3 || matrix.length > 4) {
    throw new ConstructionError(
      "construction_matrix",
      `An affine matrix has 3 or 4 rows, not ${matrix.length}.`
    );
  }
  for (const row of matrix) ensureVector(row, [4], "construction_matrix", "matrix row");
  return container("transform.multmatrix", grouped(children, "transform"), {
    matrix: matrix.map((row): Vec4 => [row[0], row[1], row[2], row[3]]),
  });
};

export const color = (
  value: ColorValue,
  ...children: Expression[]
): Color<"2D"> | Color<"3D"> => {
  if (typeof value !== "string") {
    ensureVector(value, [3, 4], "construction_color", "color");
  }
  let copy: ColorValue;
  if (typeof value === "string") copy = value;
  else if (value.length === 3) copy = [value[0], value[1], value[2]];
  else copy = [value[0], value[1], value[2], value[3]];
  return container("transform.color", grouped(children, "color"), { color: copy });
};

export const hull = (...children: Expression[]): Hull<"2D"> | Hull<"3D"> =>
  container("transform.hull", grouped(children, "form a hull around"), {});

export function minkowski(
  opts: ConvexityOptions,
  ...children: Expression[]
): Minkowski<"2D"> | Minkowski<"3D">;
export function minkowski(...children: Expression[]): Minkowski<"2D"> | Minkowski<"3D">;
export function minkowski(
  ...args: (ConvexityOptions | Expression)[]
): Minkowski<"2D"> | Minkowski<"3D"> {
  const { convexity, children } = withConvexity(args);
  return container("transform.minkowski", grouped(children, "minkowski-add"), { convexity });
}

export type OffsetOptions = {
  distance: number;
  // Rounded by default. Chamfering only applies to angled offsets.
  round?: boolean;
  chamfer?: boolean;
};

export const offset = (
  distance: number | OffsetOptions,
  ...children: Expression[]
): RoundedOffset | AngledOffset => {
  const opts: OffsetOptions = typeof distance === "number" ? { distance } : distance;
  ensureFinite(opts.distance, "construction_offset", "offset distance");
  const members = requireMembers("2D", children, "offset");
  const round = opts.round ?? true;
  if (round) {
    if (opts.chamfer) {
      throw new ConstructionError(
        "construction_offset",
        "Chamfering applies to angled offsets only; pass round: false."
      );
    }
    return { kind: "offset.rounded", dim: "2D", distance: opts.distance, children: members };
  }
  return {
    kind: "offset.angled",
    dim: "2D",
    distance: opts.distance,
    chamfer: opts.chamfer ?? false,
    children: members,
  };
};

export const projection = (child: Expression, opts: { cut?: boolean } = {}): Projection => ({
  kind: "transform.projection",
  dim: "2D",
  cut: opts.cut ?? false,
  children: requireMembers("3D", [child], "project"),
});

// Projection of the slice at z = 0.
export const cut = (child: Expression): Projection => projection(child, { cut: true });

// Forces full evaluation of 3D children in preview.
export function render(opts: ConvexityOptions, ...children: Expression[]): Render;
export function render(...children: Expression[]): Render;
export function render(...args: (ConvexityOptions | Expression)[]): Render {
  const { convexity, children } = withConvexity(args);
  return {
    kind: "transform.render",
    dim: "3D",
    convexity,
    children: requireMembers("3D", children, "render"),
  };
}
