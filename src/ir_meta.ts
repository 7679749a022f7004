import type { Expression, ExpressionKind, ModifierKind, ScadValue } from "./ir.js";

type KeysOfUnion<T> = T extends unknown ? keyof T : never;

export type NodeOf<K extends ExpressionKind> = Extract<Expression, { kind: K }>;

export type FieldMeta<N> = {
  // Internal field name, as on the node.
  name: Exclude<KeysOfUnion<N>, "kind" | "dim" | "children">;
  // OpenSCAD parameter name where it differs from the internal name.
  output?: string;
  // Values equal to the default are not emitted. Absent values never are.
  default?: ScadValue;
  // Radians in the IR, degrees in OpenSCAD.
  angle?: boolean;
};

export type NodeMeta<N> = {
  keyword: string;
  container?: "children";
  fields: FieldMeta<N>[];
};

export type HandCodedKind =
  | ModifierKind
  | "module.definition"
  | "module.call"
  | "module.children"
  | "meta.comment"
  | "meta.commented"
  | "meta.special"
  | "meta.echo";

// Kinds whose rendering is fully described by their metadata.
export type GenericKind = Exclude<ExpressionKind, HandCodedKind>;

export type GenericExpression = NodeOf<GenericKind>;

export type AnyFieldMeta = {
  name: string;
  output?: string;
  default?: ScadValue;
  angle?: boolean;
};

export type AnyNodeMeta = {
  keyword: string;
  container?: "children";
  fields: AnyFieldMeta[];
};

export const NODE_META: { [K in GenericKind]: NodeMeta<NodeOf<K>> } = {
  "shape.circle": {
    keyword: "circle",
    fields: [{ name: "radius", output: "r" }],
  },
  "shape.square": {
    keyword: "square",
    fields: [{ name: "size" }, { name: "center", default: false }],
  },
  "shape.rectangle": {
    keyword: "square",
    fields: [{ name: "size" }, { name: "center", default: false }],
  },
  "shape.polygon": {
    keyword: "polygon",
    fields: [{ name: "points" }, { name: "paths" }, { name: "convexity", default: 1 }],
  },
  "shape.text": {
    keyword: "text",
    fields: [
      { name: "text" },
      { name: "size", default: 10 },
      { name: "font" },
      { name: "halign", default: "left" },
      { name: "valign", default: "baseline" },
      { name: "spacing", default: 1 },
      { name: "direction", default: "ltr" },
      { name: "language", default: "en" },
      { name: "script", default: "latin" },
    ],
  },
  "shape.import": {
    keyword: "import",
    fields: [{ name: "file" }, { name: "layer" }, { name: "convexity", default: 1 }],
  },
  "shape.sphere": {
    keyword: "sphere",
    fields: [{ name: "radius", output: "r" }],
  },
  "shape.cube": {
    keyword: "cube",
    fields: [{ name: "size" }, { name: "center", default: false }],
  },
  "shape.cylinder": {
    keyword: "cylinder",
    fields: [
      { name: "radius", output: "r" },
      { name: "height", output: "h" },
      { name: "center", default: false },
    ],
  },
  "shape.frustum": {
    keyword: "cylinder",
    fields: [
      { name: "radius1", output: "r1" },
      { name: "radius2", output: "r2" },
      { name: "height", output: "h" },
      { name: "center", default: false },
    ],
  },
  "shape.polyhedron": {
    keyword: "polyhedron",
    fields: [{ name: "points" }, { name: "faces" }, { name: "convexity", default: 1 }],
  },
  "shape.surface": {
    keyword: "surface",
    fields: [
      { name: "file" },
      { name: "center", default: false },
      { name: "invert", default: false },
      { name: "convexity", default: 1 },
    ],
  },
  "boolean.union": { keyword: "union", container: "children", fields: [] },
  "boolean.difference": { keyword: "difference", container: "children", fields: [] },
  "boolean.intersection": { keyword: "intersection", container: "children", fields: [] },
  "transform.translate": {
    keyword: "translate",
    container: "children",
    fields: [{ name: "vector", output: "v" }],
  },
  "transform.rotate": {
    keyword: "rotate",
    container: "children",
    fields: [{ name: "angle", output: "a", angle: true }],
  },
  "transform.scale": {
    keyword: "scale",
    container: "children",
    fields: [{ name: "vector", output: "v" }],
  },
  "transform.resize": {
    keyword: "resize",
    container: "children",
    fields: [{ name: "size", output: "newsize" }],
  },
  "transform.mirror": {
    keyword: "mirror",
    container: "children",
    fields: [{ name: "vector", output: "v" }],
  },
  "transform.multmatrix": {
    keyword: "multmatrix",
    container: "children",
    fields: [{ name: "matrix", output: "m" }],
  },
  "transform.color": {
    keyword: "color",
    container: "children",
    fields: [{ name: "color", output: "c" }],
  },
  "transform.hull": { keyword: "hull", container: "children", fields: [] },
  "transform.minkowski": {
    keyword: "minkowski",
    container: "children",
    fields: [{ name: "convexity", default: 1 }],
  },
  "offset.rounded": {
    keyword: "offset",
    container: "children",
    fields: [{ name: "distance", output: "r" }],
  },
  "offset.angled": {
    keyword: "offset",
    container: "children",
    fields: [
      { name: "distance", output: "delta" },
      { name: "chamfer", default: false },
    ],
  },
  "transform.projection": {
    keyword: "projection",
    container: "children",
    fields: [{ name: "cut", default: false }],
  },
  "transform.render": {
    keyword: "render",
    container: "children",
    fields: [{ name: "convexity", default: 1 }],
  },
  "extrude.linear": {
    keyword: "linear_extrude",
    container: "children",
    fields: [
      { name: "height" },
      { name: "center", default: false },
      { name: "convexity", default: 1 },
      { name: "twist", default: 0, angle: true },
      { name: "slices" },
      { name: "scale", default: 1 },
    ],
  },
  "extrude.rotational": {
    keyword: "rotate_extrude",
    container: "children",
    fields: [
      { name: "angle", default: 2 * Math.PI, angle: true },
      { name: "convexity", default: 1 },
    ],
  },
};

const HAND_CODED_KINDS: Record<HandCodedKind, true> = {
  "modifier.background": true,
  "modifier.debug": true,
  "modifier.root": true,
  "modifier.disable": true,
  "module.definition": true,
  "module.call": true,
  "module.children": true,
  "meta.comment": true,
  "meta.commented": true,
  "meta.special": true,
  "meta.echo": true,
};

export const MODIFIER_SYMBOLS: Record<ModifierKind, string> = {
  "modifier.background": "%",
  "modifier.debug": "#",
  "modifier.root": "!",
  "modifier.disable": "*",
};

export const EXPRESSION_KINDS: ReadonlySet<string> = new Set([
  ...Object.keys(NODE_META),
  ...Object.keys(HAND_CODED_KINDS),
]);

export function metaFor(kind: GenericKind): AnyNodeMeta {
  return NODE_META[kind];
}
