export type Vec2 = [number, number];
export type Vec3 = [number, number, number];
export type Vec4 = [number, number, number, number];

export type Dimension = "2D" | "3D";
export type DimensionClass = Dimension | "ND";

// A value that renders as an OpenSCAD literal.
export type ScadValue = number | boolean | string | ScadValue[];

export interface VectorOf {
  "2D": Vec2;
  "3D": Vec3;
}

export interface AngleOf {
  "2D": number;
  "3D": Vec3;
}

// Children accepted by a container of a given dimensionality.
export interface Members {
  "2D": Expression2D | ExpressionND;
  "3D": Expression3D | ExpressionND;
}

export interface SubjectOf {
  "2D": Expression2D;
  "3D": Expression3D;
}

// --- 2D shapes ---

export type Circle = { kind: "shape.circle"; dim: "2D"; radius: number };

export type Square = {
  kind: "shape.square";
  dim: "2D";
  size: number;
  center: boolean;
};

export type Rectangle = {
  kind: "shape.rectangle";
  dim: "2D";
  size: Vec2;
  center: boolean;
};

export type Polygon = {
  kind: "shape.polygon";
  dim: "2D";
  points: Vec2[];
  paths?: number[][];
  convexity: number;
};

export type TextHAlign = "left" | "center" | "right";
export type TextVAlign = "top" | "center" | "baseline" | "bottom";
export type TextDirection = "ltr" | "rtl" | "ttb" | "btt";

export type Text = {
  kind: "shape.text";
  dim: "2D";
  text: string;
  size: number;
  font?: string;
  halign: TextHAlign;
  valign: TextVAlign;
  spacing: number;
  direction: TextDirection;
  language: string;
  script: string;
};

export type Import2D = {
  kind: "shape.import";
  dim: "2D";
  file: string;
  layer?: string;
  convexity: number;
};

// --- 3D shapes ---

export type Sphere = { kind: "shape.sphere"; dim: "3D"; radius: number };

export type Cube = {
  kind: "shape.cube";
  dim: "3D";
  size: Vec3;
  center: boolean;
};

export type Cylinder = {
  kind: "shape.cylinder";
  dim: "3D";
  radius: number;
  height: number;
  center: boolean;
};

export type Frustum = {
  kind: "shape.frustum";
  dim: "3D";
  radius1: number;
  radius2: number;
  height: number;
  center: boolean;
};

export type Polyhedron = {
  kind: "shape.polyhedron";
  dim: "3D";
  points: Vec3[];
  faces: number[][];
  convexity: number;
};

export type Import3D = {
  kind: "shape.import";
  dim: "3D";
  file: string;
  convexity: number;
};

export type Surface = {
  kind: "shape.surface";
  dim: "3D";
  file: string;
  center: boolean;
  invert: boolean;
  convexity: number;
};

// --- Booleans ---

export type Union<D extends Dimension = Dimension> = {
  kind: "boolean.union";
  dim: D;
  children: Members[D][];
};

export type Difference<D extends Dimension = Dimension> = {
  kind: "boolean.difference";
  dim: D;
  children: Members[D][];
};

export type Intersection<D extends Dimension = Dimension> = {
  kind: "boolean.intersection";
  dim: D;
  children: Members[D][];
};

// --- Transformations ---

export type Translate<D extends Dimension = Dimension> = {
  kind: "transform.translate";
  dim: D;
  vector: VectorOf[D];
  children: Members[D][];
};

// Angles are radians; the transpiler emits degrees.
export type Rotate<D extends Dimension = Dimension> = {
  kind: "transform.rotate";
  dim: D;
  angle: AngleOf[D];
  children: Members[D][];
};

export type Scale<D extends Dimension = Dimension> = {
  kind: "transform.scale";
  dim: D;
  vector: VectorOf[D];
  children: Members[D][];
};

export type Resize<D extends Dimension = Dimension> = {
  kind: "transform.resize";
  dim: D;
  size: VectorOf[D];
  children: Members[D][];
};

export type Mirror<D extends Dimension = Dimension> = {
  kind: "transform.mirror";
  dim: D;
  vector: Vec3;
  children: Members[D][];
};

export type Multmatrix<D extends Dimension = Dimension> = {
  kind: "transform.multmatrix";
  dim: D;
  matrix: Vec4[];
  children: Members[D][];
};

export type ColorValue = Vec3 | Vec4 | string;

export type Color<D extends Dimension = Dimension> = {
  kind: "transform.color";
  dim: D;
  color: ColorValue;
  children: Members[D][];
};

export type Hull<D extends Dimension = Dimension> = {
  kind: "transform.hull";
  dim: D;
  children: Members[D][];
};

export type Minkowski<D extends Dimension = Dimension> = {
  kind: "transform.minkowski";
  dim: D;
  convexity: number;
  children: Members[D][];
};

export type RoundedOffset = {
  kind: "offset.rounded";
  dim: "2D";
  distance: number;
  children: Members["2D"][];
};

export type AngledOffset = {
  kind: "offset.angled";
  dim: "2D";
  distance: number;
  chamfer: boolean;
  children: Members["2D"][];
};

export type Projection = {
  kind: "transform.projection";
  dim: "2D";
  cut: boolean;
  children: Members["3D"][];
};

export type Render = {
  kind: "transform.render";
  dim: "3D";
  convexity: number;
  children: Members["3D"][];
};

// --- Extrusions ---

export type LinearExtrude = {
  kind: "extrude.linear";
  dim: "3D";
  height: number;
  center: boolean;
  convexity: number;
  twist: number;
  slices?: number;
  scale: number | Vec2;
  children: Members["2D"][];
};

export type RotateExtrude = {
  kind: "extrude.rotational";
  dim: "3D";
  angle: number;
  convexity: number;
  children: Members["2D"][];
};

// --- Modifiers ---

export type ModifierKind =
  | "modifier.background"
  | "modifier.debug"
  | "modifier.root"
  | "modifier.disable";

export type Modifier<
  K extends ModifierKind = ModifierKind,
  D extends Dimension = Dimension,
> = {
  kind: K;
  dim: D;
  child: Members[D];
};

export type Background<D extends Dimension = Dimension> = Modifier<"modifier.background", D>;
export type Debug<D extends Dimension = Dimension> = Modifier<"modifier.debug", D>;
export type Root<D extends Dimension = Dimension> = Modifier<"modifier.root", D>;
export type Disable<D extends Dimension = Dimension> = Modifier<"modifier.disable", D>;

// --- Modules ---

export type ModuleDefinition<D extends Dimension = Dimension> = {
  kind: "module.definition";
  dim: D;
  name: string;
  children: Members[D][];
};

export type ModuleCall<D extends Dimension = Dimension> = {
  kind: "module.call";
  dim: D;
  name: string;
  children: Members[D][];
};

// A call without children has no dimensionality of its own.
export type ModuleCallND = {
  kind: "module.call";
  dim: "ND";
  name: string;
};

export type ModuleChildren = { kind: "module.children"; dim: "ND" };

// --- Metadata ---

export type Comment = { kind: "meta.comment"; dim: "ND"; lines: string[] };

export type Commented<D extends Dimension = Dimension> = {
  kind: "meta.commented";
  dim: D;
  comment: Comment;
  subject: SubjectOf[D];
};

export type SpecialValue = number | boolean | string;

export type SpecialVariable = {
  kind: "meta.special";
  dim: "ND";
  variable: string;
  preview?: SpecialValue;
  render?: SpecialValue;
};

export type EchoValue = number | boolean | string;

export type Echo = { kind: "meta.echo"; dim: "ND"; values: EchoValue[] };

// --- Roster ---

export type Expression2D =
  | Circle
  | Square
  | Rectangle
  | Polygon
  | Text
  | Import2D
  | Union<"2D">
  | Difference<"2D">
  | Intersection<"2D">
  | Translate<"2D">
  | Rotate<"2D">
  | Scale<"2D">
  | Resize<"2D">
  | Mirror<"2D">
  | Multmatrix<"2D">
  | Color<"2D">
  | Hull<"2D">
  | Minkowski<"2D">
  | RoundedOffset
  | AngledOffset
  | Projection
  | Background<"2D">
  | Debug<"2D">
  | Root<"2D">
  | Disable<"2D">
  | ModuleDefinition<"2D">
  | ModuleCall<"2D">
  | Commented<"2D">;

export type Expression3D =
  | Sphere
  | Cube
  | Cylinder
  | Frustum
  | Polyhedron
  | Import3D
  | Surface
  | Union<"3D">
  | Difference<"3D">
  | Intersection<"3D">
  | Translate<"3D">
  | Rotate<"3D">
  | Scale<"3D">
  | Resize<"3D">
  | Mirror<"3D">
  | Multmatrix<"3D">
  | Color<"3D">
  | Hull<"3D">
  | Minkowski<"3D">
  | Render
  | LinearExtrude
  | RotateExtrude
  | Background<"3D">
  | Debug<"3D">
  | Root<"3D">
  | Disable<"3D">
  | ModuleDefinition<"3D">
  | ModuleCall<"3D">
  | Commented<"3D">;

export type ExpressionND =
  | Comment
  | SpecialVariable
  | Echo
  | ModuleCallND
  | ModuleChildren;

export type Expression = Expression2D | Expression3D | ExpressionND;

export type DimensionedExpression = Expression2D | Expression3D;

export type ExpressionKind = Expression["kind"];

export type ExpressionOf<D extends DimensionClass> = D extends "2D"
  ? Expression2D
  : D extends "3D"
    ? Expression3D
    : ExpressionND;

// --- Assets ---

export type Gimbal = {
  kind: "camera.gimbal";
  translation: Vec3;
  rotation: Vec3;
  distance: number;
};

export type VectorCamera = {
  kind: "camera.vector";
  eye: Vec3;
  center: Vec3;
};

export type Camera = Gimbal | VectorCamera;

export type Image = {
  // Relative to the render directory.
  path: string;
  camera?: Camera;
  size?: [number, number];
  colorscheme: string;
};

export type Content = () => Expression[];

export type Asset = {
  name: string;
  content: Content;
  modules: Asset[];
  suffixes: string[];
  images: Image[];
  chiral: boolean;
  mirrored: boolean;
};

export const DEFAULT_ASSET_NAME = "untitled";
export const DEFAULT_SUFFIXES: readonly string[] = [".stl"];
