import { context, deg } from "./dsl/core.js";
import { difference, intersection, union } from "./dsl/booleans.js";
import {
  circle,
  cube,
  cylinder,
  importFile,
  polygon,
  polyhedron,
  sphere,
  square,
  surface,
  text,
} from "./dsl/shapes.js";
import {
  color,
  cut,
  hull,
  minkowski,
  mirror,
  multmatrix,
  offset,
  projection,
  render,
  resize,
  rotate,
  scale,
  translate,
} from "./dsl/transforms.js";
import { extrude, linearExtrude, rotateExtrude } from "./dsl/extrusions.js";
import { background, debug, disable, root } from "./dsl/modifiers.js";
import { callModule, children, module } from "./dsl/modules.js";
import { comment, echo, special } from "./dsl/metadata.js";
import { pairwiseHull, roundCorners, unionMap } from "./dsl/helpers.js";
import { asset, gimbal, image, vectorCamera } from "./asset.js";

export type { OutputContext } from "./dsl/core.js";
export type { TextOptions } from "./dsl/shapes.js";
export type { ConvexityOptions, OffsetOptions } from "./dsl/transforms.js";
export type {
  ExtrudeOptions,
  LinearExtrudeOptions,
  RotateExtrudeOptions,
} from "./dsl/extrusions.js";

export {
  context,
  deg,
  circle,
  square,
  polygon,
  text,
  importFile,
  sphere,
  cube,
  cylinder,
  polyhedron,
  surface,
  union,
  difference,
  intersection,
  translate,
  rotate,
  scale,
  resize,
  mirror,
  multmatrix,
  color,
  offset,
  hull,
  minkowski,
  render,
  projection,
  cut,
  extrude,
  linearExtrude,
  rotateExtrude,
  background,
  debug,
  root,
  disable,
  module,
  callModule,
  children,
  comment,
  special,
  echo,
  pairwiseHull,
  roundCorners,
  unionMap,
};

export const dsl = {
  context,
  deg,
  circle,
  square,
  polygon,
  text,
  importFile,
  sphere,
  cube,
  cylinder,
  polyhedron,
  surface,
  union,
  difference,
  intersection,
  translate,
  rotate,
  scale,
  resize,
  mirror,
  multmatrix,
  color,
  offset,
  hull,
  minkowski,
  render,
  projection,
  cut,
  extrude,
  linearExtrude,
  rotateExtrude,
  background,
  debug,
  root,
  disable,
  module,
  callModule,
  children,
  comment,
  special,
  echo,
  pairwiseHull,
  roundCorners,
  unionMap,
  asset,
  image,
  gimbal,
  vectorCamera,
};
