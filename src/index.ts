export * from "./ir.js";
export * from "./dsl.js";
export * from "./errors.js";
export {
  classify,
  classifyDimensioned,
  describeValue,
  dimensionOf,
  isExpression,
  matchAgainstArgument,
  requireDimension,
} from "./dimensionality.js";
export type { VerbOptions } from "./dimensionality.js";
export { EXPRESSION_KINDS, MODIFIER_SYMBOLS, NODE_META, metaFor } from "./ir_meta.js";
export type { AnyNodeMeta, FieldMeta, GenericKind, NodeMeta } from "./ir_meta.js";
export { add, div, mul, sub } from "./ops.js";
export { formatLiteral, formatNumber, formatString, radiansToDegrees } from "./scad_literal.js";
export { transpile, transpileToString } from "./transpile.js";
export type { LineGen, Transpilable } from "./transpile.js";
export { sameValue, stableStringify } from "./hash.js";
export {
  asset,
  assetFingerprint,
  expressionsEqual,
  finalize,
  gimbal,
  image,
  isAsset,
  mirrorX,
  mirroredName,
  packageAsset,
  refine,
  vectorCamera,
} from "./asset.js";
export type {
  AssetInput,
  AssetOptions,
  AssetSpec,
  ContentInput,
  FinalizeOptions,
  RefineOptions,
} from "./asset.js";
export { composeRenderCommand, renderJobs, scadPath } from "./render_command.js";
export type { RenderCommandInput, RenderJob } from "./render_command.js";
export { assetLines, assetText, warnPlaceholders, writeAssets } from "./writer.js";
export type { WriteFailure, WriteOptions, WriteResult, WrittenAsset } from "./writer.js";
export {
  SCAD_BUNDLE_SCHEMA,
  createScadBundle,
  readScadBundle,
} from "./bundle/container.js";
export type {
  BundleAssetMeta,
  BundleManifest,
  BundleManifestFile,
  BundleOptions,
  BundleReadResult,
} from "./bundle/container.js";
