import type {
  Asset,
  Camera,
  Content,
  Expression,
  Gimbal,
  Image,
  Vec3,
  VectorCamera,
} from "./ir.js";
import { DEFAULT_ASSET_NAME, DEFAULT_SUFFIXES } from "./ir.js";
import { describeValue, isExpression } from "./dimensionality.js";
import { ConstructionError, ExpressionTypeError } from "./errors.js";
import { sameValue, stableStringify } from "./hash.js";
import { union } from "./dsl/booleans.js";
import { module } from "./dsl/modules.js";
import { mirror } from "./dsl/transforms.js";
import {
  ensurePositive,
  ensureRelativePath,
  ensureVector,
  relativePathProblem,
} from "./validate.js";

export type ContentInput = Expression | Expression[] | Content;

export type AssetOptions = {
  name?: string;
  modules?: Asset[];
  suffixes?: string[];
  images?: Image[];
  chiral?: boolean;
  mirrored?: boolean;
};

// The plain-object form of an asset, as accepted by the writer.
export type AssetSpec = AssetOptions & { content: ContentInput };

export type AssetInput = Asset | AssetSpec | ContentInput;

export type RefineOptions = {
  // Mirror the bodies of chiral modules.
  flipChiral?: boolean;
};

export type FinalizeOptions = {
  flipChiral?: boolean;
  renameMirrored?: (name: string) => string;
  renameChiral?: (name: string) => string;
  renameAchiral?: (name: string) => string;
};

const X_AXIS: Vec3 = [1, 0, 0];

const identity = (name: string): string => name;

export const mirroredName = (name: string): string => `${name}_mirrored`;

export function asset(content: ContentInput, opts: AssetOptions = {}): Asset {
  const name = opts.name ?? DEFAULT_ASSET_NAME;
  ensureAssetName(name);
  const suffixes = [...(opts.suffixes ?? DEFAULT_SUFFIXES)];
  for (const suffix of suffixes) {
    if (!/^\.[A-Za-z0-9]+$/.test(suffix)) {
      throw new ConstructionError(
        "construction_suffix",
        `Invalid output suffix ${JSON.stringify(suffix)} for asset ${name}.`,
        { name, suffix }
      );
    }
  }
  return {
    name,
    content: normalizeContent(content, name),
    modules: [...(opts.modules ?? [])],
    suffixes,
    images: [...(opts.images ?? [])],
    chiral: opts.chiral ?? false,
    mirrored: opts.mirrored ?? false,
  };
}

export function image(
  path: string,
  opts: { camera?: Camera; size?: [number, number]; colorscheme?: string } = {}
): Image {
  ensureRelativePath(path, "construction_image_path", "image path");
  if (opts.size) {
    ensureVector(opts.size, [2], "construction_image_size", "image size");
    for (const side of opts.size) {
      if (!Number.isInteger(side) || side <= 0) {
        throw new ConstructionError(
          "construction_image_size",
          `Image size must be positive whole pixels, not ${opts.size.join(",")}.`
        );
      }
    }
  }
  return {
    path,
    camera: opts.camera,
    size: opts.size ? [opts.size[0], opts.size[1]] : undefined,
    colorscheme: opts.colorscheme ?? "",
  };
}

export function gimbal(opts: {
  translation?: Vec3;
  rotation?: Vec3;
  distance: number;
}): Gimbal {
  const translation = opts.translation ?? [0, 0, 0];
  const rotation = opts.rotation ?? [0, 0, 0];
  ensureVector(translation, [3], "construction_camera", "camera translation");
  ensureVector(rotation, [3], "construction_camera", "camera rotation");
  return {
    kind: "camera.gimbal",
    translation: [translation[0], translation[1], translation[2]],
    rotation: [rotation[0], rotation[1], rotation[2]],
    distance: ensurePositive(opts.distance, "construction_camera_distance", "camera distance"),
  };
}

export function vectorCamera(eye: Vec3, center: Vec3 = [0, 0, 0]): VectorCamera {
  ensureVector(eye, [3], "construction_camera", "camera eye");
  ensureVector(center, [3], "construction_camera", "camera center");
  return {
    kind: "camera.vector",
    eye: [eye[0], eye[1], eye[2]],
    center: [center[0], center[1], center[2]],
  };
}

export function isAsset(value: unknown): value is Asset {
  if (!value || typeof value !== "object" || Array.isArray(value)) return false;
  return (
    typeof Reflect.get(value, "name") === "string" &&
    typeof Reflect.get(value, "content") === "function" &&
    Array.isArray(Reflect.get(value, "modules")) &&
    Array.isArray(Reflect.get(value, "suffixes")) &&
    Array.isArray(Reflect.get(value, "images")) &&
    typeof Reflect.get(value, "chiral") === "boolean" &&
    typeof Reflect.get(value, "mirrored") === "boolean"
  );
}

/**
 * Turn loose input into an asset. Anything without a name of its own is
 * called `untitled_<invocation>_<ordinal>`.
 */
export function packageAsset(raw: AssetInput, invocation: number, ordinal: number): Asset {
  if (isAsset(raw)) return raw;
  const fallback = `${DEFAULT_ASSET_NAME}_${invocation}_${ordinal}`;
  if (typeof raw === "function" || Array.isArray(raw) || isExpression(raw)) {
    return asset(raw, { name: fallback });
  }
  return asset(raw.content, {
    name: raw.name,
    modules: raw.modules,
    suffixes: raw.suffixes,
    images: raw.images,
    chiral: raw.chiral,
    mirrored: raw.mirrored,
  });
}

/**
 * Promote every module of the asset to a named module definition, placed
 * ahead of the asset's own content. Modules of modules come first.
 */
export function refine(subject: Asset, opts: RefineOptions = {}): Asset {
  const flip = opts.flipChiral ?? true;
  const modules = subject.modules;
  const own = subject.content;
  const content: Content = () => [...moduleDefinitions(modules, flip, new Set()), ...own()];
  return { ...subject, content, modules: [] };
}

/**
 * Prepare an asset for output: flatten its modules and, if it is chiral,
 * add its mirror image as a second asset.
 */
export function finalize(subject: Asset, opts: FinalizeOptions = {}): Asset[] {
  const chiral = isChiral(subject);
  const rename = chiral
    ? opts.renameChiral ?? identity
    : opts.renameAchiral ?? identity;
  const first: Asset = {
    ...refine(subject, { flipChiral: false }),
    name: rename(subject.name),
  };
  if (!chiral || subject.mirrored || !(opts.flipChiral ?? true)) return [first];

  const name = (opts.renameMirrored ?? mirroredName)(subject.name);
  if (!subject.chiral) {
    // Only the modules are chiral: flip their bodies where they are defined.
    return [first, { ...refine(subject, { flipChiral: true }), name, mirrored: true }];
  }
  const base = first.content;
  return [first, { ...first, name, mirrored: true, content: () => base().map(mirrorX) }];
}

const UNPLACED_KINDS: ReadonlySet<Expression["kind"]> = new Set([
  "module.definition",
  "meta.comment",
  "meta.special",
  "meta.echo",
]);

/**
 * Mirror a top-level expression across x. Module definitions and statements
 * that place no geometry stay as they are; module calls are mirrored at the
 * call site.
 */
export function mirrorX(expression: Expression): Expression {
  if (UNPLACED_KINDS.has(expression.kind)) return expression;
  return mirror(X_AXIS, expression);
}

export function expressionsEqual(a: unknown, b: unknown): boolean {
  return sameValue(a, b);
}

export function assetFingerprint(subject: Asset): string {
  return stableStringify({
    name: subject.name,
    content: subject.content(),
    suffixes: subject.suffixes,
    images: subject.images,
    chiral: subject.chiral,
    mirrored: subject.mirrored,
  });
}

function isChiral(subject: Asset): boolean {
  return subject.chiral || hasChiralModule(subject);
}

function hasChiralModule(subject: Asset): boolean {
  return subject.modules.some((entry) => entry.chiral || hasChiralModule(entry));
}

function moduleDefinitions(
  modules: readonly Asset[],
  flip: boolean,
  seen: Set<string>
): Expression[] {
  const definitions: Expression[] = [];
  for (const entry of modules) {
    definitions.push(...moduleDefinitions(entry.modules, flip, seen));
    if (seen.has(entry.name)) continue;
    seen.add(entry.name);
    definitions.push(moduleDefinition(entry, flip));
  }
  return definitions;
}

function moduleDefinition(entry: Asset, flip: boolean): Expression {
  const expressions = entry.content();
  let body: Expression[] = expressions.length > 1 ? [union(...expressions)] : expressions;
  if (entry.chiral && !entry.mirrored && flip) {
    body = body.map((expression) => mirror(X_AXIS, expression));
  }
  return module(entry.name, ...body);
}

function normalizeContent(content: ContentInput, name: string): Content {
  if (typeof content === "function") {
    return () => expressionsOf(content(), name);
  }
  const expressions = expressionsOf(Array.isArray(content) ? content : [content], name);
  return () => [...expressions];
}

function expressionsOf(values: readonly unknown[], name: string): Expression[] {
  if (!Array.isArray(values)) {
    throw new ExpressionTypeError(
      `Content of asset ${name} must be a list of OpenSCAD expressions, not ${describeValue(values)}.`,
      { name }
    );
  }
  return values.map((value, index) => {
    if (!isExpression(value)) {
      throw new ExpressionTypeError(
        `Cannot package non-OpenSCAD expression ${describeValue(value)} in asset ${name}.`,
        { name, index }
      );
    }
    return value;
  });
}

function ensureAssetName(name: string): void {
  const problem = typeof name === "string" ? relativePathProblem(name) : "not a string";
  if (problem || name.includes("/")) {
    throw new ConstructionError(
      "construction_asset_name",
      `Invalid asset name ${JSON.stringify(name)}: ${problem ?? "no / separators"}.`,
      { name }
    );
  }
}
