import { createHash } from "node:crypto";
import { strFromU8, strToU8, unzipSync, zipSync } from "fflate";
import type { Asset } from "../ir.js";
import { BundleError } from "../errors.js";
import { stableStringify } from "../hash.js";
import { relativePathProblem } from "../validate.js";
import { assetText } from "../writer.js";

export const SCAD_BUNDLE_SCHEMA = "scad-ir.bundle.v1";

const MANIFEST_PATH = "manifest.json";

export type BundleAssetMeta = {
  name: string;
  suffixes: string[];
  chiral: boolean;
  mirrored: boolean;
  images: number;
};

export type BundleManifestFile = {
  path: string;
  hash: string;
  bytes: number;
  asset: BundleAssetMeta;
};

export type BundleManifest = {
  schema: typeof SCAD_BUNDLE_SCHEMA;
  createdAt: string;
  files: BundleManifestFile[];
};

export type BundleReadResult = {
  manifest: BundleManifest;
  // OpenSCAD source by file path.
  files: Map<string, string>;
};

export type BundleOptions = {
  createdAt?: string;
};

/**
 * Zip the OpenSCAD source of finalized assets, one `<name>.scad` each, with a
 * manifest of hashes.
 */
export function createScadBundle(assets: Asset[], options: BundleOptions = {}): Uint8Array {
  const files: Record<string, Uint8Array> = {};
  const entries: BundleManifestFile[] = [];

  for (const asset of assets) {
    if (asset.modules.length > 0) {
      throw new BundleError(
        "bundle_unrefined",
        `Asset ${asset.name} still has modules; finalize it before bundling.`,
        { name: asset.name }
      );
    }
    const path = `${asset.name}.scad`;
    assertBundlePath(path);
    if (files[path]) {
      throw new BundleError("bundle_duplicate", `Duplicate bundle path: ${path}`, { path });
    }
    const data = strToU8(assetText(asset));
    files[path] = data;
    entries.push({
      path,
      hash: sha256Hex(data),
      bytes: data.byteLength,
      asset: {
        name: asset.name,
        suffixes: [...asset.suffixes],
        chiral: asset.chiral,
        mirrored: asset.mirrored,
        images: asset.images.length,
      },
    });
  }

  const manifest: BundleManifest = {
    schema: SCAD_BUNDLE_SCHEMA,
    createdAt: options.createdAt ?? new Date().toISOString(),
    files: entries,
  };
  files[MANIFEST_PATH] = strToU8(stableStringify(manifest));

  return zipSync(files, { level: 0 });
}

export function readScadBundle(bytes: Uint8Array): BundleReadResult {
  const archive = unzipSync(bytes);
  const manifestBytes = archive[MANIFEST_PATH];
  if (!manifestBytes) {
    throw new BundleError("bundle_manifest", "Missing manifest.json in bundle");
  }
  const manifest = parseManifest(manifestBytes);

  const files = new Map<string, string>();
  for (const entry of manifest.files) {
    assertBundlePath(entry.path);
    const data = archive[entry.path];
    if (!data) {
      throw new BundleError("bundle_missing", `Missing ${entry.path} in bundle`, {
        path: entry.path,
      });
    }
    const hash = sha256Hex(data);
    if (hash !== entry.hash) {
      throw new BundleError(
        "bundle_hash",
        `Hash mismatch for ${entry.path}. manifest=${entry.hash} computed=${hash}`,
        { path: entry.path }
      );
    }
    files.set(entry.path, strFromU8(data));
  }
  return { manifest, files };
}

function parseManifest(bytes: Uint8Array): BundleManifest {
  let parsed: unknown;
  try {
    parsed = JSON.parse(strFromU8(bytes));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new BundleError("bundle_manifest", `Failed to parse manifest.json: ${msg}`);
  }
  if (!parsed || typeof parsed !== "object") {
    throw new BundleError("bundle_manifest", "manifest.json is not an object");
  }
  const schema: unknown = Reflect.get(parsed, "schema");
  if (schema !== SCAD_BUNDLE_SCHEMA) {
    throw new BundleError(
      "bundle_schema",
      `Unsupported bundle schema: ${String(schema)}`,
      { schema: String(schema) }
    );
  }
  const createdAt: unknown = Reflect.get(parsed, "createdAt");
  const rawFiles: unknown = Reflect.get(parsed, "files");
  if (typeof createdAt !== "string" || !Array.isArray(rawFiles)) {
    throw new BundleError("bundle_manifest", "manifest.json lacks createdAt or files");
  }
  return { schema, createdAt, files: rawFiles.map(parseEntry) };
}

function parseEntry(raw: unknown): BundleManifestFile {
  if (!raw || typeof raw !== "object") {
    throw new BundleError("bundle_manifest", "Malformed file entry in manifest.json");
  }
  const path: unknown = Reflect.get(raw, "path");
  const hash: unknown = Reflect.get(raw, "hash");
  const bytes: unknown = Reflect.get(raw, "bytes");
  const asset: unknown = Reflect.get(raw, "asset");
  if (
    typeof path !== "string" ||
    typeof hash !== "string" ||
    typeof bytes !== "number" ||
    !asset ||
    typeof asset !== "object"
  ) {
    throw new BundleError("bundle_manifest", "Malformed file entry in manifest.json");
  }
  const name: unknown = Reflect.get(asset, "name");
  const suffixes: unknown = Reflect.get(asset, "suffixes");
  const chiral: unknown = Reflect.get(asset, "chiral");
  const mirrored: unknown = Reflect.get(asset, "mirrored");
  const images: unknown = Reflect.get(asset, "images");
  if (
    typeof name !== "string" ||
    !Array.isArray(suffixes) ||
    typeof chiral !== "boolean" ||
    typeof mirrored !== "boolean" ||
    typeof images !== "number"
  ) {
    throw new BundleError("bundle_manifest", `Malformed asset entry for ${path}`);
  }
  return {
    path,
    hash,
    bytes,
    asset: { name, suffixes: suffixes.map(String), chiral, mirrored, images },
  };
}

function assertBundlePath(path: string): void {
  const problem = path === MANIFEST_PATH ? "reserved filename" : relativePathProblem(path);
  if (problem) {
    throw new BundleError("bundle_path", `Invalid bundle path (${problem}): ${path}`, { path });
  }
}

function sha256Hex(data: Uint8Array): string {
  return `sha256:${createHash("sha256").update(data).digest("hex")}`;
}
