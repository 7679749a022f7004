import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Asset } from "./ir.js";
import { finalize, packageAsset } from "./asset.js";
import type { AssetInput, FinalizeOptions } from "./asset.js";
import { context } from "./dsl/core.js";
import type { OutputContext } from "./dsl/core.js";
import { ExpressionTypeError, ScadError } from "./errors.js";
import { renderJobs, scadPath } from "./render_command.js";
import type { RenderJob } from "./render_command.js";
import { transpile } from "./transpile.js";
import type { LineGen } from "./transpile.js";

export type WriteOptions = Partial<OutputContext> &
  Omit<FinalizeOptions, "flipChiral"> & {
    // Names untitled assets; counts up per call by default.
    invocation?: number;
  };

export type WrittenAsset = {
  name: string;
  path: string;
  jobs: RenderJob[];
};

export type WriteFailure = {
  name: string;
  error: ScadError | ExpressionTypeError;
};

export type WriteResult = {
  written: WrittenAsset[];
  failures: WriteFailure[];
};

let invocations = 0;

// Every top-level expression, each followed by a blank line.
export function* assetLines(asset: Asset): LineGen {
  for (const expression of asset.content()) {
    yield* transpile(expression);
    yield "";
  }
}

export function assetText(asset: Asset): string {
  let text = "";
  for (const line of assetLines(asset)) text += `${line}\n`;
  return text;
}

export function warnPlaceholders(asset: Asset): void {
  if (asset.images.length > 0) {
    console.warn(
      `scad-ir: Images are a data-only placeholder; nothing is rendered (asset ${asset.name}).`
    );
  }
}

/**
 * Finalize each input and write one .scad file per resulting asset. An input
 * that fails to build or transpile is skipped and reported; the rest are
 * still written.
 */
export async function writeAssets(
  inputs: AssetInput[],
  options: WriteOptions = {}
): Promise<WriteResult> {
  const ctx = context(options);
  const invocation = options.invocation ?? invocations;
  invocations += 1;
  const result: WriteResult = { written: [], failures: [] };

  for (const [ordinal, raw] of inputs.entries()) {
    let name = `untitled_${invocation}_${ordinal}`;
    let outputs: { asset: Asset; path: string; text: string }[];
    try {
      const packaged = packageAsset(raw, invocation, ordinal);
      name = packaged.name;
      warnPlaceholders(packaged);
      outputs = finalize(packaged, {
        flipChiral: ctx.flipChiral,
        renameMirrored: options.renameMirrored,
        renameChiral: options.renameChiral,
        renameAchiral: options.renameAchiral,
      }).map((asset) => ({ asset, path: scadPath(asset, ctx), text: assetText(asset) }));
    } catch (err) {
      if (!(err instanceof ScadError || err instanceof ExpressionTypeError)) throw err;
      console.warn(`scad-ir: Skipped asset ${name}: ${err.message}`);
      result.failures.push({ name, error: err });
      continue;
    }

    for (const output of outputs) {
      await mkdir(dirname(output.path), { recursive: true });
      await writeFile(output.path, output.text, "utf8");
      result.written.push({
        name: output.asset.name,
        path: output.path,
        jobs: renderJobs(output.asset, ctx),
      });
    }
  }
  return result;
}
