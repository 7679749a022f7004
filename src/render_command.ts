import { posix } from "node:path";
import type { Asset, Camera, Image } from "./ir.js";
import type { OutputContext } from "./dsl/core.js";

export type RenderCommandInput = {
  executable: string;
  input: string;
  output?: string;
  image?: Image;
};

export type RenderJob = {
  kind: "model" | "image";
  asset: string;
  input: string;
  output: string;
  argv: string[];
};

// Arguments for one run of the renderer, executable first.
export function composeRenderCommand(command: RenderCommandInput): string[] {
  const argv = [command.executable];
  if (command.output) argv.push("-o", command.output);
  const image = command.image;
  if (image) {
    if (image.camera) argv.push("--camera", cameraArgument(image.camera));
    if (image.size) argv.push("--imgsize", image.size.join(","));
    if (image.colorscheme) argv.push("--colorscheme", image.colorscheme);
  }
  argv.push(command.input);
  return argv;
}

export function scadPath(asset: Asset, context: OutputContext): string {
  return posix.join(context.scadDir, `${asset.name}.scad`);
}

/**
 * One job per output suffix and one per image of a finalized asset. The jobs
 * are descriptions only; running them is up to the caller.
 */
export function renderJobs(asset: Asset, context: OutputContext): RenderJob[] {
  const input = scadPath(asset, context);
  const jobs: RenderJob[] = [];
  for (const suffix of asset.suffixes) {
    const output = posix.join(context.renderDir, `${asset.name}${suffix}`);
    jobs.push({
      kind: "model",
      asset: asset.name,
      input,
      output,
      argv: composeRenderCommand({ executable: context.executable, input, output }),
    });
  }
  for (const image of asset.images) {
    const output = posix.join(context.renderDir, image.path);
    jobs.push({
      kind: "image",
      asset: asset.name,
      input,
      output,
      argv: composeRenderCommand({ executable: context.executable, input, output, image }),
    });
  }
  return jobs;
}

function cameraArgument(camera: Camera): string {
  switch (camera.kind) {
    case "camera.gimbal":
      return [...camera.translation, ...camera.rotation, camera.distance].join(",");
    case "camera.vector":
      return [...camera.eye, ...camera.center].join(",");
  }
}
