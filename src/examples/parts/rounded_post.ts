import { asset } from "../../asset.js";
import { extrude } from "../../dsl/extrusions.js";
import { roundCorners } from "../../dsl/helpers.js";
import { special } from "../../dsl/metadata.js";
import { square } from "../../dsl/shapes.js";
import type { AssetDefinition } from "./types.js";

export const roundedPost: AssetDefinition = {
  id: "rounded-post",
  title: "Post With Rounded Edges",
  sourcePath: "src/examples/parts/rounded_post.ts",
  asset: asset(
    () => [special("$fn", 16, 64), extrude({ height: 40 }, roundCorners(2, [square([12, 12])]))],
    { name: "rounded_post", suffixes: [".stl", ".3mf"] }
  ),
  tags: ["post"],
};
