import { asset } from "../../asset.js";
import { union } from "../../dsl/booleans.js";
import { callModule } from "../../dsl/modules.js";
import { cube, cylinder } from "../../dsl/shapes.js";
import { translate } from "../../dsl/transforms.js";
import type { AssetDefinition } from "./types.js";

const arm = asset(
  () => [cube([30, 8, 4], false), translate([30, 4, 0], cylinder(4, 4, false))],
  { name: "arm", chiral: true }
);

const knuckle = asset(() => [cylinder(3, 20)], { name: "knuckle" });

export const hingeKnuckle: AssetDefinition = {
  id: "hinge-knuckle",
  title: "Hinge Leaf With Knuckle",
  sourcePath: "src/examples/parts/hinge_knuckle.ts",
  asset: asset(
    () => [union(callModule("arm"), translate([30, 4, 10], callModule("knuckle")))],
    { name: "hinge", modules: [arm, knuckle] }
  ),
  tags: ["hinge", "modules"],
};
