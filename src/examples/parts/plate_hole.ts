import { asset } from "../../asset.js";
import { difference } from "../../dsl/booleans.js";
import { cube, cylinder } from "../../dsl/shapes.js";
import type { AssetDefinition } from "./types.js";

export const plateHole: AssetDefinition = {
  id: "plate-hole",
  title: "Plate With Center Hole",
  sourcePath: "src/examples/parts/plate_hole.ts",
  asset: asset(() => [difference(cube([90, 50, 12]), cylinder(9, 14))], {
    name: "plate_hole",
  }),
  tags: ["plate", "through-hole"],
};
