import { asset, gimbal, image } from "../../asset.js";
import { deg } from "../../dsl/core.js";
import { difference, union } from "../../dsl/booleans.js";
import { comment } from "../../dsl/metadata.js";
import { cube, cylinder } from "../../dsl/shapes.js";
import { rotate, translate } from "../../dsl/transforms.js";
import type { AssetDefinition } from "./types.js";

// The cutout sits off-center, so the bracket has a left and a right hand.
export const lBracketCutout: AssetDefinition = {
  id: "l-bracket-cutout",
  title: "L Bracket With Offset Cutout",
  sourcePath: "src/examples/parts/l_bracket_cutout.ts",
  asset: asset(
    () => [
      comment(
        "L bracket",
        difference(
          union(cube([60, 40, 6], false), cube([6, 40, 50], false)),
          translate([40, 12, -1], cylinder(5, 8, false)),
          translate([-1, 20, 35], rotate([0, deg(90), 0], cylinder(4, 8, false)))
        )
      ),
    ],
    {
      name: "l_bracket",
      chiral: true,
      images: [
        image("l_bracket.png", {
          camera: gimbal({ rotation: [55, 0, 25], distance: 200 }),
          size: [800, 600],
        }),
      ],
    }
  ),
  tags: ["bracket", "chiral"],
};
