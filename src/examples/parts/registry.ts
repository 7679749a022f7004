import type { AssetDefinition } from "./types.js";
import { hingeKnuckle } from "./hinge_knuckle.js";
import { lBracketCutout } from "./l_bracket_cutout.js";
import { plateHole } from "./plate_hole.js";
import { roundedPost } from "./rounded_post.js";

export const assetRegistry: AssetDefinition[] = [
  plateHole,
  roundedPost,
  lBracketCutout,
  hingeKnuckle,
];

export function assetRegistryById(): Map<string, AssetDefinition> {
  return new Map(assetRegistry.map((entry) => [entry.id, entry]));
}
