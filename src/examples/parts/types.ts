import type { Asset } from "../../ir.js";

export type AssetDefinition = {
  id: string;
  title: string;
  sourcePath?: string;
  asset: Asset;
  tags?: string[];
};
