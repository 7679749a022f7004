import type { Expression, Modifier, ModifierKind } from "../ir.js";
import { classify } from "../dimensionality.js";
import { memberOf } from "./utils.js";

type Modified<K extends ModifierKind> = Modifier<K, "2D"> | Modifier<K, "3D">;

// A modifier takes the dimensionality of its child; a dimensionless child counts as 3D.
function modify<K extends ModifierKind>(kind: K, child: Expression): Modified<K> {
  if (classify([child], "modify") === "2D") {
    return { kind, dim: "2D", child: memberOf("2D", child, "modify") };
  }
  return { kind, dim: "3D", child: memberOf("3D", child, "modify") };
}

// OpenSCAD's % modifier: transparent, excluded from the render.
export const background = (child: Expression): Modified<"modifier.background"> =>
  modify("modifier.background", child);

// OpenSCAD's # modifier: highlighted.
export const debug = (child: Expression): Modified<"modifier.debug"> =>
  modify("modifier.debug", child);

// OpenSCAD's ! modifier: show only this.
export const root = (child: Expression): Modified<"modifier.root"> =>
  modify("modifier.root", child);

// OpenSCAD's * modifier.
export const disable = (child: Expression): Modified<"modifier.disable"> =>
  modify("modifier.disable", child);
