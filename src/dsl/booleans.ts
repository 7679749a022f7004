import type { Difference, Expression, Intersection, Union } from "../ir.js";
import { container, grouped } from "./utils.js";

export const union = (...children: Expression[]): Union<"2D"> | Union<"3D"> =>
  container("boolean.union", grouped(children), {});

// The first child is the minuend.
export const difference = (
  ...children: Expression[]
): Difference<"2D"> | Difference<"3D"> =>
  container(
    "boolean.difference",
    grouped(children, "contain", { verbFirst: "subtract from", verbRest: "subtract" }),
    {}
  );

export const intersection = (
  ...children: Expression[]
): Intersection<"2D"> | Intersection<"3D"> =>
  container("boolean.intersection", grouped(children), {});
