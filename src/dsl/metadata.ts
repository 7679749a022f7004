import type {
  Comment,
  Commented,
  Echo,
  EchoValue,
  Expression,
  SpecialValue,
  SpecialVariable,
} from "../ir.js";
import { compact, dimensionedSubject } from "./utils.js";

/**
 * A comment in the OpenSCAD output, alone or attached to the expression it
 * describes. Each line of the content becomes one `//` line.
 */
export function comment(content: string | string[]): Comment;
export function comment(
  content: string | string[],
  subject: Expression
): Commented<"2D"> | Commented<"3D">;
export function comment(
  content: string | string[],
  subject?: Expression
): Comment | Commented<"2D"> | Commented<"3D"> {
  const parts = typeof content === "string" ? [content] : content;
  const node: Comment = {
    kind: "meta.comment",
    dim: "ND",
    lines: parts.flatMap((part) => part.split("\n")),
  };
  if (subject === undefined) return node;
  const group = dimensionedSubject(subject, "comment");
  if (group.dim === "2D") {
    return { kind: "meta.commented", dim: group.dim, comment: node, subject: group.subject };
  }
  return { kind: "meta.commented", dim: group.dim, comment: node, subject: group.subject };
}

/**
 * Read or assign one of OpenSCAD's special variables, such as `$fn`. Two
 * values make a ternary on `$preview`: the first applies in preview, the
 * second in the final render.
 */
export const special = (
  variable: string,
  preview?: SpecialValue,
  render?: SpecialValue
): SpecialVariable =>
  compact({ kind: "meta.special", dim: "ND", variable, preview, render });

export const echo = (...values: EchoValue[]): Echo => ({
  kind: "meta.echo",
  dim: "ND",
  values: [...values],
});
