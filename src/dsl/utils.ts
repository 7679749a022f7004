import type { Dimension, Expression, Members, SubjectOf } from "../ir.js";
import {
  classify,
  describeValue,
  isExpression,
  requireDimension,
} from "../dimensionality.js";
import type { VerbOptions } from "../dimensionality.js";
import { ConstructionError, DimensionalityMismatchError } from "../errors.js";

export function compact<T extends Record<string, unknown>>(value: T): T {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry !== undefined) result[key] = entry;
  }
  return result as T;
}

// Children sorted into the member type of the container that will hold them.
export type Grouped =
  | { dim: "2D"; members: Members["2D"][] }
  | { dim: "3D"; members: Members["3D"][] };

export type ContainerOf<K extends string, F> =
  | ({ kind: K; dim: "2D"; children: Members["2D"][] } & F)
  | ({ kind: K; dim: "3D"; children: Members["3D"][] } & F);

export function isMember<D extends Dimension>(dim: D, value: unknown): value is Members[D] {
  return isExpression(value) && (value.dim === "ND" || value.dim === dim);
}

export function memberOf<D extends Dimension>(
  dim: D,
  value: unknown,
  verb: string
): Members[D] {
  if (!isMember(dim, value)) {
    throw new DimensionalityMismatchError(
      "dimensionality_mismatch",
      `Cannot ${verb} ${describeValue(value)}; ${dim} required.`,
      { verb, expected: dim }
    );
  }
  return value;
}

export function membersOf<D extends Dimension>(
  dim: D,
  children: readonly unknown[],
  verb: string
): Members[D][] {
  return children.map((child) => memberOf(dim, child, verb));
}

export function grouped(
  children: readonly unknown[],
  verb = "contain",
  opts: VerbOptions = {}
): Grouped {
  const dim = classify(children, verb, opts);
  if (dim === "2D") return { dim, members: membersOf(dim, children, verb) };
  return { dim, members: membersOf(dim, children, verb) };
}

// Children of a container that only accepts one dimensionality.
export function requireMembers<D extends Dimension>(
  dim: D,
  children: readonly unknown[],
  verb: string
): Members[D][] {
  requireDimension(verb, dim, children);
  return membersOf(dim, children, verb);
}

export function container<K extends string, F extends object>(
  kind: K,
  group: Grouped,
  fields: F
): ContainerOf<K, F> {
  if (group.dim === "2D") {
    return { ...fields, kind, dim: group.dim, children: group.members };
  }
  return { ...fields, kind, dim: group.dim, children: group.members };
}

export type ConvexityOptions = { convexity?: number };

// Splits an optional leading options object off variadic children.
export function withConvexity(args: readonly (ConvexityOptions | Expression)[]): {
  convexity: number;
  children: unknown[];
} {
  const [first, ...rest] = args;
  if (first === undefined || isExpression(first)) {
    return { convexity: 1, children: [...args] };
  }
  const convexity = first.convexity ?? 1;
  if (!Number.isInteger(convexity) || convexity < 1) {
    throw new ConstructionError(
      "construction_convexity",
      `convexity must be a positive whole number, not ${String(convexity)}`
    );
  }
  return { convexity, children: rest };
}

export type SubjectGroup =
  | { dim: "2D"; subject: SubjectOf["2D"] }
  | { dim: "3D"; subject: SubjectOf["3D"] };

// A single dimensioned expression, as required by annotations.
export function dimensionedSubject(value: unknown, verb: string): SubjectGroup {
  classify([value], verb);
  if (isExpression(value)) {
    if (value.dim === "2D") return { dim: value.dim, subject: value };
    if (value.dim === "3D") return { dim: value.dim, subject: value };
  }
  throw new ConstructionError(
    "construction_subject",
    `Cannot ${verb} ${describeValue(value)}; a 2D or 3D expression is required.`
  );
}
