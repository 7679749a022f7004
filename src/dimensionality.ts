import type { Dimension, DimensionClass, Expression } from "./ir.js";
import { EXPRESSION_KINDS } from "./ir_meta.js";
import {
  DimensionalityMismatchError,
  DimensionalityZeroError,
  ExpressionTypeError,
} from "./errors.js";

export type VerbOptions = {
  // Used for the first child in messages about non-expressions.
  verbFirst?: string;
  // Used for every later child.
  verbRest?: string;
};

const DIMENSION_CLASSES = new Set<string>(["2D", "3D", "ND"]);

export function isExpression(value: unknown): value is Expression {
  if (!value || typeof value !== "object") return false;
  const kind: unknown = Reflect.get(value, "kind");
  const dim: unknown = Reflect.get(value, "dim");
  return (
    typeof kind === "string" &&
    EXPRESSION_KINDS.has(kind) &&
    typeof dim === "string" &&
    DIMENSION_CLASSES.has(dim)
  );
}

export function dimensionOf(expression: Expression): DimensionClass {
  return expression.dim;
}

export function classify(
  children: readonly unknown[],
  verb = "contain",
  opts: VerbOptions = {}
): Dimension {
  return partition(children, verb, opts).dimension ?? "3D";
}

// Like classify, but undefined when no child carries a dimensionality.
export function classifyDimensioned(
  children: readonly unknown[],
  verb = "contain",
  opts: VerbOptions = {}
): Dimension | undefined {
  return partition(children, verb, opts).dimension;
}

export function matchAgainstArgument(
  verb: string,
  argument: readonly number[],
  children: readonly unknown[]
): Dimension {
  const n = argument.length;
  const suffix = children.length === 1 ? "" : "s";
  const shown = formatArgument(argument);
  let own: Dimension;
  if (n === 2) {
    own = "2D";
  } else if (n === 3) {
    own = "3D";
  } else {
    throw new DimensionalityZeroError(
      `Cannot ${verb} OpenSCAD expression${suffix} with ${n}D argument ${shown}.`,
      { verb, argumentLength: n }
    );
  }

  const found = classify(children, verb);
  if (found === own) return own;

  throw new DimensionalityMismatchError(
    "dimensionality_argument",
    `Cannot ${verb} ${found} OpenSCAD expression${suffix} with ${own} argument ${shown}.`,
    { verb, expected: own, actual: found }
  );
}

export function requireDimension(
  verb: string,
  expected: Dimension,
  children: readonly unknown[]
): void {
  const found = classifyDimensioned(children, verb);
  if (found === undefined || found === expected) return;
  const suffix = children.length === 1 ? "" : "s";
  throw new DimensionalityMismatchError(
    "dimensionality_mismatch",
    `Cannot ${verb} ${found} OpenSCAD expression${suffix}; ${expected} required.`,
    { verb, expected, actual: found }
  );
}

export function describeValue(value: unknown): string {
  const type = `of type ${typeName(value)}`;
  const text = previewText(value);
  if (text === undefined) return type;
  if (text.length > 30) {
    return `“${text.slice(0, 20)}...” (truncated) ${type}`;
  }
  return `“${text}” ${type}`;
}

type Partition = {
  dimension?: Dimension;
};

function partition(
  children: readonly unknown[],
  verb: string,
  opts: VerbOptions
): Partition {
  const two: number[] = [];
  const three: number[] = [];

  children.forEach((child, index) => {
    if (!isExpression(child)) {
      const label = index === 0 ? opts.verbFirst ?? verb : opts.verbRest ?? verb;
      throw new ExpressionTypeError(
        `Cannot ${label} non-OpenSCAD expression ${describeValue(child)}.`,
        { verb: label, index }
      );
    }
    if (child.dim === "2D") two.push(index);
    else if (child.dim === "3D") three.push(index);
  });

  if (two.length > 0 && three.length > 0) {
    let message = `Cannot ${verb} mixed 2D and 3D expressions.`;
    if (two.length === 1 && three.length !== 1) {
      message += ` One, in place ${two[0] + 1} of ${children.length}, is 2D.`;
    } else if (two.length !== 1 && three.length === 1) {
      message += ` One, in place ${three[0] + 1} of ${children.length}, is 3D.`;
    }
    throw new DimensionalityMismatchError("dimensionality_mismatch", message, {
      verb,
      twoD: two,
      threeD: three,
    });
  }

  if (two.length > 0) return { dimension: "2D" };
  if (three.length > 0) return { dimension: "3D" };
  return {};
}

function formatArgument(argument: readonly number[]): string {
  return `[${argument.join(", ")}]`;
}

function typeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "Array";
  if (typeof value === "object") {
    const ctor: unknown = Reflect.get(value, "constructor");
    if (typeof ctor === "function" && ctor.name) return ctor.name;
    return "object";
  }
  return typeof value;
}

function previewText(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (value && typeof value === "object" && !Array.isArray(value)) {
    try {
      return JSON.stringify(value);
    } catch {
      return undefined;
    }
  }
  return String(value);
}
