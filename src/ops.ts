import type { Difference, Disable, Expression } from "./ir.js";
import { isExpression } from "./dimensionality.js";
import { OperatorError } from "./errors.js";
import { difference } from "./dsl/booleans.js";
import { disable } from "./dsl/modifiers.js";

// Variadic arithmetic that also applies to OpenSCAD expressions where an
// operator has an obvious CSG reading. With no operands, + and * return
// their identities; with one, - negates and / takes the reciprocal.

function numbersOf(args: readonly unknown[]): number[] | undefined {
  const numbers: number[] = [];
  for (const arg of args) {
    if (typeof arg !== "number") return undefined;
    numbers.push(arg);
  }
  return numbers;
}

// Non-empty list of same-length numeric vectors.
function vectorsOf(args: readonly unknown[]): number[][] | undefined {
  if (args.length === 0) return undefined;
  const vectors: number[][] = [];
  for (const arg of args) {
    if (!Array.isArray(arg)) return undefined;
    const vector = numbersOf(arg);
    if (!vector || (vectors.length > 0 && vector.length !== vectors[0].length)) {
      return undefined;
    }
    vectors.push(vector);
  }
  return vectors;
}

function expressionsOf(args: readonly unknown[]): Expression[] | undefined {
  const expressions: Expression[] = [];
  for (const arg of args) {
    if (!isExpression(arg)) return undefined;
    expressions.push(arg);
  }
  return expressions;
}

function elementwise(
  vectors: readonly number[][],
  fn: (a: number, b: number) => number
): number[] {
  const [first, ...rest] = vectors;
  return first.map((value, index) =>
    rest.reduce((acc, vector) => fn(acc, vector[index]), value)
  );
}

export function add(...args: number[]): number;
export function add(...args: number[][]): number[];
export function add(...args: unknown[]): number | number[] {
  if (args.length === 0) return 0;
  const vectors = vectorsOf(args);
  if (vectors) return elementwise(vectors, (a, b) => a + b);
  const numbers = numbersOf(args);
  if (!numbers) {
    throw new OperatorError("operator_add", "“+” is mathematical. Use union for unions.");
  }
  return numbers.reduce((a, b) => a + b);
}

export function sub(...args: number[]): number;
export function sub(...args: number[][]): number[];
export function sub(...args: Expression[]): Difference<"2D"> | Difference<"3D">;
export function sub(
  ...args: unknown[]
): number | number[] | Difference<"2D"> | Difference<"3D"> {
  if (args.length === 0) {
    throw new OperatorError("operator_arity", "“-” requires at least one operand.");
  }
  const numbers = numbersOf(args);
  if (numbers) {
    if (numbers.length === 1) return 0 - numbers[0];
    return numbers.reduce((a, b) => a - b);
  }
  const vectors = vectorsOf(args);
  if (vectors) {
    if (vectors.length === 1) return vectors[0].map((value) => 0 - value);
    return elementwise(vectors, (a, b) => a - b);
  }
  const expressions = expressionsOf(args);
  if (expressions) return difference(...expressions);
  throw new OperatorError(
    "operator_sub",
    "“-” takes numbers, vectors of one length, or OpenSCAD expressions."
  );
}

export function mul(...args: number[]): number;
export function mul(arg: Expression): Disable<"2D"> | Disable<"3D">;
export function mul(...args: unknown[]): number | Disable<"2D"> | Disable<"3D"> {
  if (args.length === 0) return 1;
  const numbers = numbersOf(args);
  if (numbers) return numbers.reduce((a, b) => a * b);
  const expressions = expressionsOf(args);
  if (!expressions || expressions.length !== 1) {
    throw new OperatorError(
      "operator_mul",
      "Non-numeric “*” requires exactly one OpenSCAD expression."
    );
  }
  return disable(expressions[0]);
}

export function div(...args: number[]): number {
  if (args.length === 0) {
    throw new OperatorError("operator_arity", "“/” requires at least one operand.");
  }
  const numbers = numbersOf(args);
  if (!numbers) {
    throw new OperatorError("operator_div", "“/” is mathematical.");
  }
  if (numbers.length === 1) return 1 / numbers[0];
  return numbers.reduce((a, b) => a / b);
}
