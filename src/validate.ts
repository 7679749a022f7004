import { ConstructionError } from "./errors.js";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

// Describes what is wrong with a list of index lists, if anything.
export function indexListProblem(
  lists: readonly (readonly number[])[],
  pointCount: number,
  minLength: number
): string | undefined {
  for (const [listIndex, list] of lists.entries()) {
    if (!Array.isArray(list)) return `entry ${listIndex} is not a list`;
    if (list.length < minLength) {
      return `entry ${listIndex} has ${list.length} indices, at least ${minLength} required`;
    }
    for (const index of list) {
      if (!Number.isInteger(index) || index < 0 || index >= pointCount) {
        return `entry ${listIndex} refers to point ${String(index)} of ${pointCount}`;
      }
    }
  }
  return undefined;
}

export function ensureIndexLists(
  lists: readonly (readonly number[])[],
  pointCount: number,
  minLength: number,
  code: string,
  label: string
): void {
  const problem = indexListProblem(lists, pointCount, minLength);
  if (problem) {
    throw new ConstructionError(code, `Malformed ${label}: ${problem}.`);
  }
}

export function ensureFinite(value: number, code: string, label: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConstructionError(code, `${label} must be a finite number`);
  }
  return value;
}

export function ensurePositive(value: number, code: string, label: string): number {
  ensureFinite(value, code, label);
  if (value <= 0) {
    throw new ConstructionError(code, `${label} must be positive`);
  }
  return value;
}

export function ensureVector(
  value: readonly number[],
  lengths: readonly number[],
  code: string,
  label: string
): void {
  if (!Array.isArray(value) || !lengths.includes(value.length)) {
    throw new ConstructionError(
      code,
      `${label} must have ${lengths.join(" or ")} components`
    );
  }
  for (const entry of value) ensureFinite(entry, code, `${label} component`);
}

export function ensureIdentifier(value: string, code: string, label: string): string {
  if (typeof value !== "string" || !IDENTIFIER.test(value)) {
    throw new ConstructionError(
      code,
      `${label} ${JSON.stringify(value)} is not a valid OpenSCAD identifier`
    );
  }
  return value;
}

// Paths inside output directories and bundles are relative, with / separators.
export function relativePathProblem(path: string): string | undefined {
  if (!path) return "empty path";
  if (path.startsWith("/") || path.startsWith("\\") || path.includes(":")) {
    return "must be relative";
  }
  if (path.split("/").includes("..")) return "no .. segments";
  if (path.includes("\\")) return "use / separators";
  return undefined;
}

export function ensureRelativePath(path: string, code: string, label: string): string {
  const problem = typeof path === "string" ? relativePathProblem(path) : "not a string";
  if (problem) {
    throw new ConstructionError(code, `Invalid ${label} (${problem}): ${String(path)}`);
  }
  return path;
}
