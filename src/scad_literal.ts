import type { ScadValue } from "./ir.js";
import { StringEncodingError, TranspileError } from "./errors.js";

const DEGREE_SNAP = 1e-9;

export function formatLiteral(value: ScadValue): string {
  if (typeof value === "number") return formatNumber(value);
  if (typeof value === "boolean") return value ? "true" : "false";
  if (typeof value === "string") return formatString(value);
  return `[${value.map(formatLiteral).join(", ")}]`;
}

export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) {
    throw new TranspileError(
      "transpile_number",
      `Cannot represent ${String(value)} as an OpenSCAD number.`
    );
  }
  // Integral values print without a fractional part; -0 prints as 0.
  if (Number.isInteger(value)) return String(value === 0 ? 0 : value);
  return String(value);
}

/**
 * Wrap a string in double quotes for OpenSCAD.
 *
 * The quoted form must read back, with POSIX shell rules, as exactly the
 * original string. Anything that would need an escape sequence is refused.
 */
export function formatString(value: string): string {
  const problem = requoteProblem(value);
  if (problem) {
    throw new StringEncodingError(
      `String ${JSON.stringify(value)} would form multiple OpenSCAD strings: ${problem}.`,
      { value }
    );
  }
  return `"${value}"`;
}

export function radiansToDegrees(radians: number): number {
  const degrees = (radians * 180) / Math.PI;
  const nearest = Math.round(degrees);
  return Math.abs(degrees - nearest) < DEGREE_SNAP ? nearest : degrees;
}

export function isScadValue(value: unknown): value is ScadValue {
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "string") {
    return true;
  }
  return Array.isArray(value) && value.every(isScadValue);
}

// Inside double quotes a shell treats `"` as the end of the string, and a
// backslash as an escape before `\`, `"` or the closing quote.
function requoteProblem(value: string): string | undefined {
  for (let i = 0; i < value.length; i += 1) {
    const ch = value[i];
    if (ch === '"') return `embedded quotation mark at index ${i}`;
    if (ch === "\\") {
      const next = value[i + 1];
      if (next === undefined) return "trailing backslash";
      if (next === "\\" || next === '"') return `escape sequence at index ${i}`;
    }
  }
  return undefined;
}
