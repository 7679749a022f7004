import type { Comment, Expression, ScadValue, SpecialVariable } from "./ir.js";
import { describeValue, isExpression } from "./dimensionality.js";
import { TranspileError } from "./errors.js";
import { sameValue } from "./hash.js";
import { MODIFIER_SYMBOLS, metaFor } from "./ir_meta.js";
import type { AnyNodeMeta, GenericExpression } from "./ir_meta.js";
import { formatLiteral, isScadValue, radiansToDegrees } from "./scad_literal.js";
import { indexListProblem } from "./validate.js";

export type LineGen = Generator<string, void, undefined>;

export type Transpilable = Expression | ScadValue;

const INDENT = "    ";

/**
 * Render an expression, or a literal value, as lines of OpenSCAD code.
 *
 * Lines come out lazily in pre-order: a container's opening line precedes its
 * children. The generator holds no state beyond its own traversal, so calling
 * it again on the same tree yields the same lines.
 */
export function* transpile(datum: Transpilable): LineGen {
  if (isScadValue(datum)) {
    yield formatLiteral(datum);
    return;
  }
  if (!isExpression(datum)) {
    throw new TranspileError(
      "transpile_unknown",
      `Cannot transpile ${describeValue(datum)}.`
    );
  }
  yield* transpileExpression(datum);
}

export function transpileToString(datum: Transpilable): string {
  return Array.from(transpile(datum)).join("\n");
}

function* transpileExpression(expression: Expression): LineGen {
  switch (expression.kind) {
    case "shape.circle":
    case "shape.square":
    case "shape.rectangle":
    case "shape.polygon":
    case "shape.text":
    case "shape.import":
    case "shape.sphere":
    case "shape.cube":
    case "shape.cylinder":
    case "shape.frustum":
    case "shape.polyhedron":
    case "shape.surface":
    case "boolean.union":
    case "boolean.difference":
    case "boolean.intersection":
    case "transform.translate":
    case "transform.rotate":
    case "transform.scale":
    case "transform.resize":
    case "transform.mirror":
    case "transform.multmatrix":
    case "transform.color":
    case "transform.hull":
    case "transform.minkowski":
    case "offset.rounded":
    case "offset.angled":
    case "transform.projection":
    case "transform.render":
    case "extrude.linear":
    case "extrude.rotational":
      yield* fromMetadata(expression);
      return;
    case "modifier.background":
    case "modifier.debug":
    case "modifier.root":
    case "modifier.disable":
      yield* modifier(MODIFIER_SYMBOLS[expression.kind], expression.child);
      return;
    case "module.definition":
      yield* block(`module ${expression.name}()`, expression.children);
      return;
    case "module.call":
      if (expression.dim === "ND") {
        yield `${expression.name}();`;
        return;
      }
      yield* block(`${expression.name}()`, expression.children);
      return;
    case "module.children":
      yield "children();";
      return;
    case "meta.comment":
      yield* comment(expression);
      return;
    case "meta.commented":
      yield* comment(expression.comment);
      yield* transpile(expression.subject);
      return;
    case "meta.special":
      yield special(expression);
      return;
    case "meta.echo":
      yield `echo(${expression.values.map(formatLiteral).join(", ")});`;
      return;
    default: {
      const unknown: never = expression;
      throw new TranspileError(
        "transpile_unknown",
        `Cannot transpile ${describeValue(unknown)}.`
      );
    }
  }
}

function* fromMetadata(node: GenericExpression): LineGen {
  const meta = metaFor(node.kind);
  checkIndexLists(node);
  const head = `${meta.keyword}(${Array.from(parameters(node, meta)).join(", ")})`;
  if (!meta.container) {
    yield `${head};`;
    return;
  }
  yield* block(head, childrenOf(node, meta.container));
}

function* parameters(node: GenericExpression, meta: AnyNodeMeta): Generator<string> {
  const view: Readonly<Record<string, unknown>> = node;
  for (const field of meta.fields) {
    const value = view[field.name];
    if (value === undefined) continue;
    if (field.default !== undefined && sameValue(value, field.default)) continue;
    if (!isScadValue(value)) {
      throw new TranspileError(
        "transpile_field",
        `Cannot transpile field ${field.name} of ${node.kind}: ${describeValue(value)}.`
      );
    }
    const shown = field.angle ? toDegrees(value, node.kind) : value;
    yield `${field.output ?? field.name}=${formatLiteral(shown)}`;
  }
}

function childrenOf(node: GenericExpression, field: "children"): Expression[] {
  const view: Readonly<Record<string, unknown>> = node;
  const raw = view[field];
  const children = Array.isArray(raw) ? raw : [raw];
  const expressions: Expression[] = [];
  for (const child of children) {
    if (!isExpression(child)) {
      throw new TranspileError(
        "transpile_unknown",
        `Cannot transpile ${describeValue(child)} inside ${node.kind}.`
      );
    }
    expressions.push(child);
  }
  return expressions;
}

function* block(head: string, body: readonly Expression[]): LineGen {
  if (body.length === 0) {
    yield `${head} {};`;
    return;
  }
  yield `${head} {`;
  for (const child of body) {
    for (const line of transpile(child)) {
      yield INDENT + line;
    }
  }
  yield "};";
}

// OpenSCAD modifiers attach to a single statement: prefix its first line.
function* modifier(symbol: string, child: Expression): LineGen {
  let first = true;
  for (const line of transpile(child)) {
    yield first ? symbol + line : line;
    first = false;
  }
}

function* comment(node: Comment): LineGen {
  for (const line of node.lines) {
    yield `// ${line}`;
  }
}

function special(node: SpecialVariable): string {
  if (node.preview === undefined) return `${node.variable};`;
  const preview = formatLiteral(node.preview);
  if (node.render === undefined) return `${node.variable} = ${preview};`;
  return `${node.variable} = $preview ? ${preview} : ${formatLiteral(node.render)};`;
}

function toDegrees(value: ScadValue, kind: string): ScadValue {
  if (typeof value === "number") return radiansToDegrees(value);
  if (Array.isArray(value)) return value.map((entry) => toDegrees(entry, kind));
  throw new TranspileError(
    "transpile_angle",
    `Cannot convert ${describeValue(value)} to degrees in ${kind}.`
  );
}

function checkIndexLists(node: GenericExpression): void {
  let problem: string | undefined;
  if (node.kind === "shape.polygon" && node.paths !== undefined) {
    problem = indexListProblem(node.paths, node.points.length, 3);
  } else if (node.kind === "shape.polyhedron") {
    problem = indexListProblem(node.faces, node.points.length, 3);
  }
  if (problem) {
    throw new TranspileError(
      "transpile_index_list",
      `Cannot transpile malformed ${node.kind}: ${problem}.`
    );
  }
}
