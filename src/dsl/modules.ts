import type {
  Expression,
  ModuleCall,
  ModuleCallND,
  ModuleChildren,
  ModuleDefinition,
} from "../ir.js";
import { ConstructionError } from "../errors.js";
import { ensureIdentifier } from "../validate.js";
import { container, grouped } from "./utils.js";

/**
 * Define a module without parameters. Call sites pass geometry in as
 * children, and the body places it with {@link children}.
 */
export const module = (
  name: string,
  ...body: Expression[]
): ModuleDefinition<"2D"> | ModuleDefinition<"3D"> => {
  ensureIdentifier(name, "construction_module_name", "Module name");
  if (body.length === 0) {
    throw new ConstructionError(
      "construction_module_arity",
      `Module ${name} needs at least one expression in its body.`,
      { name }
    );
  }
  return container("module.definition", grouped(body, "define module of"), { name });
};

export const callModule = (
  name: string,
  ...children: Expression[]
): ModuleCall<"2D"> | ModuleCall<"3D"> | ModuleCallND => {
  ensureIdentifier(name, "construction_module_name", "Module name");
  if (children.length === 0) return { kind: "module.call", dim: "ND", name };
  return container("module.call", grouped(children, "call module using"), { name });
};

export const children = (): ModuleChildren => ({ kind: "module.children", dim: "ND" });
