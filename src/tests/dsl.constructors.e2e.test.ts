import assert from "node:assert/strict";
import { dsl } from "../dsl.js";
import { ConstructionError, DimensionalityMismatchError } from "../errors.js";
import { expectThrows, runTests } from "./test_utils.js";

const tests = [
  {
    name: "dsl: context defaults and overrides",
    fn: async () => {
      assert.deepEqual(dsl.context(), {
        scadDir: "output/scad",
        renderDir: "output/render",
        executable: "openscad",
        flipChiral: true,
      });
      const ctx = dsl.context({ scadDir: "build/scad", flipChiral: false });
      assert.equal(ctx.scadDir, "build/scad");
      assert.equal(ctx.renderDir, "output/render");
      assert.equal(ctx.flipChiral, false);
      assert.ok(Math.abs(dsl.deg(180) - Math.PI) < 1e-12);
      assert.equal(dsl.deg(0), 0);
    },
  },
  {
    name: "dsl: shapes pick their variant from the arguments",
    fn: async () => {
      assert.deepEqual(dsl.square(2), {
        kind: "shape.square",
        dim: "2D",
        size: 2,
        center: true,
      });
      assert.deepEqual(dsl.square([2, 3], false), {
        kind: "shape.rectangle",
        dim: "2D",
        size: [2, 3],
        center: false,
      });
      assert.deepEqual(dsl.cylinder([1, 2], 5), {
        kind: "shape.frustum",
        dim: "3D",
        radius1: 1,
        radius2: 2,
        height: 5,
        center: true,
      });
      assert.equal(dsl.cylinder(1, 5).kind, "shape.cylinder");
      assert.equal(dsl.cube([1, 2, 3]).center, true);
      assert.equal(dsl.surface("height.dat").center, true);
      assert.equal("font" in dsl.text("Hi"), false);
      assert.equal(dsl.text("Hi", { font: "Liberation Sans" }).font, "Liberation Sans");
    },
  },
  {
    name: "dsl: imports take their dimensionality from the file suffix",
    fn: async () => {
      assert.equal(dsl.importFile("outline.svg").dim, "2D");
      assert.equal(dsl.importFile("plan.DXF", { layer: "walls" }).dim, "2D");
      assert.equal(dsl.importFile("part.stl").dim, "3D");
      assert.equal(dsl.importFile("part.3mf").dim, "3D");
      expectThrows(() => dsl.importFile("mesh.obj"), ConstructionError, {
        code: "construction_import_suffix",
        message: "Unknown file suffix for mesh.obj.",
      });
      expectThrows(() => dsl.importFile("part.stl", { layer: "top" }), ConstructionError, {
        code: "construction_import_layer",
      });
    },
  },
  {
    name: "dsl: shape arguments are validated",
    fn: async () => {
      expectThrows(() => dsl.circle(0), ConstructionError, {
        code: "construction_radius",
        message: "circle radius must be positive",
      });
      expectThrows(
        () => dsl.polygon([[0, 0], [1, 0], [0, 1]], { paths: [[0, 1, 5]] }),
        ConstructionError,
        {
          code: "construction_paths",
          message: "Malformed polygon paths: entry 0 refers to point 5 of 3.",
        }
      );
      expectThrows(
        () => dsl.polyhedron([[0, 0, 0], [1, 0, 0], [0, 1, 0], [0, 0, 1]], [[0, 1]]),
        ConstructionError,
        {
          code: "construction_faces",
          message: "Malformed polyhedron faces: entry 0 has 2 indices, at least 3 required.",
        }
      );
    },
  },
  {
    name: "dsl: containers take the dimensionality of their children",
    fn: async () => {
      assert.equal(dsl.union(dsl.circle(1), dsl.square(1)).dim, "2D");
      assert.equal(dsl.difference(dsl.cube([2, 2, 2]), dsl.sphere(1)).dim, "3D");
      assert.equal(dsl.intersection().dim, "3D");
      assert.equal(dsl.hull(dsl.circle(1), dsl.children()).dim, "2D");
      assert.equal(dsl.mirror([1, 0, 0], dsl.circle(1)).dim, "2D");
      assert.equal(dsl.color("red", dsl.sphere(1)).dim, "3D");
      assert.deepEqual(dsl.color([1, 0, 0, 0.5], dsl.circle(1)).color, [1, 0, 0, 0.5]);
      assert.equal(dsl.translate([1, 2], dsl.circle(1), dsl.children()).dim, "2D");
      assert.equal(dsl.translate([1, 2, 3], dsl.children()).dim, "3D");
      expectThrows(() => dsl.translate([1, 2], dsl.children()), DimensionalityMismatchError, {
        message: "Cannot translate 3D OpenSCAD expression with 2D argument [1, 2].",
      });
      assert.equal(dsl.resize([4, 4, 4], dsl.cube([1, 1, 1])).dim, "3D");
    },
  },
  {
    name: "dsl: mirror axes, extrusion slices and convexity are validated",
    fn: async () => {
      expectThrows(() => dsl.mirror([0.5, 0, 0], dsl.circle(1)), ConstructionError, {
        code: "construction_vector",
        message: "mirror axes must be whole numbers, not [0.5, 0, 0]",
      });
      assert.equal(dsl.linearExtrude({ height: 2, slices: 8 }, dsl.circle(1)).slices, 8);
      expectThrows(() => dsl.linearExtrude({ height: 2, slices: 2.5 }, dsl.circle(1)), ConstructionError, {
        code: "construction_slices",
        message: "slices must be a positive whole number, not 2.5",
      });
      expectThrows(() => dsl.linearExtrude({ height: 2, slices: 0 }, dsl.circle(1)), ConstructionError, {
        code: "construction_slices",
      });

      assert.equal(dsl.minkowski(dsl.circle(1), dsl.square(1)).convexity, 1);
      const summed = dsl.minkowski({ convexity: 3 }, dsl.cube([1, 1, 1]), dsl.sphere(1));
      assert.equal(summed.convexity, 3);
      assert.equal(summed.dim, "3D");
      assert.equal(summed.children.length, 2);
      assert.equal(dsl.render({ convexity: 4 }, dsl.sphere(1)).convexity, 4);
      assert.equal(dsl.render(dsl.sphere(1)).convexity, 1);
      expectThrows(() => dsl.render({ convexity: 0 }, dsl.sphere(1)), ConstructionError, {
        code: "construction_convexity",
      });
    },
  },
  {
    name: "dsl: rotation checks the angle against the children",
    fn: async () => {
      const flat = dsl.rotate(Math.PI, dsl.square(1));
      assert.equal(flat.dim, "2D");
      assert.equal(flat.angle, Math.PI);
      assert.equal(dsl.rotate([0, 0, 1], dsl.cube([1, 1, 1])).dim, "3D");
      expectThrows(() => dsl.rotate(1, dsl.sphere(1)), DimensionalityMismatchError, {
        message: "Cannot rotate 3D OpenSCAD expression with scalar angle 1.",
      });
      expectThrows(() => dsl.rotate([0, 0, 1], dsl.circle(1)), DimensionalityMismatchError, {
        message: "Cannot rotate 2D OpenSCAD expression with 3D argument [0, 0, 1].",
      });
    },
  },
  {
    name: "dsl: offsets, projections and extrusions require their input dimensionality",
    fn: async () => {
      assert.equal(dsl.offset(1, dsl.circle(2)).kind, "offset.rounded");
      const angled = dsl.offset({ distance: 1, round: false, chamfer: true }, dsl.circle(2));
      assert.equal(angled.kind, "offset.angled");
      expectThrows(() => dsl.offset({ distance: 1, chamfer: true }, dsl.circle(2)), ConstructionError, {
        code: "construction_offset",
      });
      expectThrows(() => dsl.offset(1, dsl.sphere(1)), DimensionalityMismatchError, {
        message: "Cannot offset 3D OpenSCAD expression; 2D required.",
      });

      assert.equal(dsl.projection(dsl.sphere(2)).cut, false);
      assert.equal(dsl.cut(dsl.sphere(2)).cut, true);
      expectThrows(() => dsl.render(dsl.circle(1)), DimensionalityMismatchError, {
        message: "Cannot render 2D OpenSCAD expression; 3D required.",
      });

      assert.equal(dsl.extrude({ height: 5 }, dsl.circle(1)).kind, "extrude.linear");
      assert.equal(dsl.extrude({ angle: Math.PI }, dsl.circle(1)).kind, "extrude.rotational");
      const full = dsl.extrude({ rotate: true }, dsl.square(1));
      assert.equal(full.kind, "extrude.rotational");
      assert.equal("angle" in full ? full.angle : undefined, 2 * Math.PI);
      assert.equal("slices" in dsl.linearExtrude({ height: 2 }, dsl.circle(1)), false);
      expectThrows(() => dsl.extrude({ height: 5 }, dsl.sphere(1)), DimensionalityMismatchError, {
        message: "Cannot extrude 3D OpenSCAD expression; 2D required.",
      });
    },
  },
  {
    name: "dsl: modifiers take the dimensionality of their child",
    fn: async () => {
      assert.deepEqual(dsl.background(dsl.circle(1)), {
        kind: "modifier.background",
        dim: "2D",
        child: { kind: "shape.circle", dim: "2D", radius: 1 },
      });
      assert.equal(dsl.debug(dsl.cube([1, 1, 1])).dim, "3D");
      assert.equal(dsl.root(dsl.square(1)).kind, "modifier.root");
      assert.equal(dsl.disable(dsl.special("$fn", 3)).dim, "3D");
    },
  },
  {
    name: "dsl: modules define, call and place children",
    fn: async () => {
      const definition = dsl.module("arm", dsl.cube([1, 1, 1]));
      assert.equal(definition.kind, "module.definition");
      assert.equal(definition.dim, "3D");
      assert.equal(definition.name, "arm");
      assert.deepEqual(dsl.callModule("arm"), { kind: "module.call", dim: "ND", name: "arm" });
      assert.equal(dsl.callModule("frame", dsl.circle(1)).dim, "2D");
      assert.deepEqual(dsl.children(), { kind: "module.children", dim: "ND" });

      expectThrows(() => dsl.module("arm"), ConstructionError, {
        code: "construction_module_arity",
        message: "Module arm needs at least one expression in its body.",
      });
      expectThrows(() => dsl.module("left-arm", dsl.cube([1, 1, 1])), ConstructionError, {
        code: "construction_module_name",
      });
    },
  },
  {
    name: "dsl: comments, special variables and echo",
    fn: async () => {
      assert.deepEqual(dsl.comment("first\nsecond").lines, ["first", "second"]);
      const commented = dsl.comment(["a", "b\nc"], dsl.circle(1));
      assert.equal(commented.kind, "meta.commented");
      assert.equal(commented.dim, "2D");
      assert.deepEqual(commented.comment.lines, ["a", "b", "c"]);
      expectThrows(() => dsl.comment("note", dsl.echo("x")), ConstructionError, {
        code: "construction_subject",
      });

      assert.deepEqual(dsl.special("$fn"), { kind: "meta.special", dim: "ND", variable: "$fn" });
      assert.deepEqual(dsl.special("$fn", 16, 64), {
        kind: "meta.special",
        dim: "ND",
        variable: "$fn",
        preview: 16,
        render: 64,
      });
      assert.deepEqual(dsl.echo("a", 1, false).values, ["a", 1, false]);
    },
  },
  {
    name: "dsl: helpers build unions of hulls, offset pairs and mapped unions",
    fn: async () => {
      const chain = dsl.pairwiseHull(
        dsl.circle(1),
        dsl.translate([5, 0], dsl.circle(1)),
        dsl.translate([5, 5], dsl.circle(1))
      );
      assert.equal(chain.dim, "2D");
      assert.equal(chain.children.length, 2);
      for (const child of chain.children) assert.equal(child.kind, "transform.hull");

      const rounded = dsl.roundCorners(2, [dsl.square([10, 10])]);
      assert.equal(rounded.kind, "offset.rounded");
      assert.equal(rounded.distance, 2);
      const inner = rounded.children[0];
      assert.equal(inner.kind, "offset.rounded");
      assert.equal(inner.kind === "offset.rounded" ? inner.distance : undefined, -2);

      const row = dsl.unionMap((x: number) => dsl.translate([x, 0, 0], dsl.cube([1, 1, 1])), [0, 2, 4]);
      assert.equal(row.dim, "3D");
      assert.equal(row.children.length, 3);
    },
  },
];

runTests(tests).catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
