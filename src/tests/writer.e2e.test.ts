import assert from "node:assert/strict";
import { access, readFile } from "node:fs/promises";
import { join } from "node:path";
import { asset, image } from "../asset.js";
import { dsl } from "../dsl.js";
import { DimensionalityMismatchError, StringEncodingError } from "../errors.js";
import { writeAssets } from "../writer.js";
import { captureWarnings, runTests, withTempDir } from "./test_utils.js";

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

const tests = [
  {
    name: "writer: one file per asset, untitled input named by invocation and place",
    fn: async () => {
      await withTempDir(async (dir) => {
        const scadDir = join(dir, "scad");
        const result = await writeAssets(
          [dsl.cube([1, 1, 1], false), { name: "disc", content: dsl.circle(2) }],
          { scadDir, renderDir: join(dir, "render"), invocation: 4 }
        );
        assert.deepEqual(
          result.written.map((entry) => entry.name),
          ["untitled_4_0", "disc"]
        );
        assert.deepEqual(result.failures, []);
        assert.equal(
          await readFile(join(scadDir, "untitled_4_0.scad"), "utf8"),
          "cube(size=[1, 1, 1]);\n\n"
        );
        assert.equal(await readFile(join(scadDir, "disc.scad"), "utf8"), "circle(r=2);\n\n");
        assert.equal(result.written[1].path, join(scadDir, "disc.scad"));
        assert.deepEqual(
          result.written[1].jobs.map((job) => job.output),
          [join(dir, "render", "disc.stl")]
        );
      });
    },
  },
  {
    name: "writer: failing assets are reported and skipped",
    fn: async () => {
      await withTempDir(async (dir) => {
        const scadDir = join(dir, "scad");
        const warnings = await captureWarnings(async () => {
          const result = await writeAssets(
            [
              asset(() => [dsl.text('say "hi"')], { name: "quoted" }),
              asset(() => [dsl.union(dsl.circle(1), dsl.sphere(1))], { name: "mixed" }),
              asset(dsl.sphere(1), { name: "ball" }),
            ],
            { scadDir, invocation: 0 }
          );
          assert.deepEqual(
            result.failures.map((failure) => failure.name),
            ["quoted", "mixed"]
          );
          assert.ok(result.failures[0].error instanceof StringEncodingError);
          assert.ok(result.failures[1].error instanceof DimensionalityMismatchError);
          assert.deepEqual(
            result.written.map((entry) => entry.name),
            ["ball"]
          );
        });
        assert.equal(warnings.length, 2);
        assert.ok(warnings[0].startsWith("scad-ir: Skipped asset quoted: "));
        assert.equal(
          warnings[1],
          "scad-ir: Skipped asset mixed: Cannot contain mixed 2D and 3D expressions."
        );
        assert.equal(await exists(join(scadDir, "quoted.scad")), false);
        assert.equal(await exists(join(scadDir, "mixed.scad")), false);
        assert.equal(await readFile(join(scadDir, "ball.scad"), "utf8"), "sphere(r=1);\n\n");
      });
    },
  },
  {
    name: "writer: chiral assets write both hands and images warn",
    fn: async () => {
      await withTempDir(async (dir) => {
        const scadDir = join(dir, "scad");
        const glove = asset(dsl.cube([1, 2, 3], false), {
          name: "glove",
          chiral: true,
          images: [image("glove.png")],
        });
        let names: string[] = [];
        const warnings = await captureWarnings(async () => {
          const result = await writeAssets([glove], { scadDir, invocation: 0 });
          names = result.written.map((entry) => entry.name);
        });
        assert.deepEqual(names, ["glove", "glove_mirrored"]);
        assert.deepEqual(warnings, [
          "scad-ir: Images are a data-only placeholder; nothing is rendered (asset glove).",
        ]);
        assert.equal(
          await readFile(join(scadDir, "glove_mirrored.scad"), "utf8"),
          "mirror(v=[1, 0, 0]) {\n    cube(size=[1, 2, 3]);\n};\n\n"
        );
      });
    },
  },
];

runTests(tests).catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
