import assert from "node:assert/strict";
import { asset, gimbal, image, vectorCamera } from "../asset.js";
import { dsl } from "../dsl.js";
import { composeRenderCommand, renderJobs, scadPath } from "../render_command.js";
import { runTests } from "./test_utils.js";

const tests = [
  {
    name: "render command: image options in renderer order",
    fn: async () => {
      const still = image("out.png", {
        camera: gimbal({ translation: [1, 2, 3], rotation: [4, 5, 6], distance: 7 }),
        size: [800, 600],
        colorscheme: "Tomorrow",
      });
      assert.deepEqual(
        composeRenderCommand({
          executable: "openscad",
          input: "in.scad",
          output: "out.png",
          image: still,
        }),
        [
          "openscad",
          "-o",
          "out.png",
          "--camera",
          "1,2,3,4,5,6,7",
          "--imgsize",
          "800,600",
          "--colorscheme",
          "Tomorrow",
          "in.scad",
        ]
      );
    },
  },
  {
    name: "render command: vector cameras and empty options",
    fn: async () => {
      const still = image("top.png", { camera: vectorCamera([10, 10, 10]) });
      assert.deepEqual(
        composeRenderCommand({ executable: "scad", input: "a.scad", output: "top.png", image: still }),
        ["scad", "-o", "top.png", "--camera", "10,10,10,0,0,0", "a.scad"]
      );
      assert.deepEqual(composeRenderCommand({ executable: "scad", input: "a.scad" }), [
        "scad",
        "a.scad",
      ]);
    },
  },
  {
    name: "render command: one job per suffix and per image",
    fn: async () => {
      const box = asset(dsl.cube([1, 1, 1]), {
        name: "box",
        suffixes: [".stl", ".3mf"],
        images: [image("box.png", { size: [64, 64] })],
      });
      const ctx = dsl.context();
      assert.equal(scadPath(box, ctx), "output/scad/box.scad");
      const jobs = renderJobs(box, ctx);
      assert.deepEqual(
        jobs.map((job) => [job.kind, job.output]),
        [
          ["model", "output/render/box.stl"],
          ["model", "output/render/box.3mf"],
          ["image", "output/render/box.png"],
        ]
      );
      assert.deepEqual(jobs[0].argv, [
        "openscad",
        "-o",
        "output/render/box.stl",
        "output/scad/box.scad",
      ]);
      assert.deepEqual(jobs[2].argv, [
        "openscad",
        "-o",
        "output/render/box.png",
        "--imgsize",
        "64,64",
        "output/scad/box.scad",
      ]);
      assert.ok(jobs.every((job) => job.asset === "box" && job.input === "output/scad/box.scad"));
    },
  },
];

runTests(tests).catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
