import { asset, assetText, cube, cylinder, difference, finalize, sphere, union } from "../index.js";

const hello = asset(
  () => [difference(union(cube([20, 20, 20]), sphere(13)), cylinder(6, 30))],
  { name: "hello" }
);

for (const output of finalize(hello)) {
  console.log(`// ${output.name}.scad`);
  console.log(assetText(output));
}
