import assert from "node:assert/strict";
import { dsl } from "../dsl.js";
import { OperatorError } from "../errors.js";
import { add, div, mul, sub } from "../ops.js";
import { expectThrows, runTests } from "./test_utils.js";

const tests = [
  {
    name: "ops: addition of numbers and vectors",
    fn: async () => {
      assert.equal(add(), 0);
      assert.equal(add(1, 2, 3), 6);
      assert.deepEqual(add([2, 1], [2, 1]), [4, 2]);
      assert.deepEqual(add([1, 2, 3]), [1, 2, 3]);
      expectThrows(() => add([1, 2], [1, 2, 3]), OperatorError, {
        code: "operator_add",
        message: "“+” is mathematical. Use union for unions.",
      });
    },
  },
  {
    name: "ops: subtraction negates, folds and falls back to difference",
    fn: async () => {
      assert.equal(sub(1), -1);
      assert.equal(sub(1, 1, 1), -1);
      assert.deepEqual(sub([1, 2]), [-1, -2]);
      assert.deepEqual(sub([2, 2], [2, 1], [0, 2]), [0, -1]);
      assert.deepEqual(
        sub(dsl.circle(3), dsl.circle(2)),
        dsl.difference(dsl.circle(3), dsl.circle(2))
      );
      expectThrows(() => sub(), OperatorError, {
        code: "operator_arity",
        message: "“-” requires at least one operand.",
      });
    },
  },
  {
    name: "ops: multiplication of one expression disables it",
    fn: async () => {
      assert.equal(mul(), 1);
      assert.equal(mul(2, 3, 4), 24);
      assert.deepEqual(mul(dsl.circle(1)), dsl.disable(dsl.circle(1)));
      assert.equal(mul(dsl.cube([1, 1, 1])).kind, "modifier.disable");
    },
  },
  {
    name: "ops: division takes reciprocals and folds left",
    fn: async () => {
      assert.equal(div(2), 0.5);
      assert.equal(div(8, 2, 2), 2);
      expectThrows(() => div(), OperatorError, {
        code: "operator_arity",
        message: "“/” requires at least one operand.",
      });
    },
  },
];

runTests(tests).catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
