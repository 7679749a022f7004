import assert from "node:assert/strict";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

export type TestCase = {
  name: string;
  fn: () => Promise<void>;
};

async function runTest(index: number, testCase: TestCase): Promise<boolean> {
  try {
    await testCase.fn();
    console.log(`ok ${index} - ${testCase.name}`);
    return true;
  } catch (err) {
    console.log(`not ok ${index} - ${testCase.name}`);
    console.error(err);
    return false;
  }
}

export async function runTests(testCases: TestCase[]): Promise<void> {
  console.log("TAP version 13");
  let passCount = 0;
  for (const [index, testCase] of testCases.entries()) {
    const ok = await runTest(index + 1, testCase);
    if (ok) passCount += 1;
  }
  console.log(`1..${testCases.length}`);
  if (passCount !== testCases.length) {
    process.exitCode = 1;
  }
}

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), "scad-ir-"));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

// Collects console.warn output while fn runs.
export async function captureWarnings(fn: () => Promise<void>): Promise<string[]> {
  const messages: string[] = [];
  const original = console.warn;
  console.warn = (...args: unknown[]) => {
    messages.push(args.map(String).join(" "));
  };
  try {
    await fn();
  } finally {
    console.warn = original;
  }
  return messages;
}

export function expectThrows<E extends Error>(
  fn: () => unknown,
  type: new (...args: never[]) => E,
  expected: { code?: string; message?: string } = {}
): E {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  assert.ok(caught instanceof type, `expected ${type.name}, got ${String(caught)}`);
  if (expected.message !== undefined) assert.equal(caught.message, expected.message);
  if (expected.code !== undefined) assert.equal(Reflect.get(caught, "code"), expected.code);
  return caught;
}
