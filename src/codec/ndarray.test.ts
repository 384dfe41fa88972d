/**
 * NdArray and array descriptor tests.
 *
 * Run: node --import tsx src/codec/ndarray.test.ts
 */

import { strict as assert } from "node:assert";

import { MalformedArrayError } from "./errors.js";
import { NdArray, decodeArray, encodeArray, shapeSize } from "./ndarray.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

// ═══════════════════════════════════════════════════════════════════════════
// 1. Construction
// ═══════════════════════════════════════════════════════════════════════════

section("1. Construction");

test("shape and data must agree", () => {
  assert.throws(
    () => NdArray.float64([2, 2], [1, 2, 3]),
    (err: unknown) =>
      err instanceof MalformedArrayError &&
      err.message === "Shape [2, 2] implies 4 elements but data has 3 at $"
  );
});

test("shape entries must be positive integers", () => {
  assert.throws(() => NdArray.float64([0], []), MalformedArrayError);
  assert.throws(() => NdArray.float64([1.5], [1]), MalformedArrayError);
});

test("the empty shape holds one scalar", () => {
  assert.equal(shapeSize([]), 1);
  const scalar = NdArray.float64([], [7]);
  assert.equal(scalar.ndim, 0);
  assert.equal(scalar.at(), 7);
});

test("int64 rejects fractional elements", () => {
  assert.throws(() => NdArray.int64([2], [1, 1.5]), MalformedArrayError);
});

test("bool rejects numbers", () => {
  assert.throws(
    () => decodeArray({ type: "__array__", shape: [1], dtype: "bool", data: [1] }, "$"),
    MalformedArrayError
  );
});

test("fromRows builds a 2-D array", () => {
  const array = NdArray.fromRows("int64", [
    [1, 2, 3],
    [4, 5, 6],
  ]);
  assert.deepEqual(array.shape, [2, 3]);
  assert.equal(array.size, 6);
  assert.equal(array.at(1, 0), 4);
  assert.equal(array.at(0, 2), 3);
});

test("fromRows rejects ragged rows", () => {
  assert.throws(() => NdArray.fromRows("float64", [[1, 2], [3]]), MalformedArrayError);
});

test("at() checks bounds and arity", () => {
  const array = NdArray.float64([2, 2], [1, 2, 3, 4]);
  assert.throws(() => array.at(2, 0), RangeError);
  assert.throws(() => array.at(0), RangeError);
});

test("the input buffer is copied", () => {
  const data = [1, 2];
  const array = NdArray.float64([2], data);
  data[0] = 99;
  assert.equal(array.at(0), 1);
  assert.ok(Object.isFrozen(array.data));
});

// ═══════════════════════════════════════════════════════════════════════════
// 2. Descriptor
// ═══════════════════════════════════════════════════════════════════════════

section("2. Descriptor");

test("float64 descriptor uses sentinels for non-finite values", () => {
  const array = NdArray.float64([2, 3], [0.1, NaN, Infinity, -Infinity, 2, -0.5]);
  assert.deepEqual(encodeArray(array), {
    type: "__array__",
    shape: [2, 3],
    dtype: "float64",
    data: [0.1, "NaN", "Infinity", "-Infinity", 2, -0.5],
  });
});

test("descriptor decodes to an equal array, signed zeros included", () => {
  const array = NdArray.float64([2, 3], [0.1, NaN, Infinity, -Infinity, -0, 0]);
  const restored = decodeArray(encodeArray(array), "$");
  assert.equal(restored.dtype, "float64");
  assert.deepEqual(restored.shape, [2, 3]);
  array.data.forEach((value, i) => assert.ok(Object.is(restored.data[i], value), `element ${i}`));
});

test("bool descriptor round trips", () => {
  const array = NdArray.bool([3], [true, false, true]);
  assert.deepEqual(decodeArray(encodeArray(array), "$"), array);
});

test("descriptor with mismatched data length is rejected", () => {
  assert.throws(
    () =>
      decodeArray(
        { type: "__array__", shape: [2, 2], dtype: "float64", data: [1, 2, 3] },
        "$.tpm"
      ),
    (err: unknown) => err instanceof MalformedArrayError && err.path === "$.tpm"
  );
});

test("descriptor with an unknown dtype is rejected", () => {
  assert.throws(
    () => decodeArray({ type: "__array__", shape: [1], dtype: "complex128", data: [1] }, "$"),
    MalformedArrayError
  );
});

test("sentinels are only valid in float64 data", () => {
  assert.throws(
    () => decodeArray({ type: "__array__", shape: [1], dtype: "int64", data: ["NaN"] }, "$"),
    MalformedArrayError
  );
});

test("descriptor with an extra key is rejected", () => {
  assert.throws(
    () =>
      decodeArray({ type: "__array__", shape: [1], dtype: "float64", data: [1], order: "C" }, "$.cm"),
    (err: unknown) =>
      err instanceof MalformedArrayError &&
      err.path === "$.cm" &&
      err.message.includes("Unrecognized key(s) in object: 'order'")
  );
});

test("descriptor missing its data is rejected", () => {
  assert.throws(
    () => decodeArray({ type: "__array__", shape: [1], dtype: "float64" }, "$"),
    MalformedArrayError
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
