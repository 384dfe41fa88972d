/**
 * Type registry tests.
 *
 * Run: node --import tsx src/codec/registry.test.ts
 */

import { strict as assert } from "node:assert";
import { z } from "zod";

import { DuplicateTypeTagError, RegistrySealedError } from "./errors.js";
import { TypeRegistry, defineType } from "./registry.js";

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
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

class Unit {
  constructor(readonly label: string) {}
}

class Pair {
  constructor(
    readonly left: number,
    readonly right: number
  ) {}
}

class LabelledUnit extends Unit {}

const UnitType = defineType({
  tag: "unit",
  type: Unit,
  fields: z.object({ label: z.string() }),
  encode: (unit) => ({ label: unit.label }),
  decode: (f) => new Unit(f.label),
});

const PairType = defineType({
  tag: "pair",
  type: Pair,
  fields: z.object({ left: z.number(), right: z.number() }),
  encode: (pair) => ({ left: pair.left, right: pair.right }),
  decode: (f) => new Pair(f.left, f.right),
});

// ═══════════════════════════════════════════════════════════════════════════
// 1. Lookup
// ═══════════════════════════════════════════════════════════════════════════

section("1. Lookup");

test("definitions are found by tag and by class", () => {
  const registry = TypeRegistry.create([UnitType, PairType]);
  assert.equal(registry.lookupByTag("pair"), PairType);
  assert.equal(registry.lookupByType(Unit), UnitType);
  assert.equal(registry.lookupFor(new Pair(1, 2)), PairType);
  assert.equal(registry.lookupByTag("missing"), undefined);
});

test("tags are listed sorted", () => {
  const registry = TypeRegistry.create([UnitType, PairType]);
  assert.deepEqual(registry.tags, ["pair", "unit"]);
  assert.equal(registry.size, 2);
  assert.equal(registry.has("unit"), true);
  assert.equal(registry.has("Unit"), false);
});

test("subclasses are not matched by their parent's definition", () => {
  const registry = TypeRegistry.create([UnitType]);
  assert.equal(registry.lookupFor(new LabelledUnit("x")), undefined);
});

test("the registry is frozen", () => {
  const registry = TypeRegistry.create([UnitType]);
  assert.ok(Object.isFrozen(registry));
});

// ═══════════════════════════════════════════════════════════════════════════
// 2. Conflicts
// ═══════════════════════════════════════════════════════════════════════════

section("2. Conflicts");

test("a second definition under a taken tag fails", () => {
  const impostor = defineType({ ...PairType, tag: "unit" });
  assert.throws(
    () => TypeRegistry.create([UnitType, impostor]),
    (err: unknown) => err instanceof DuplicateTypeTagError && err.tag === "unit"
  );
});

test("a class registered under two tags fails", () => {
  const alias = defineType({ ...UnitType, tag: "unit_alias" });
  assert.throws(
    () => TypeRegistry.create([UnitType, alias]),
    (err: unknown) =>
      err instanceof DuplicateTypeTagError &&
      err.message === 'Cannot register type tag "unit_alias": class Unit is already registered as "unit"'
  );
});

test("registering the same definition twice is a no-op", () => {
  const registry = TypeRegistry.builder().register(UnitType).register(UnitType).build();
  assert.equal(registry.size, 1);
});

test("reserved and empty tags are refused", () => {
  assert.throws(() => TypeRegistry.create([{ ...UnitType, tag: "__array__" }]), DuplicateTypeTagError);
  assert.throws(() => TypeRegistry.create([{ ...UnitType, tag: "" }]), DuplicateTypeTagError);
});

// ═══════════════════════════════════════════════════════════════════════════
// 3. Builder
// ═══════════════════════════════════════════════════════════════════════════

section("3. Builder");

test("registerAll adds every definition", () => {
  const registry = TypeRegistry.builder().registerAll([UnitType, PairType]).build();
  assert.deepEqual(registry.tags, ["pair", "unit"]);
});

test("registration after build fails", () => {
  const builder = TypeRegistry.builder().register(UnitType);
  builder.build();
  assert.throws(
    () => builder.register(PairType),
    (err: unknown) => err instanceof RegistrySealedError && err.tag === "pair"
  );
});

test("a built registry does not see later builder state", () => {
  const builder = TypeRegistry.builder().register(UnitType);
  const registry = builder.build();
  assert.throws(() => builder.register(PairType), RegistrySealedError);
  assert.equal(registry.has("pair"), false);
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
