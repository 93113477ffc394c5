import test from "node:test";
import assert from "node:assert/strict";
import { circlesOverlap, clamp, distanceSq, headingRad, insideRadius, lerp, rotate } from "../math.js";
import { createRng, nextFloat, nextInt, pick } from "../rng.js";

test("clamp", () => {
  assert.equal(clamp(5, 0, 10), 5);
  assert.equal(clamp(-1, 0, 10), 0);
  assert.equal(clamp(11, 0, 10), 10);
});

test("lerp", () => {
  assert.equal(lerp(0, 10, 0), 0);
  assert.equal(lerp(0, 10, 1), 10);
  assert.equal(lerp(0, 10, 0.5), 5);
});

test("distanceSq", () => {
  assert.equal(distanceSq(0, 0, 3, 4), 25);
});

test("circlesOverlap is strict", () => {
  assert.equal(circlesOverlap(0, 0, 5, 10, 0, 5), false);
  assert.equal(circlesOverlap(0, 0, 5, 9.9, 0, 5), true);
});

test("insideRadius excludes the boundary and rejects negative radii", () => {
  assert.equal(insideRadius(0, 0, 5, 3, 3.99), true);
  assert.equal(insideRadius(0, 0, 5, 3, 4), false);
  assert.equal(insideRadius(0, 0, -1, 0, 0), false);
});

test("headingRad and rotate", () => {
  assert.equal(headingRad(1, 0), 0);
  assert.equal(headingRad(0, 1), Math.PI / 2);
  assert.deepEqual(rotate(2, 0, 0), { vx: 2, vy: 0 });
});

test("rng is deterministic per seed and stays in range", () => {
  const a = createRng(42);
  const b = createRng(42);
  for (let i = 0; i < 100; i++) {
    const x = nextFloat(a);
    assert.equal(x, nextFloat(b));
    assert.ok(x >= 0 && x < 1);
  }
  const c = createRng(7);
  for (let i = 0; i < 100; i++) {
    const n = nextInt(c, 2, 4);
    assert.ok(n >= 2 && n <= 4 && Number.isInteger(n));
  }
});

test("pick returns undefined for an empty list", () => {
  const rng = createRng(1);
  assert.equal(pick(rng, []), undefined);
  assert.ok(["a", "b"].includes(pick(rng, ["a", "b"]) ?? ""));
});
