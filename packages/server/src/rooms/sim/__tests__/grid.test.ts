import test from "node:test";
import assert from "node:assert/strict";
import { ArenaInvariantError } from "../errors.js";
import { CollisionIndex } from "../spatial/grid.js";
import type { Shape } from "../state.js";

function circle(kind: Shape["kind"], id: number, x: number, y: number, radius: number): Shape {
  return { kind, id, x, y, radius };
}

function keys(shapes: Shape[]): string[] {
  return shapes.map((s) => `${s.kind}:${s.id}`).sort();
}

test("test is read-only and repeatable", () => {
  const index = new CollisionIndex(40);
  index.update(circle("rock", 1, 100, 100, 20));
  index.update(circle("ammo", 2, 130, 100, 6));
  const probe = circle("player", 3, 115, 100, 10);

  const first = index.test(probe);
  const second = index.test(probe);
  assert.deepEqual(second, first);
  assert.deepEqual(keys(first), ["ammo:2", "rock:1"]);
  assert.equal(index.size, 2);
  assert.equal(index.has(probe), false);
});

test("disjoint probe is not reported", () => {
  const index = new CollisionIndex(40);
  index.update(circle("rock", 1, 0, 0, 5));
  assert.deepEqual(index.test(circle("player", 2, 100, 100, 5)), []);
});

test("tangent circles do not collide", () => {
  const index = new CollisionIndex(40);
  index.update(circle("bullet", 1, 0, 0, 5));
  index.update(circle("bullet", 2, 10, 0, 5));
  assert.equal(index.all().length, 0);

  index.update(circle("bullet", 2, 9, 0, 5));
  assert.equal(index.all().length, 1);
});

test("all reports one pair, then none after a removal", () => {
  const index = new CollisionIndex(40);
  const a = circle("player", 1, 50, 50, 10);
  const b = circle("player", 2, 60, 55, 10);
  index.update(a);
  index.update(b);

  const pairs = index.all();
  assert.equal(pairs.length, 1);
  assert.deepEqual(keys(pairs[0]), ["player:1", "player:2"]);

  index.remove(b);
  assert.deepEqual(index.all(), []);
});

test("pairs spanning several shared cells are reported once", () => {
  const index = new CollisionIndex(40);
  index.update(circle("rock", 1, 40, 40, 10));
  index.update(circle("gun", 2, 42, 40, 10));
  assert.equal(index.all().length, 1);
});

test("overlaps across a cell border and at negative coordinates are found", () => {
  const index = new CollisionIndex(40);
  index.update(circle("bullet", 1, 38, 10, 5));
  index.update(circle("bullet", 2, 44, 10, 5));
  index.update(circle("ammo", 3, -5, -5, 3));
  index.update(circle("ammo", 4, -1, -5, 3));
  assert.equal(index.all().length, 2);
});

test("remove then re-add restores identical answers", () => {
  const index = new CollisionIndex(40);
  const rock = circle("rock", 1, 200, 200, 20);
  const gun = circle("gun", 2, 220, 200, 8);
  index.update(rock);
  index.update(gun);
  const probe = circle("player", 9, 205, 215, 10);
  const beforeTest = index.test(probe);
  const beforeAll = index.all();

  index.remove(gun);
  index.update(gun);

  assert.deepEqual(keys(index.test(probe)), keys(beforeTest));
  assert.deepEqual(index.all().map(keys), beforeAll.map(keys));
});

test("update replaces the stored geometry", () => {
  const index = new CollisionIndex(40);
  index.update(circle("player", 1, 100, 100, 10));
  index.update(circle("player", 1, 500, 500, 10));
  assert.equal(index.size, 1);
  assert.deepEqual(index.test(circle("rock", 2, 100, 100, 5)), []);
  assert.deepEqual(keys(index.test(circle("rock", 2, 505, 500, 5))), ["player:1"]);
});

test("removing an absent shape is a no-op", () => {
  const index = new CollisionIndex(40);
  index.remove(circle("rock", 1, 0, 0, 20));
  assert.equal(index.size, 0);
});

test("a shape never collides with itself", () => {
  const index = new CollisionIndex(40);
  const p = circle("player", 1, 10, 10, 10);
  index.update(p);
  assert.deepEqual(index.test(p), []);
});

test("free finds an unoccupied spot inside the bounds", () => {
  const index = new CollisionIndex(40);
  index.update(circle("rock", 1, 50, 50, 20));
  index.update(circle("rock", 2, 150, 50, 20));
  const bounds = { left: 0, top: 0, right: 200, bottom: 100 };

  for (let i = 0; i < 20; i++) {
    const pos = index.free(bounds, 20, 500);
    assert.ok(pos.x >= 20 && pos.x <= 180);
    assert.ok(pos.y >= 20 && pos.y <= 80);
    assert.deepEqual(index.test(circle("ammo", 100, pos.x, pos.y, 20)), []);
  }
  assert.equal(index.size, 2);
});

test("free gives up with an invariant error when nothing fits", () => {
  const index = new CollisionIndex(40);
  index.update(circle("rock", 1, 50, 50, 200));
  const bounds = { left: 0, top: 0, right: 100, bottom: 100 };
  assert.throws(() => index.free(bounds, 5, 10), ArenaInvariantError);
});

test("query results are copies of the stored geometry", () => {
  const index = new CollisionIndex(40);
  index.update(circle("rock", 1, 100, 100, 20));
  index.update(circle("ammo", 2, 110, 100, 6));

  const [hit] = index.test(circle("player", 3, 95, 100, 10));
  hit.x = 900;
  const [[a, b]] = index.all();
  a.x = 900;
  b.x = 900;

  assert.deepEqual(keys(index.test(circle("player", 3, 95, 100, 10))), ["ammo:2", "rock:1"]);
  assert.equal(index.all().length, 1);
  assert.deepEqual(index.test(circle("player", 3, 900, 100, 10)), []);
});
