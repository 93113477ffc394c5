import test from "node:test";
import assert from "node:assert/strict";
import { NotFoundError } from "../errors.js";
import { listShapeDtos, listShapes, toDescription, toSnapshot } from "../snapshot.js";
import { addAmmo, addBullet, addGun, addPlayer, addRock, emptyWorld } from "./fixtures.js";

test("snapshot filters nearby entities by the vision radius, boundary excluded", () => {
  const world = emptyWorld();
  addPlayer(world, { id: 1, x: 500, y: 500 });
  addAmmo(world, { id: 2, x: 799.5, y: 500, type: "pistol", amount: 12 });
  addAmmo(world, { id: 3, x: 800, y: 500, type: "pistol" });
  addBullet(world, { id: 4, x: 500, y: 201, damage: 10, ownerId: 1 });
  addBullet(world, { id: 5, x: 100, y: 500 });
  addRock(world, { id: 6, x: 520, y: 560 });
  addRock(world, { id: 7, x: 100, y: 100 });
  addRock(world, { id: 8, x: 500, y: 800 });

  const snap = toSnapshot(world, 1);

  assert.deepEqual(snap.ammo, [{ id: 2, pos: [799.5, 500], type: "pistol", amount: 12 }]);
  assert.deepEqual(snap.bullets, [{ id: 4, pos: [500, 201], damage: 10, owner: 1 }]);
  assert.deepEqual(snap.rocks, [{ id: 6, pos: [520, 560] }]);
  assert.equal(snap.id, 1);
  assert.equal(snap.name, "test arena");
  assert.deepEqual(snap.size, [1000, 1000]);
  assert.equal(snap.rad, 710);
  assert.equal(snap.tick, 0);
});

test("snapshot shows carried guns anywhere and loose guns only nearby", () => {
  const world = emptyWorld();
  addPlayer(world, { id: 1, x: 500, y: 500 });
  addPlayer(world, { id: 2, x: 50, y: 50 });
  addGun(world, { id: 3, x: 0, y: 0, type: "rifle", ownerId: 2 });
  addGun(world, { id: 4, x: 550, y: 500, type: "pistol" });
  addGun(world, { id: 5, x: 950, y: 950, type: "sling" });

  const snap = toSnapshot(world, 1);

  assert.deepEqual(
    snap.guns.map((g) => g.id),
    [3, 4],
  );
  assert.deepEqual(snap.guns[0], { id: 3, pos: [0, 0], type: "rifle", owner: 2, ammo: 6, cooldown: 0, rate: 45 });
  assert.deepEqual(snap.players, [
    { id: 1, name: "player-1", pos: [500, 500], hp: 100, inventory: [], last_fired: null },
    { id: 2, name: "player-2", pos: [50, 50], hp: 100, inventory: [3], last_fired: null },
  ]);
});

test("snapshot for an unknown player is not found", () => {
  const world = emptyWorld();
  assert.throws(() => toSnapshot(world, 1), NotFoundError);
});

test("description lists player names", () => {
  const world = emptyWorld();
  addPlayer(world, { id: 1, x: 500, y: 500, name: "alice" });
  addPlayer(world, { id: 2, x: 200, y: 200, name: "bob" });

  assert.deepEqual(toDescription(world), { game_id: 1, game_name: "test arena", game_players: ["alice", "bob"] });
});

test("shape listing skips owned bullets but keeps every gun", () => {
  const world = emptyWorld();
  addAmmo(world, { id: 1, x: 100, y: 100, type: "rifle" });
  addBullet(world, { id: 2, x: 200, y: 100, ownerId: 9 });
  addBullet(world, { id: 3, x: 300, y: 100 });
  addRock(world, { id: 4, x: 400, y: 100 });
  addPlayer(world, { id: 9, x: 500, y: 100 });
  addGun(world, { id: 5, x: 0, y: 0, type: "pistol", ownerId: 9 });

  const keys = listShapes(world).map((s) => `${s.kind}:${s.id}`);
  assert.deepEqual(keys, ["ammo:1", "bullet:3", "rock:4", "gun:5", "player:9"]);

  assert.deepEqual(listShapeDtos(world)[0], { kind: "ammo", id: 1, pos: [100, 100], radius: 6 });
});
