import test from "node:test";
import assert from "node:assert/strict";
import { ArenaInvariantError } from "../errors.js";
import { GameLock } from "../lock.js";

test("run returns the section's result and releases the lock", () => {
  const lock = new GameLock();
  assert.equal(
    lock.run(() => {
      assert.equal(lock.isHeld, true);
      return 3;
    }),
    3,
  );
  assert.equal(lock.isHeld, false);
});

test("re-entering the lock is an invariant error", () => {
  const lock = new GameLock();
  assert.throws(() => lock.run(() => lock.run(() => 1)), ArenaInvariantError);
  assert.equal(lock.isHeld, false);
});

test("the lock is released when the section throws", () => {
  const lock = new GameLock();
  assert.throws(() =>
    lock.run(() => {
      throw new Error("boom");
    }),
  );
  assert.equal(lock.isHeld, false);
  assert.equal(
    lock.run(() => "again"),
    "again",
  );
});

test("async sections are refused", () => {
  const lock = new GameLock();
  assert.throws(() => lock.run(async () => 1), ArenaInvariantError);
  assert.equal(lock.isHeld, false);
});
