import { ArenaInvariantError } from "./errors.js";
import { playerShape, type GunState, type PlayerState, type Shape, type ShapeKind } from "./state.js";
import type { WeaponType } from "./weapons.js";
import type { ArenaWorld } from "./world.js";

/** `true` when the collision prevents the move that produced it. */
export type Blocked = boolean;

const KIND_RANK: Record<ShapeKind, number> = {
  player: 0,
  bullet: 1,
  ammo: 2,
  gun: 2,
  rock: 2,
};

/** Orders a pair Player < Bullet < {Ammo, Gun, Rock}; ties keep their order. */
export function canonicalize(a: Shape, b: Shape): [Shape, Shape] {
  return KIND_RANK[b.kind] < KIND_RANK[a.kind] ? [b, a] : [a, b];
}

function ownedGunOfType(world: ArenaWorld, p: PlayerState, type: WeaponType): GunState | undefined {
  for (const gid of p.inventory) {
    const g = world.guns.get(gid);
    if (g && g.type === type) return g;
  }
  return undefined;
}

function playerAmmo(world: ArenaWorld, playerId: number, ammoId: number): Blocked {
  const p = world.players.get(playerId);
  const a = world.ammo.get(ammoId);
  if (!p || !a) return false;
  const g = ownedGunOfType(world, p, a.type);
  if (!g) return true;
  world.putGun({ ...g, ammo: g.ammo + a.amount });
  world.destroyAmmo(a.id);
  return false;
}

function playerBullet(world: ArenaWorld, playerId: number, bulletId: number): Blocked {
  const p = world.players.get(playerId);
  const b = world.bullets.get(bulletId);
  if (!p || !b) return false;
  const next: PlayerState = { ...p, health: p.health - b.damage };
  world.replacePlayer(next);
  world.destroyBullet(b.id);
  // Out of the physical world now; the dead-player sweep drops the record
  if (next.health <= 0) world.index.remove(playerShape(next));
  return false;
}

function playerGun(world: ArenaWorld, playerId: number, gunId: number): Blocked {
  const p = world.players.get(playerId);
  const g = world.guns.get(gunId);
  if (!p || !g) return false;
  if (ownedGunOfType(world, p, g.type)) return true;
  world.replacePlayer({ ...p, inventory: [g.id, ...p.inventory] });
  world.putGun({ ...g, ownerId: p.id });
  return false;
}

function unresolvable(a: Shape, b: Shape): never {
  throw new ArenaInvariantError(`Unresolvable collision: ${a.kind}#${a.id} with ${b.kind}#${b.id}`);
}

/**
 * Applies the effect of `a` touching `b` and reports whether it blocks
 * movement. Pairs whose members were already removed are no-ops.
 */
export function resolveCollision(world: ArenaWorld, a: Shape, b: Shape): Blocked {
  const [first, second] = canonicalize(a, b);
  if (KIND_RANK[first.kind] === 2) unresolvable(first, second);
  if (!world.isLive(first) || !world.isLive(second)) return false;

  if (first.kind === "player") {
    switch (second.kind) {
      case "ammo":
        return playerAmmo(world, first.id, second.id);
      case "bullet":
        return playerBullet(world, first.id, second.id);
      case "gun":
        return playerGun(world, first.id, second.id);
      case "rock":
      case "player":
        return true;
    }
  }

  if (first.kind === "bullet") {
    switch (second.kind) {
      case "ammo":
        world.destroyBullet(first.id);
        world.destroyAmmo(second.id);
        return false;
      case "bullet":
        world.destroyBullet(first.id);
        world.destroyBullet(second.id);
        return false;
      case "gun":
        world.destroyBullet(first.id);
        world.destroyGun(second.id);
        return false;
      case "rock":
        world.destroyBullet(first.id);
        return false;
      case "player":
        // canonicalize puts players first
        return unresolvable(first, second);
    }
  }

  return unresolvable(first, second);
}
