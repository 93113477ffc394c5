import { resolveCollision } from "./collision.js";
import { ARENA_CONFIG } from "./config.js";
import { NotFoundError } from "./errors.js";
import { headingRad } from "./math.js";
import { playerShape, type PlayerState, type Vec2 } from "./state.js";
import { ArenaWorld, type ArenaWorldOptions } from "./world.js";

/**
 * Request-side operations on one game. None of them take the lock; the lobby
 * wraps each call in `world.lock.run`.
 */

function requirePlayer(world: ArenaWorld, playerId: number): PlayerState {
  const p = world.players.get(playerId);
  if (!p) throw new NotFoundError("player", playerId);
  return p;
}

/** New game seeded with rocks, guns, ammo (in that order) and its first player. */
export function createArena(
  gameId: number,
  gameName: string,
  playerName: string,
  options: ArenaWorldOptions = {},
): { world: ArenaWorld; playerId: number } {
  const world = new ArenaWorld(gameId, gameName, options);
  for (let i = 0; i < ARENA_CONFIG.initialRocks; i++) world.createRock();
  for (let i = 0; i < ARENA_CONFIG.initialGuns; i++) world.createGun();
  for (let i = 0; i < ARENA_CONFIG.initialAmmo; i++) world.createAmmo();
  const player = world.createPlayer(playerName);
  return { world, playerId: player.id };
}

export function joinArena(world: ArenaWorld, playerName: string): number {
  return world.createPlayer(playerName).id;
}

/**
 * Fires `gunId` for `playerId`. Silently does nothing when the gun is not
 * theirs or still cooling down; a dead shooter is removed instead.
 */
export function fire(world: ArenaWorld, playerId: number, gunId: number, aim?: Vec2): void {
  const p = requirePlayer(world, playerId);
  const g = world.guns.get(gunId);
  if (!g) throw new NotFoundError("gun", gunId);

  if (p.health <= 0) {
    world.destroyPlayer(p.id);
    return;
  }
  if (!p.inventory.includes(g.id)) return;
  if (g.ownerId !== p.id || g.cooldown !== 0) return;

  const shooter: PlayerState = { ...p, lastFired: g.type };
  world.putGun({ ...g, cooldown: g.rate });
  world.replacePlayer(shooter);
  for (const b of world.generator.bullets(shooter, g, aim)) {
    world.putBullet(b);
  }
}

/**
 * Moves a player to `target` unless something solid is in the way.
 * Every collision at the target fires its effect either way.
 */
export function move(world: ArenaWorld, playerId: number, target: Vec2): void {
  if (!world.isInsideMap(target)) return;
  const p = requirePlayer(world, playerId);
  if (p.health <= 0) {
    world.destroyPlayer(p.id);
    return;
  }

  world.index.remove(playerShape(p));
  const candidate: PlayerState = {
    ...p,
    x: target.x,
    y: target.y,
    facing: target.x === p.x && target.y === p.y ? p.facing : headingRad(target.x - p.x, target.y - p.y),
  };

  const shape = playerShape(candidate);
  let blocked = false;
  for (const other of world.index.test(shape)) {
    if (resolveCollision(world, shape, other)) blocked = true;
  }

  // Resolution may have changed health or inventory; start from the stored record
  const current = world.players.get(p.id);
  if (!current) return;
  const next: PlayerState = blocked ? current : { ...current, x: candidate.x, y: candidate.y, facing: candidate.facing };
  world.replacePlayer(next);
  if (next.health > 0) world.index.update(playerShape(next));
}
