import { resolveCollision } from "./collision.js";
import { ARENA_CONFIG } from "./config.js";
import type { ArenaEvent, TickResult } from "./events.js";
import { clamp } from "./math.js";
import { bulletShape } from "./state.js";
import { advanceBullet } from "./weapons.js";
import type { ArenaWorld } from "./world.js";

function removeExpiredBullets(world: ArenaWorld, events: ArenaEvent[]) {
  let count = 0;
  for (const b of [...world.bullets.values()]) {
    if (b.age <= ARENA_CONFIG.bulletTimeoutTicks) continue;
    world.destroyBullet(b.id);
    count++;
  }
  if (count > 0) events.push({ type: "bulletsExpired", count });
}

function removeDeadPlayers(world: ArenaWorld, events: ArenaEvent[]) {
  for (const p of [...world.players.values()]) {
    const killed = p.health <= 0;
    if (!killed && !world.isOutsideZone(p)) continue;
    world.destroyPlayer(p.id);
    events.push({ type: "playerEliminated", playerId: p.id, name: p.name, reason: killed ? "killed" : "zone" });
  }
}

function moveBullets(world: ArenaWorld) {
  for (const b of [...world.bullets.values()]) {
    const next = advanceBullet(b);
    world.bullets.set(next.id, next);
    world.index.update(bulletShape(next));
  }
}

function handleCollisions(world: ArenaWorld) {
  for (const [a, b] of world.index.all()) {
    resolveCollision(world, a, b);
  }
}

function decayCooldowns(world: ArenaWorld) {
  for (const g of [...world.guns.values()]) {
    if (g.cooldown === 0) continue;
    world.guns.set(g.id, { ...g, cooldown: clamp(g.cooldown - ARENA_CONFIG.gunCooldownDecay, 0, g.rate) });
  }
}

function spawn(world: ArenaWorld, events: ArenaEvent[]) {
  const { ammoSpawn, gunSpawn } = ARENA_CONFIG;
  if (world.tick % ammoSpawn.intervalTicks === 0) {
    for (let i = 0; i < ammoSpawn.batch; i++) world.createAmmo();
    events.push({ type: "ammoSpawned", count: ammoSpawn.batch });
  }
  if (world.tick % gunSpawn.intervalTicks === 0) {
    for (let i = 0; i < gunSpawn.batch; i++) world.createGun();
    events.push({ type: "gunsSpawned", count: gunSpawn.batch });
  }
}

/**
 * Advances one game by one tick. The phase order is part of the rules:
 * expiry, sweep, motion, collisions, cooldowns, clock and zone, spawns.
 * Callers hold the game lock.
 */
export function stepWorld(world: ArenaWorld): TickResult {
  const events: ArenaEvent[] = [];

  removeExpiredBullets(world, events);
  removeDeadPlayers(world, events);
  moveBullets(world);
  handleCollisions(world);
  decayCooldowns(world);

  world.tick += 1;
  world.safeZoneRadius -= ARENA_CONFIG.zone.shrinkPerTick;

  spawn(world, events);

  return { tick: world.tick, events };
}
