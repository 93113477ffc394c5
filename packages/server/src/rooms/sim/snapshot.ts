import type {
  AmmoDto,
  ArenaDescriptionDto,
  ArenaSnapshotDto,
  BulletDto,
  GunDto,
  PlayerDto,
  RockDto,
  ShapeDto,
} from "../protocol.js";
import { ARENA_CONFIG } from "./config.js";
import { NotFoundError } from "./errors.js";
import { insideRadius } from "./math.js";
import {
  ammoShape,
  bulletShape,
  gunShape,
  playerShape,
  rockShape,
  type AmmoState,
  type BulletState,
  type GunState,
  type PlayerState,
  type RockState,
  type Shape,
} from "./state.js";
import type { ArenaWorld } from "./world.js";

// Pure projections of the store. Callers hold the game lock.

function ammoToDto(a: AmmoState): AmmoDto {
  return { id: a.id, pos: [a.x, a.y], type: a.type, amount: a.amount };
}

function bulletToDto(b: BulletState): BulletDto {
  return { id: b.id, pos: [b.x, b.y], damage: b.damage, owner: b.ownerId };
}

function rockToDto(r: RockState): RockDto {
  return { id: r.id, pos: [r.x, r.y] };
}

function gunToDto(g: GunState): GunDto {
  return {
    id: g.id,
    pos: [g.x, g.y],
    type: g.type,
    owner: g.ownerId,
    ammo: g.ammo,
    cooldown: g.cooldown,
    rate: g.rate,
  };
}

function playerToDto(p: PlayerState): PlayerDto {
  return {
    id: p.id,
    name: p.name,
    pos: [p.x, p.y],
    hp: p.health,
    inventory: [...p.inventory],
    last_fired: p.lastFired,
  };
}

function shapeToDto(s: Shape): ShapeDto {
  return { kind: s.kind, id: s.id, pos: [s.x, s.y], radius: s.radius };
}

/**
 * The game as `playerId` sees it: nearby ammo, bullets and rocks; guns that
 * are nearby or carried by anyone; every player.
 */
export function toSnapshot(world: ArenaWorld, playerId: number): ArenaSnapshotDto {
  const me = world.players.get(playerId);
  if (!me) throw new NotFoundError("player", playerId);
  const r = ARENA_CONFIG.visionRadius;
  const near = (e: { x: number; y: number }) => insideRadius(me.x, me.y, r, e.x, e.y);

  return {
    id: world.id,
    name: world.name,
    size: [world.size.x, world.size.y],
    rad: world.safeZoneRadius,
    tick: world.tick,
    ammo: [...world.ammo.values()].filter(near).map(ammoToDto),
    bullets: [...world.bullets.values()].filter(near).map(bulletToDto),
    guns: [...world.guns.values()].filter((g) => g.ownerId !== null || near(g)).map(gunToDto),
    players: [...world.players.values()].map(playerToDto),
    rocks: [...world.rocks.values()].filter(near).map(rockToDto),
  };
}

export function toDescription(world: ArenaWorld): ArenaDescriptionDto {
  return {
    game_id: world.id,
    game_name: world.name,
    game_players: [...world.players.values()].map((p) => p.name),
  };
}

/** Ammo, unowned bullets, rocks, guns and players as bare shapes. */
export function listShapes(world: ArenaWorld): Shape[] {
  return [
    ...[...world.ammo.values()].map(ammoShape),
    ...[...world.bullets.values()].filter((b) => b.ownerId === null).map(bulletShape),
    ...[...world.rocks.values()].map(rockShape),
    ...[...world.guns.values()].map(gunShape),
    ...[...world.players.values()].map(playerShape),
  ];
}

export function listShapeDtos(world: ArenaWorld): ShapeDto[] {
  return listShapes(world).map(shapeToDto);
}
