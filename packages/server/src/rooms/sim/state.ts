import { ARENA_CONFIG } from "./config.js";
import type { WeaponType } from "./weapons.js";

export type Vec2 = { x: number; y: number };

export type WorldBounds = { left: number; right: number; top: number; bottom: number };

export type ShapeKind = "player" | "bullet" | "ammo" | "gun" | "rock";

/** Geometry only: what the collision index stores. */
export type Shape = {
  kind: ShapeKind;
  id: number;
  x: number;
  y: number;
  radius: number;
};

export type MotionRule =
  | { type: "straight"; vx: number; vy: number }
  // Shotgun pellets: lose a fraction of their speed every tick
  | { type: "spread"; vx: number; vy: number; drag: number }
  // Curving shots: velocity turns by `turnRad` every tick
  | { type: "arc"; vx: number; vy: number; turnRad: number };

export type AmmoState = Readonly<{
  id: number;
  x: number;
  y: number;
  type: WeaponType;
  amount: number;
}>;

export type BulletState = Readonly<{
  id: number;
  x: number;
  y: number;
  damage: number;
  ownerId: number | null;
  age: number;
  motion: MotionRule;
}>;

export type RockState = Readonly<{
  id: number;
  x: number;
  y: number;
}>;

export type GunState = Readonly<{
  id: number;
  x: number;
  y: number;
  type: WeaponType;
  ownerId: number | null;
  ammo: number;
  cooldown: number;
  rate: number;
}>;

export type PlayerState = Readonly<{
  id: number;
  name: string;
  x: number;
  y: number;
  health: number;
  inventory: readonly number[];
  lastFired: WeaponType | null;
  // Heading of the last committed move; default aim when firing
  facing: number;
}>;

export function ammoShape(a: AmmoState): Shape {
  return { kind: "ammo", id: a.id, x: a.x, y: a.y, radius: ARENA_CONFIG.radius.ammo };
}

export function bulletShape(b: BulletState): Shape {
  return { kind: "bullet", id: b.id, x: b.x, y: b.y, radius: ARENA_CONFIG.radius.bullet };
}

export function rockShape(r: RockState): Shape {
  return { kind: "rock", id: r.id, x: r.x, y: r.y, radius: ARENA_CONFIG.radius.rock };
}

export function gunShape(g: GunState): Shape {
  return { kind: "gun", id: g.id, x: g.x, y: g.y, radius: ARENA_CONFIG.radius.gun };
}

export function playerShape(p: PlayerState): Shape {
  return { kind: "player", id: p.id, x: p.x, y: p.y, radius: ARENA_CONFIG.radius.player };
}

export const MAX_SHAPE_RADIUS = Math.max(...Object.values(ARENA_CONFIG.radius));
