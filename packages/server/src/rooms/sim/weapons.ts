import { rotate } from "./math.js";
import type { BulletState, MotionRule } from "./state.js";

export const WEAPON_TYPES = ["pistol", "shotgun", "rifle", "sling"] as const;

export type WeaponType = (typeof WEAPON_TYPES)[number];

export type WeaponStats = {
  /** Cooldown set on fire, in ticks. */
  cooldown: number;
  damage: number;
  /** Muzzle speed, world units per tick. */
  speed: number;
  pellets: number;
  /** Half-angle of the fan for multi-pellet weapons. Pellets must leave the muzzle apart. */
  spreadRad: number;
  motion: MotionRule["type"];
  /** Per-tick speed loss for `spread`, per-tick turn for `arc`. */
  motionParam: number;
  startAmmo: number;
  ammoDrop: number;
};

export const WEAPON_STATS: Record<WeaponType, WeaponStats> = {
  pistol: {
    cooldown: 10,
    damage: 10,
    speed: 8,
    pellets: 1,
    spreadRad: 0,
    motion: "straight",
    motionParam: 0,
    startAmmo: 24,
    ammoDrop: 12,
  },
  shotgun: {
    cooldown: 30,
    damage: 6,
    speed: 7,
    pellets: 3,
    spreadRad: 0.4,
    motion: "spread",
    motionParam: 0.04,
    startAmmo: 8,
    ammoDrop: 4,
  },
  rifle: {
    cooldown: 45,
    damage: 35,
    speed: 16,
    pellets: 1,
    spreadRad: 0,
    motion: "straight",
    motionParam: 0,
    startAmmo: 6,
    ammoDrop: 3,
  },
  sling: {
    cooldown: 20,
    damage: 15,
    speed: 6,
    pellets: 1,
    spreadRad: 0,
    motion: "arc",
    motionParam: 0.05,
    startAmmo: 10,
    ammoDrop: 5,
  },
};

/** Motion rule for a bullet leaving the muzzle with velocity (vx, vy). */
export function motionFor(type: WeaponType, vx: number, vy: number): MotionRule {
  const stats = WEAPON_STATS[type];
  switch (stats.motion) {
    case "straight":
      return { type: "straight", vx, vy };
    case "spread":
      return { type: "spread", vx, vy, drag: stats.motionParam };
    case "arc":
      return { type: "arc", vx, vy, turnRad: stats.motionParam };
  }
}

function nextMotion(m: MotionRule): MotionRule {
  switch (m.type) {
    case "straight":
      return m;
    case "spread": {
      const keep = Math.max(0, 1 - m.drag);
      return { ...m, vx: m.vx * keep, vy: m.vy * keep };
    }
    case "arc": {
      const v = rotate(m.vx, m.vy, m.turnRad);
      return { ...m, vx: v.vx, vy: v.vy };
    }
  }
}

/** One tick of motion: position advances by the current velocity, then the rule updates it. */
export function advanceBullet(b: BulletState): BulletState {
  return {
    ...b,
    x: b.x + b.motion.vx,
    y: b.y + b.motion.vy,
    age: b.age + 1,
    motion: nextMotion(b.motion),
  };
}
