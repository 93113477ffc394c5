import { ARENA_CONFIG } from "./config.js";
import { headingRad } from "./math.js";
import { createRng, nextFloat, nextRange, pick, type RngState } from "./rng.js";
import type { AmmoState, BulletState, GunState, PlayerState, RockState, Vec2 } from "./state.js";
import { WEAPON_STATS, WEAPON_TYPES, motionFor, type WeaponType } from "./weapons.js";

/**
 * Supplies new entity records with ids unique within one game.
 * Placement is the caller's job: every factory takes a free position.
 */
export class ArenaGenerator {
  private nextId = 1;
  readonly rng: RngState;

  constructor(seed: number) {
    this.rng = createRng(seed);
  }

  /** Uniform in [0, 1), drawn from the game's stream. */
  random(): number {
    return nextFloat(this.rng);
  }

  /** Ammo matches a weapon type already in play when there is one. */
  ammo(pos: Vec2, gunTypes: readonly WeaponType[]): AmmoState {
    const type = pick(this.rng, gunTypes) ?? this.weaponType();
    return { id: this.newId(), x: pos.x, y: pos.y, type, amount: WEAPON_STATS[type].ammoDrop };
  }

  gun(pos: Vec2): GunState {
    const type = this.weaponType();
    const stats = WEAPON_STATS[type];
    return {
      id: this.newId(),
      x: pos.x,
      y: pos.y,
      type,
      ownerId: null,
      ammo: stats.startAmmo,
      cooldown: 0,
      rate: stats.cooldown,
    };
  }

  rock(pos: Vec2): RockState {
    return { id: this.newId(), x: pos.x, y: pos.y };
  }

  player(pos: Vec2, name: string): PlayerState {
    return {
      id: this.newId(),
      name,
      x: pos.x,
      y: pos.y,
      health: ARENA_CONFIG.playerHealth,
      inventory: [],
      lastFired: null,
      facing: 0,
    };
  }

  /**
   * Bullets for one shot of `gun` by `player`, aimed at `aim` or along the
   * player's facing. They start just outside the shooter's radius.
   */
  bullets(player: PlayerState, gun: GunState, aim?: Vec2): BulletState[] {
    const stats = WEAPON_STATS[gun.type];
    const base =
      aim && (aim.x !== player.x || aim.y !== player.y)
        ? headingRad(aim.x - player.x, aim.y - player.y)
        : player.facing;
    const muzzle = ARENA_CONFIG.radius.player + ARENA_CONFIG.radius.bullet + 1;

    const out: BulletState[] = [];
    for (let i = 0; i < stats.pellets; i++) {
      let angle = base;
      if (stats.pellets > 1) {
        // Evenly fanned across [-spread, +spread] with a little jitter
        const step = (2 * stats.spreadRad) / (stats.pellets - 1);
        const jitter = nextRange(this.rng, -0.1, 0.1) * stats.spreadRad;
        angle = base - stats.spreadRad + step * i + jitter;
      }
      const dx = Math.cos(angle);
      const dy = Math.sin(angle);
      out.push({
        id: this.newId(),
        x: player.x + dx * muzzle,
        y: player.y + dy * muzzle,
        damage: stats.damage,
        ownerId: player.id,
        age: 0,
        motion: motionFor(gun.type, dx * stats.speed, dy * stats.speed),
      });
    }
    return out;
  }

  private weaponType(): WeaponType {
    return pick(this.rng, WEAPON_TYPES) ?? "pistol";
  }

  private newId(): number {
    return this.nextId++;
  }
}
