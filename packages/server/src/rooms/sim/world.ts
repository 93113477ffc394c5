import { ARENA_CONFIG } from "./config.js";
import { ArenaGenerator } from "./generate.js";
import { GameLock } from "./lock.js";
import { CollisionIndex } from "./spatial/grid.js";
import {
  MAX_SHAPE_RADIUS,
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
  type Vec2,
  type WorldBounds,
} from "./state.js";

export type ArenaWorldOptions = {
  seed?: number;
};

/**
 * One game: the entity store, its collision index and the game lock.
 *
 * Every create/destroy keeps store and index in step: solid entities get a
 * shape, owned guns do not. Records are replaced, never mutated in place.
 */
export class ArenaWorld {
  readonly id: number;
  readonly name: string;
  readonly size: Vec2 = { x: ARENA_CONFIG.mapWidth, y: ARENA_CONFIG.mapHeight };
  readonly lock = new GameLock();
  readonly generator: ArenaGenerator;
  readonly index: CollisionIndex;

  safeZoneRadius: number = ARENA_CONFIG.zone.initialRadius;
  tick = 0;

  readonly ammo = new Map<number, AmmoState>();
  readonly bullets = new Map<number, BulletState>();
  readonly rocks = new Map<number, RockState>();
  readonly guns = new Map<number, GunState>();
  readonly players = new Map<number, PlayerState>();

  constructor(id: number, name: string, options: ArenaWorldOptions = {}) {
    this.id = id;
    this.name = name;
    this.generator = new ArenaGenerator(options.seed ?? Date.now());
    this.index = new CollisionIndex(ARENA_CONFIG.gridCellSize, () => this.generator.random());
  }

  get bounds(): WorldBounds {
    return { left: 0, top: 0, right: this.size.x, bottom: this.size.y };
  }

  get center(): Vec2 {
    return { x: this.size.x / 2, y: this.size.y / 2 };
  }

  /** A spot where any kind of entity fits without touching anything. */
  free(): Vec2 {
    return this.index.free(this.bounds, MAX_SHAPE_RADIUS, ARENA_CONFIG.freeMaxAttempts);
  }

  // ------------------------------------------------------------------
  // Creation
  // ------------------------------------------------------------------

  createAmmo(): AmmoState {
    const gunTypes = [...this.guns.values()].map((g) => g.type);
    const a = this.generator.ammo(this.free(), gunTypes);
    this.index.update(ammoShape(a));
    this.ammo.set(a.id, a);
    return a;
  }

  createGun(): GunState {
    const g = this.generator.gun(this.free());
    this.index.update(gunShape(g));
    this.guns.set(g.id, g);
    return g;
  }

  createRock(): RockState {
    const r = this.generator.rock(this.free());
    this.index.update(rockShape(r));
    this.rocks.set(r.id, r);
    return r;
  }

  createPlayer(name: string): PlayerState {
    const p = this.generator.player(this.free(), name);
    this.index.update(playerShape(p));
    this.players.set(p.id, p);
    return p;
  }

  // ------------------------------------------------------------------
  // Insertion of externally built records (bullets, tests)
  // ------------------------------------------------------------------

  putAmmo(a: AmmoState): void {
    this.ammo.set(a.id, a);
    this.index.update(ammoShape(a));
  }

  putBullet(b: BulletState): void {
    this.bullets.set(b.id, b);
    this.index.update(bulletShape(b));
  }

  putRock(r: RockState): void {
    this.rocks.set(r.id, r);
    this.index.update(rockShape(r));
  }

  /** Writes a gun back; its shape follows ownership. */
  putGun(g: GunState): void {
    this.guns.set(g.id, g);
    if (g.ownerId === null) this.index.update(gunShape(g));
    else this.index.remove(gunShape(g));
  }

  /** Writes a player back. Index membership is left to the caller. */
  replacePlayer(p: PlayerState): void {
    this.players.set(p.id, p);
  }

  // ------------------------------------------------------------------
  // Destruction
  // ------------------------------------------------------------------

  destroyBullet(id: number): void {
    const b = this.bullets.get(id);
    if (!b) return;
    this.bullets.delete(id);
    this.index.remove(bulletShape(b));
  }

  destroyAmmo(id: number): void {
    const a = this.ammo.get(id);
    if (!a) return;
    this.ammo.delete(id);
    this.index.remove(ammoShape(a));
  }

  /** Removes the gun and detaches it from its owner's inventory. */
  destroyGun(id: number): void {
    const g = this.guns.get(id);
    if (!g) return;
    this.guns.delete(id);
    this.index.remove(gunShape(g));
    if (g.ownerId === null) return;
    const owner = this.players.get(g.ownerId);
    if (!owner) return;
    this.replacePlayer({ ...owner, inventory: owner.inventory.filter((gid) => gid !== id) });
  }

  /** Removes the player and deletes every gun they own. */
  destroyPlayer(id: number): void {
    const p = this.players.get(id);
    if (!p) return;
    this.players.delete(id);
    this.index.remove(playerShape(p));
    for (const gid of p.inventory) this.guns.delete(gid);
  }

  // ------------------------------------------------------------------
  // Queries
  // ------------------------------------------------------------------

  /**
   * Whether a shape still stands for a solid entity. Players count while
   * they are in the store, even after a fatal hit took their shape away.
   */
  isLive(shape: Shape): boolean {
    switch (shape.kind) {
      case "player":
        return this.players.has(shape.id);
      case "bullet":
        return this.bullets.has(shape.id);
      case "ammo":
        return this.ammo.has(shape.id);
      case "rock":
        return this.rocks.has(shape.id);
      case "gun": {
        const g = this.guns.get(shape.id);
        return g !== undefined && g.ownerId === null;
      }
    }
  }

  /** Strictly outside the safe zone; the boundary itself is safe. */
  isOutsideZone(pos: Vec2): boolean {
    if (this.safeZoneRadius < 0) return true;
    const c = this.center;
    const dx = pos.x - c.x;
    const dy = pos.y - c.y;
    return dx * dx + dy * dy > this.safeZoneRadius * this.safeZoneRadius;
  }

  isInsideMap(pos: Vec2): boolean {
    return pos.x >= 0 && pos.y >= 0 && pos.x <= this.size.x && pos.y <= this.size.y;
  }
}
