import { ARENA_CONFIG } from "../config.js";
import { playerShape, type AmmoState, type BulletState, type GunState, type PlayerState, type RockState } from "../state.js";
import { WEAPON_STATS, type WeaponType } from "../weapons.js";
import { ArenaWorld } from "../world.js";

export function emptyWorld(): ArenaWorld {
  return new ArenaWorld(1, "test arena", { seed: 42 });
}

export function addPlayer(world: ArenaWorld, p: Partial<PlayerState> & { id: number; x: number; y: number }): PlayerState {
  const player: PlayerState = {
    name: `player-${p.id}`,
    health: ARENA_CONFIG.playerHealth,
    inventory: [],
    lastFired: null,
    facing: 0,
    ...p,
  };
  world.replacePlayer(player);
  if (player.health > 0) world.index.update(playerShape(player));
  return player;
}

/** Adds a gun; when `ownerId` is set the owner's inventory is updated too. */
export function addGun(
  world: ArenaWorld,
  g: Partial<GunState> & { id: number; x: number; y: number; type: WeaponType },
): GunState {
  const gun: GunState = {
    ownerId: null,
    ammo: WEAPON_STATS[g.type].startAmmo,
    cooldown: 0,
    rate: WEAPON_STATS[g.type].cooldown,
    ...g,
  };
  world.putGun(gun);
  if (gun.ownerId !== null) {
    const owner = world.players.get(gun.ownerId);
    if (owner) world.replacePlayer({ ...owner, inventory: [...owner.inventory, gun.id] });
  }
  return gun;
}

export function addBullet(
  world: ArenaWorld,
  b: Partial<BulletState> & { id: number; x: number; y: number },
): BulletState {
  const bullet: BulletState = {
    damage: 10,
    ownerId: null,
    age: 0,
    motion: { type: "straight", vx: 0, vy: 0 },
    ...b,
  };
  world.putBullet(bullet);
  return bullet;
}

export function addRock(world: ArenaWorld, r: RockState): RockState {
  world.putRock(r);
  return r;
}

export function addAmmo(
  world: ArenaWorld,
  a: Partial<AmmoState> & { id: number; x: number; y: number; type: WeaponType },
): AmmoState {
  const ammo: AmmoState = { amount: WEAPON_STATS[a.type].ammoDrop, ...a };
  world.putAmmo(ammo);
  return ammo;
}
