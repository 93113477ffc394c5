import type { ShapeKind } from "./sim/state.js";
import type { WeaponType } from "./sim/weapons.js";

export const PROTOCOL_VERSION = 1;

export type AmmoDto = { id: number; pos: [number, number]; type: WeaponType; amount: number };

export type BulletDto = { id: number; pos: [number, number]; damage: number; owner: number | null };

export type RockDto = { id: number; pos: [number, number] };

export type GunDto = {
  id: number;
  pos: [number, number];
  type: WeaponType;
  owner: number | null;
  ammo: number;
  cooldown: number;
  rate: number;
};

export type PlayerDto = {
  id: number;
  name: string;
  pos: [number, number];
  hp: number;
  inventory: number[];
  last_fired: WeaponType | null;
};

/** Everything one player may see of a game. */
export type ArenaSnapshotDto = {
  id: number;
  name: string;
  size: [number, number];
  rad: number;
  tick: number;
  ammo: AmmoDto[];
  bullets: BulletDto[];
  guns: GunDto[];
  players: PlayerDto[];
  rocks: RockDto[];
};

export type ArenaDescriptionDto = {
  game_id: number;
  game_name: string;
  game_players: string[];
};

export type ShapeDto = { kind: ShapeKind; id: number; pos: [number, number]; radius: number };

// WebSocket messages (client -> room)

export type MoveMessage = { x: number; y: number };

export type FireMessage = { gunId: number; aimX?: number; aimY?: number };

// WebSocket messages (room -> client)

export type ArenaErrorMessage = { message: string };

export type EliminatedMessage = { playerId: number };
