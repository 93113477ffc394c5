export type EliminationReason = "killed" | "zone";

export type ArenaEvent =
  | { type: "bulletsExpired"; count: number }
  | { type: "playerEliminated"; playerId: number; name: string; reason: EliminationReason }
  | { type: "ammoSpawned"; count: number }
  | { type: "gunsSpawned"; count: number };

export type TickResult = {
  tick: number;
  events: ArenaEvent[];
};
