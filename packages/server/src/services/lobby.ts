import { config } from "../config.js";
import type { ArenaDescriptionDto, ArenaSnapshotDto, ShapeDto } from "../rooms/protocol.js";
import { createArena, fire, joinArena, move } from "../rooms/sim/actions.js";
import { ArenaInvariantError, NotFoundError } from "../rooms/sim/errors.js";
import type { TickResult } from "../rooms/sim/events.js";
import { listShapeDtos, toDescription, toSnapshot } from "../rooms/sim/snapshot.js";
import type { Vec2 } from "../rooms/sim/state.js";
import { stepWorld } from "../rooms/sim/step.js";
import type { ArenaWorld, ArenaWorldOptions } from "../rooms/sim/world.js";

export type LobbyOptions = {
  retireEmptyGames?: boolean;
  /** Seed for each new game; defaults to the clock. */
  seedFor?: (gameId: number) => number;
};

export type ArenaSummary = {
  name: string;
  tick: number;
  safeZoneRadius: number;
  playerCount: number;
};

export type LobbyTickReport = {
  results: Map<number, TickResult>;
  retired: number[];
};

/**
 * Registry of running games and the scheduler that steps them.
 *
 * Every read or write of a game goes through its lock, handlers and
 * stepper alike. Results are plain DTOs so serialization happens after the
 * lock is released.
 */
export class Lobby {
  private readonly games = new Map<number, ArenaWorld>();
  private nextGameId = 0;
  private timer: NodeJS.Timeout | null = null;
  private readonly retireEmptyGames: boolean;
  private readonly seedFor: (gameId: number) => number;

  constructor(options: LobbyOptions = {}) {
    this.retireEmptyGames = options.retireEmptyGames ?? true;
    this.seedFor = options.seedFor ?? (() => Date.now());
  }

  get gameCount(): number {
    return this.games.size;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  has(gameId: number): boolean {
    return this.games.has(gameId);
  }

  create(gameName: string, playerName: string): { gameId: number; playerId: number } {
    const gameId = this.nextGameId++;
    const options: ArenaWorldOptions = { seed: this.seedFor(gameId) };
    const { world, playerId } = createArena(gameId, gameName, playerName, options);
    this.games.set(gameId, world);
    console.log(`[lobby] Game ${gameId} "${gameName}" created by ${playerName} (player ${playerId})`);
    return { gameId, playerId };
  }

  join(gameId: number, playerName: string): number {
    const playerId = this.withGame(gameId, (world) => joinArena(world, playerName));
    console.log(`[lobby] ${playerName} joined game ${gameId} as player ${playerId}`);
    return playerId;
  }

  fire(gameId: number, playerId: number, gunId: number, aim?: Vec2): void {
    this.withGame(gameId, (world) => fire(world, playerId, gunId, aim));
  }

  move(gameId: number, playerId: number, target: Vec2): void {
    this.withGame(gameId, (world) => move(world, playerId, target));
  }

  snapshot(gameId: number, playerId: number): ArenaSnapshotDto {
    return this.withGame(gameId, (world) => toSnapshot(world, playerId));
  }

  describe(gameId: number): ArenaDescriptionDto {
    return this.withGame(gameId, (world) => toDescription(world));
  }

  entities(gameId: number): ShapeDto[] {
    return this.withGame(gameId, (world) => listShapeDtos(world));
  }

  summary(gameId: number): ArenaSummary {
    return this.withGame(gameId, (world) => ({
      name: world.name,
      tick: world.tick,
      safeZoneRadius: world.safeZoneRadius,
      playerCount: world.players.size,
    }));
  }

  hasPlayer(gameId: number, playerId: number): boolean {
    const world = this.games.get(gameId);
    if (!world) return false;
    return world.lock.run(() => world.players.has(playerId));
  }

  list(): ArenaDescriptionDto[] {
    return [...this.games.values()].map((world) => world.lock.run(() => toDescription(world)));
  }

  /**
   * One scheduler tick: steps every game in turn. A game whose tick hits an
   * invariant violation is retired; others keep running. Empty games are
   * retired afterwards, never mid-tick.
   */
  stepAll(): LobbyTickReport {
    const results = new Map<number, TickResult>();
    const retired: number[] = [];

    for (const world of [...this.games.values()]) {
      try {
        const result = world.lock.run(() => stepWorld(world));
        results.set(world.id, result);
        for (const e of result.events) {
          if (e.type === "playerEliminated") {
            console.log(`[lobby] Game ${world.id}: ${e.name} (player ${e.playerId}) eliminated (${e.reason})`);
          }
        }
      } catch (error) {
        if (!(error instanceof ArenaInvariantError)) throw error;
        console.error(`[scheduler] Fatal tick error in game ${world.id}, retiring it:`, error);
        retired.push(world.id);
      }
    }

    if (this.retireEmptyGames) {
      for (const world of this.games.values()) {
        if (retired.includes(world.id)) continue;
        if (world.lock.run(() => world.players.size) === 0) retired.push(world.id);
      }
    }

    for (const id of retired) {
      this.games.delete(id);
      console.log(`[lobby] Game ${id} retired`);
    }

    return { results, retired };
  }

  start(tickMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.stepAll();
    }, tickMs);
    console.log(`[scheduler] Stepping games every ${tickMs}ms`);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** Runs `fn` against one game under its lock. */
  withGame<T>(gameId: number, fn: (world: ArenaWorld) => T): T {
    const world = this.games.get(gameId);
    if (!world) throw new NotFoundError("game", gameId);
    return world.lock.run(() => fn(world));
  }
}

/** Process-wide lobby shared by the HTTP routes and the arena room. */
export const lobby = new Lobby({ retireEmptyGames: config.retireEmptyGames });
