import { Room, type Client } from "@colyseus/core";
import { z } from "zod";
import { config } from "../config.js";
import { lobby } from "../services/lobby.js";
import type { ArenaErrorMessage, EliminatedMessage, FireMessage, MoveMessage } from "./protocol.js";
import { ArenaRoomState } from "./schema/ArenaState.js";
import { NotFoundError } from "./sim/errors.js";

const idSchema = z.union([z.number().int().nonnegative(), z.string().regex(/^\d+$/).transform(Number)]);

const createOptionsSchema = z.object({ gameId: idSchema });

const joinOptionsSchema = z.object({ gameId: idSchema, playerId: idSchema });

const moveMessageSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
}) satisfies z.ZodType<MoveMessage>;

const fireMessageSchema = z.object({
  gunId: z.number().int().nonnegative(),
  aimX: z.number().finite().optional(),
  aimY: z.number().finite().optional(),
}) satisfies z.ZodType<FireMessage>;

/**
 * WebSocket view of one lobby game.
 *
 * The lobby scheduler owns the simulation; this room only forwards
 * move/fire messages and pushes each client its own snapshot on the tick
 * cadence. Rooms are filtered by `gameId`, so one room serves one game.
 */
export class ArenaRoom extends Room<ArenaRoomState> {
  private gameId = -1;
  private readonly playerBySession = new Map<string, number>();

  onCreate(options: unknown) {
    const parsed = createOptionsSchema.safeParse(options);
    if (!parsed.success || !lobby.has(parsed.data.gameId)) {
      throw new Error("Unknown game");
    }
    this.gameId = parsed.data.gameId;

    this.setState(new ArenaRoomState());
    this.state.gameId = this.gameId;
    this.state.tickMs = config.tickMs;

    this.onMessage("move", (client, message: unknown) => {
      this.handleMove(client, message);
    });
    this.onMessage("fire", (client, message: unknown) => {
      this.handleFire(client, message);
    });

    this.clock.setInterval(() => {
      this.pushSnapshots();
    }, config.tickMs);

    console.log(`[ArenaRoom] Room ${this.roomId} bound to game ${this.gameId}`);
  }

  onJoin(client: Client, options: unknown) {
    const parsed = joinOptionsSchema.safeParse(options);
    if (!parsed.success || parsed.data.gameId !== this.gameId) {
      throw new Error("Invalid join options");
    }
    if (!lobby.hasPlayer(this.gameId, parsed.data.playerId)) {
      throw new Error(`Unknown player ${parsed.data.playerId} in game ${this.gameId}`);
    }
    this.playerBySession.set(client.sessionId, parsed.data.playerId);
    console.log(`[ArenaRoom] Client ${client.sessionId} attached to player ${parsed.data.playerId}`);
  }

  onLeave(client: Client) {
    this.playerBySession.delete(client.sessionId);
  }

  onDispose() {
    console.log(`[ArenaRoom] Room ${this.roomId} for game ${this.gameId} disposed`);
  }

  private handleMove(client: Client, message: unknown) {
    const playerId = this.playerBySession.get(client.sessionId);
    if (playerId === undefined) return;
    const parsed = moveMessageSchema.safeParse(message);
    if (!parsed.success) return;
    this.guard(client, () => lobby.move(this.gameId, playerId, parsed.data));
  }

  private handleFire(client: Client, message: unknown) {
    const playerId = this.playerBySession.get(client.sessionId);
    if (playerId === undefined) return;
    const parsed = fireMessageSchema.safeParse(message);
    if (!parsed.success) return;
    const { gunId, aimX, aimY } = parsed.data;
    const aim = aimX !== undefined && aimY !== undefined ? { x: aimX, y: aimY } : undefined;
    this.guard(client, () => lobby.fire(this.gameId, playerId, gunId, aim));
  }

  private guard(client: Client, action: () => void) {
    try {
      action();
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error;
      client.send("arena:error", { message: error.message } satisfies ArenaErrorMessage);
    }
  }

  private pushSnapshots() {
    if (!lobby.has(this.gameId)) {
      console.log(`[ArenaRoom] Game ${this.gameId} retired, closing room ${this.roomId}`);
      void this.disconnect();
      return;
    }

    const summary = lobby.summary(this.gameId);
    this.state.gameName = summary.name;
    this.state.tick = summary.tick;
    this.state.safeZoneRadius = summary.safeZoneRadius;
    this.state.playerCount = summary.playerCount;

    for (const client of this.clients) {
      const playerId = this.playerBySession.get(client.sessionId);
      if (playerId === undefined) continue;
      if (!lobby.hasPlayer(this.gameId, playerId)) {
        client.send("arena:eliminated", { playerId } satisfies EliminatedMessage);
        this.playerBySession.delete(client.sessionId);
        client.leave();
        continue;
      }
      client.send("arena:state", lobby.snapshot(this.gameId, playerId));
    }
  }
}
