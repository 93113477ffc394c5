import { Schema, type } from "@colyseus/schema";

/**
 * Room-level summary synchronized to every client of one game.
 * Entity detail travels in per-client `arena:state` messages instead.
 */
export class ArenaRoomState extends Schema {
  @type("number") gameId: number = 0;
  @type("string") gameName: string = "";
  @type("number") tick: number = 0;
  @type("number") safeZoneRadius: number = 0;
  @type("uint16") playerCount: number = 0;
  @type("number") tickMs: number = 33;
}
