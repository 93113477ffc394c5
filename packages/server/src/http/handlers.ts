import { z } from "zod";
import type { Lobby } from "../services/lobby.js";

/**
 * Transport-independent request handlers for the lobby API.
 *
 * Identifiers that locate a game or player are validated (400 on failure);
 * a malformed move target or gun id is a silent no-op. Unknown identifiers
 * surface as NotFoundError.
 */

export type HttpReply = { status: number; body: unknown };

export type Query = Record<string, unknown>;

const nameSchema = z.string().trim().min(1).max(32);
// Query values arrive as strings; blank ones must not read as 0
const idSchema = z.union([z.number().int().nonnegative(), z.string().regex(/^\d+$/).transform(Number)]);
const coordSchema = z.union([
  z.number().finite(),
  z.string().regex(/^-?\d+(\.\d+)?$/).transform(Number),
]);

const createSchema = z.object({
  game_name: nameSchema,
  player_name: nameSchema,
});

const joinSchema = z.object({
  game_id: idSchema,
  player_name: nameSchema,
});

const gameQuerySchema = z.object({
  game_id: idSchema,
  player_id: idSchema.optional(),
});

const playerQuerySchema = z.object({
  game_id: idSchema,
  player_id: idSchema,
});

const shootQuerySchema = z.object({
  gun_id: idSchema,
  aim_x: coordSchema.optional(),
  aim_y: coordSchema.optional(),
});

const positionSchema = z.tuple([z.number().finite(), z.number().finite()]);

const OK: HttpReply = { status: 200, body: { ok: true } };

function badRequest(error: z.ZodError): HttpReply {
  return { status: 400, body: { error: "Invalid request", issues: error.issues.map((i) => i.message) } };
}

export function handleCreate(lobby: Lobby, body: unknown): HttpReply {
  const parsed = createSchema.safeParse(body);
  if (!parsed.success) return badRequest(parsed.error);
  const { gameId, playerId } = lobby.create(parsed.data.game_name, parsed.data.player_name);
  return { status: 201, body: { game_id: gameId, player_id: playerId } };
}

export function handleJoin(lobby: Lobby, query: Query): HttpReply {
  const parsed = joinSchema.safeParse(query);
  if (!parsed.success) return badRequest(parsed.error);
  const playerId = lobby.join(parsed.data.game_id, parsed.data.player_name);
  return { status: 201, body: { player_id: playerId } };
}

export function handleShoot(lobby: Lobby, query: Query): HttpReply {
  const target = playerQuerySchema.safeParse(query);
  if (!target.success) return badRequest(target.error);
  const shot = shootQuerySchema.safeParse(query);
  if (!shot.success) return OK;

  const { aim_x, aim_y, gun_id } = shot.data;
  const aim = aim_x !== undefined && aim_y !== undefined ? { x: aim_x, y: aim_y } : undefined;
  lobby.fire(target.data.game_id, target.data.player_id, gun_id, aim);
  return OK;
}

export function handleMove(lobby: Lobby, query: Query, body: unknown): HttpReply {
  const target = playerQuerySchema.safeParse(query);
  if (!target.success) return badRequest(target.error);
  const pos = positionSchema.safeParse(body);
  if (!pos.success) return OK;

  const [x, y] = pos.data;
  lobby.move(target.data.game_id, target.data.player_id, { x, y });
  return OK;
}

export function handleGame(lobby: Lobby, query: Query): HttpReply {
  const parsed = gameQuerySchema.safeParse(query);
  if (!parsed.success) return badRequest(parsed.error);
  const { game_id, player_id } = parsed.data;
  if (player_id === undefined) return { status: 200, body: lobby.describe(game_id) };
  return { status: 200, body: lobby.snapshot(game_id, player_id) };
}

export function handleGames(lobby: Lobby): HttpReply {
  return { status: 200, body: lobby.list() };
}

export function handleEntities(lobby: Lobby, query: Query): HttpReply {
  const parsed = gameQuerySchema.safeParse(query);
  if (!parsed.success) return badRequest(parsed.error);
  return { status: 200, body: lobby.entities(parsed.data.game_id) };
}
