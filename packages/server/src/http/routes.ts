import express, { type Response } from "express";
import { NotFoundError } from "../rooms/sim/errors.js";
import type { Lobby } from "../services/lobby.js";
import {
  handleCreate,
  handleEntities,
  handleGame,
  handleGames,
  handleJoin,
  handleMove,
  handleShoot,
  type HttpReply,
} from "./handlers.js";

function respond(res: Response, handler: () => HttpReply) {
  try {
    const reply = handler();
    res.status(reply.status).json(reply.body);
  } catch (error) {
    if (error instanceof NotFoundError) {
      res.status(404).json({ error: error.message, kind: error.kind, id: error.id });
      return;
    }
    console.error("[http] Request failed:", error);
    res.status(500).json({ error: "Internal server error" });
  }
}

/** Lobby and player API: create/join games, shoot, move, and state queries. */
export function createLobbyRouter(lobby: Lobby): express.Router {
  const router = express.Router();

  router.post("/create", (req, res) => respond(res, () => handleCreate(lobby, req.body)));
  router.get("/join", (req, res) => respond(res, () => handleJoin(lobby, req.query)));
  router.get("/shoot", (req, res) => respond(res, () => handleShoot(lobby, req.query)));
  router.post("/move", (req, res) => respond(res, () => handleMove(lobby, req.query, req.body)));
  router.get("/game", (req, res) => respond(res, () => handleGame(lobby, req.query)));
  router.get("/games", (_req, res) => respond(res, () => handleGames(lobby)));
  router.get("/entities", (req, res) => respond(res, () => handleEntities(lobby, req.query)));

  return router;
}
