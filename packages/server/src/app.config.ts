import config from "@colyseus/tools";
import { monitor } from "@colyseus/monitor";
import express from "express";
import { config as envConfig } from "./config.js";
import { createLobbyRouter } from "./http/routes.js";
import { ArenaRoom } from "./rooms/ArenaRoom.js";
import { PROTOCOL_VERSION } from "./rooms/protocol.js";
import { lobby } from "./services/lobby.js";

export default config({
  initializeGameServer: (gameServer) => {
    // One room per lobby game; clients pass { gameId, playerId } when joining
    gameServer.define("arena", ArenaRoom).filterBy(["gameId"]);
  },

  initializeExpress: (app) => {
    app.use(express.json({ limit: "16kb" }));

    // Colyseus monitor (dev-only): view rooms and inspect live room state.
    if (envConfig.nodeEnv !== "production") {
      app.use("/monitor", monitor());
    }

    app.get("/healthz", (_req, res) => {
      res.json({ status: "ok", protocol: PROTOCOL_VERSION, games: lobby.gameCount, timestamp: Date.now() });
    });

    app.use(createLobbyRouter(lobby));
  },

  beforeListen: () => {
    console.log(`Arena server starting on port ${envConfig.port}`);
    lobby.start(envConfig.tickMs);
  },
});
