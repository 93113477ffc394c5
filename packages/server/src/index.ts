import { listen } from "@colyseus/tools";
import app from "./app.config.js";
import { config } from "./config.js";

void listen(app, config.port);
