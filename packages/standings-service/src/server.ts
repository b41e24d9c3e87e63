// src/server.ts
import express, { Express } from "express";
import type { Server } from "node:http";
import { createApiRouter, type ApiDependencies } from "./api-routes.js";

export const createApp = (deps: ApiDependencies): Express => {
  const app: Express = express();

  app.use(express.json());
  app.use("/api", createApiRouter(deps));

  app.get("/health", (req, res) => {
    res.status(200).send("OK");
  });

  return app;
};

export const startServer = (app: Express, port: number, onShutdown: () => void = () => {}): Server => {
  const server = app.listen(port, () => {
    console.log(`Server is running on http://localhost:${port}`);
    console.log(`API endpoints:`);
    console.log(`  GET  /api/standings - Current standings table`);
    console.log(`  GET  /api/ranking?threshold=60 - Pool ranking`);
    console.log(`  GET  /api/resolve?q=Inter - Resolve one team label`);
    console.log(`  GET  /api/participants - Configured participants and aliases`);
    console.log(`  Add ?refreshCache=true to any endpoint to refetch the standings first.`);
  });

  const shutdown = () => {
    console.log("\nShutting down gracefully...");
    onShutdown();
    server.close(() => process.exit(0));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  return server;
};
