import type { Server } from "node:http";
import cors from "cors";
import express from "express";
import type { SupervisorSnapshot } from "../pipeline/supervisor.js";
import type { WatcherSnapshot } from "../watcher/streamWatcher.js";

export type StatusSources = {
  supervisor: { snapshot(): SupervisorSnapshot };
  watcher: { snapshot(): WatcherSnapshot };
  now?: () => number;
};

export const createStatusApp = ({ supervisor, watcher, now = Date.now }: StatusSources) => {
  const app = express();

  app.use(cors({ origin: true, methods: ["GET", "OPTIONS"], maxAge: 86_400 }));

  app.get("/health", (_req, res) => {
    const { state } = supervisor.snapshot();
    if (state === "running") {
      res.json({ status: "ok" });
      return;
    }
    res.status(503).json({ status: "unavailable", state });
  });

  app.get("/status", (_req, res) => {
    res.json({
      time: now(),
      pipeline: supervisor.snapshot(),
      watcher: watcher.snapshot()
    });
  });

  return app;
};

export const startStatusServer = (app: express.Express, port: number, host = "0.0.0.0") =>
  new Promise<Server>((resolve, reject) => {
    const server = app.listen(port, host, () => {
      server.off("error", reject);
      console.log(`Status API listening on ${host}:${port}`);
      resolve(server);
    });
    server.once("error", reject);
  });

export const closeStatusServer = (server: Server) =>
  new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
