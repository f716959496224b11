import "dotenv/config";
import type { Server } from "node:http";
import { createChannel } from "./app.js";
import { loadChannelConfig } from "./config/channel.js";
import { ConfigError, EmptyLibraryError, formatError } from "./errors.js";
import { closeStatusServer, createStatusApp, startStatusServer } from "./status/server.js";
import { findMissingTools } from "./tools.js";

const exitCodes = {
  ok: 0,
  emptyLibrary: 1,
  config: 2,
  missingTool: 127,
  failure: 1
} as const;

const loadConfig = () => {
  try {
    return loadChannelConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Channel: ${error.message}`);
      process.exit(exitCodes.config);
    }
    throw error;
  }
};

const main = async () => {
  const config = loadConfig();

  const missing = await findMissingTools(config);
  if (missing.length > 0) {
    for (const { tool, reason } of missing) {
      console.error(`Channel: required tool ${tool} is unavailable (${reason})`);
    }
    process.exit(exitCodes.missingTool);
  }

  const { supervisor, watcher } = createChannel(config);
  let statusServer: Server | null = null;
  if (config.statusPort > 0) {
    statusServer = await startStatusServer(createStatusApp({ supervisor, watcher }), config.statusPort);
  }

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`Channel: received ${signal}, stopping`);
    try {
      await watcher.stop(signal);
      if (statusServer) {
        await closeStatusServer(statusServer);
      }
    } catch (error) {
      console.error(`Channel: shutdown failed: ${formatError(error)}`);
    }
    process.exit(exitCodes.ok);
  };
  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });

  const output = config.output.kind === "hls" ? config.output.playlistPath : config.output.url;
  console.log(`Channel: starting ${config.topology} pipeline -> ${output}`);
  try {
    await watcher.start();
  } catch (error) {
    console.error(`Channel: ${formatError(error)}`);
    process.exit(error instanceof EmptyLibraryError ? exitCodes.emptyLibrary : exitCodes.failure);
  }
};

main().catch((error: unknown) => {
  console.error(`Channel: ${formatError(error)}`);
  process.exit(exitCodes.failure);
});
