import "dotenv/config";
import type { Server as HttpServer } from "node:http";
import { loadConfig } from "./lib/config.js";
import { ExecutionStore } from "./lib/execution-store.js";
import { logError, logInfo, serializeError } from "./lib/logging.js";
import { createRuntimeFromConfig, createStore } from "./runtime.js";

const config = loadConfig();
const store: ExecutionStore = createStore(config);
const runtime = createRuntimeFromConfig(config, store);

let httpServer: HttpServer | null = null;
let storeClosed = false;
let shutdownPromise: Promise<void> | null = null;

async function main(): Promise<void> {
  await store.initialize();

  httpServer = await new Promise<HttpServer>((resolve, reject) => {
    const server = runtime.app.listen(config.port, () => resolve(server));
    server.once("error", reject);
  });

  logInfo("server.started", {
    port: config.port,
    store: config.store.kind,
    executorUrl: config.executorUrl,
    intelligentRetryEnabled: config.intelligentRetryEnabled,
    origins: config.corsAllowedOrigins
  });
}

function closeHttpServer(server: HttpServer): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
  });
}

async function closeStoreOnce(): Promise<void> {
  if (storeClosed) {
    return;
  }

  await store.close();
  storeClosed = true;
}

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shutdownPromise) {
    await shutdownPromise;
    return;
  }

  shutdownPromise = (async () => {
    const startedAt = Date.now();

    logInfo("server.shutdown_started", {
      signal,
      graceMs: config.shutdownGraceMs,
      activeExecutions: runtime.registry.size
    });

    const forceExitTimer = setTimeout(() => {
      logError("server.shutdown_timeout", {
        signal,
        graceMs: config.shutdownGraceMs
      });
      process.exit(1);
    }, config.shutdownGraceMs);

    forceExitTimer.unref();

    try {
      if (httpServer) {
        httpServer.closeIdleConnections();
        await closeHttpServer(httpServer);
      }

      await closeStoreOnce();

      logInfo("server.shutdown_complete", {
        signal,
        durationMs: Date.now() - startedAt
      });
      process.exit(0);
    } catch (error) {
      logError("server.shutdown_failed", {
        signal,
        durationMs: Date.now() - startedAt,
        ...serializeError(error)
      });
      process.exit(1);
    } finally {
      clearTimeout(forceExitTimer);
    }
  })();

  await shutdownPromise;
}

process.once("SIGTERM", () => {
  void shutdown("SIGTERM");
});

process.once("SIGINT", () => {
  void shutdown("SIGINT");
});

main().catch(async (error) => {
  logError("server.start_failed", {
    ...serializeError(error)
  });

  try {
    await closeStoreOnce();
  } catch (closeError) {
    logError("server.start_failed_cleanup", {
      ...serializeError(closeError)
    });
  }

  process.exit(1);
});
