import { fileURLToPath } from "node:url";

import next from "next";

import { ConfigError, type ServerConfig, loadConfig } from "./config";
import { createRoutingService } from "./routingService";
import { createRelayServer } from "./server";

function readConfig(): ServerConfig {
  try {
    return loadConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[Config] ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

const WEB_DIR = fileURLToPath(new URL("../../web", import.meta.url));

async function main() {
  const config = readConfig();
  const routing = createRoutingService(config.routing);

  const app = next({ dev: config.dev, dir: WEB_DIR, hostname: config.host, port: config.port });
  await app.prepare();
  const server = createRelayServer(config, { routing, requestHandler: app.getRequestHandler() });

  const address = await server.listen();
  console.info(`[Relay] listening on http://${address.address}:${address.port}`);
  console.info(`[Routing] providers: ${routing.providerNames().join(", ")}`);

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.info(`[Relay] ${signal} received, shutting down`);
    Promise.all([server.close(), app.close()]).then(
      () => process.exit(0),
      (error: unknown) => {
        console.error("[Relay] shutdown failed:", error);
        process.exit(1);
      }
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  console.error("[Relay] failed to start:", error);
  process.exit(1);
});
