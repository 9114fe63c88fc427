import "dotenv/config";
import { createServer } from "node:http";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { bootstrap } from "./bootstrap.js";
import { loadConfig } from "./config/env.js";
import { describeError } from "./domain/errors.js";
import { createMcpSessionRouter } from "./http/mcpSessions.js";
import { MCP_PATH, createHttpHandler } from "./http/restApi.js";
import { createMcpServer } from "./tools/index.js";

async function main() {
  const config = loadConfig();
  const app = await bootstrap(config);
  const shutdownTasks: Array<() => Promise<void>> = [app.close];

  try {
    const startup = await app.service.ensureIndexReady();
    if (startup) {
      console.error(
        `Indexed ${startup.indexed.length} document(s), ${startup.chunkCount} chunk(s); ${startup.failed.length} failed.`,
      );
    }
  } catch (error) {
    // Queries retry the rebuild when they find the collection missing.
    console.error(`Startup index check failed: ${describeError(error)}`);
  }

  if (config.transport === "http") {
    const mcp = createMcpSessionRouter(() => createMcpServer(app.service));
    const handler = createHttpHandler(app.service, { mcp: mcp.handle });
    const httpServer = createServer((req, res) => {
      handler(req, res).catch((error: unknown) => {
        console.error(`Request handling failed: ${describeError(error)}`);
      });
    });

    await new Promise<void>((resolve, reject) => {
      httpServer.once("error", reject);
      httpServer.listen(config.port, config.host, () => resolve());
    });

    shutdownTasks.unshift(mcp.closeAll, () => closeHttpServer(httpServer));
    console.error(`HTTP API listening on http://${config.host}:${config.port} (MCP at ${MCP_PATH})`);
  } else {
    const server = createMcpServer(app.service);
    await server.connect(new StdioServerTransport());
    shutdownTasks.unshift(() => server.close());
  }

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    for (const task of shutdownTasks) {
      try {
        await task();
      } catch (error) {
        console.error(`Shutdown step failed: ${describeError(error)}`);
      }
    }
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

function closeHttpServer(server: ReturnType<typeof createServer>): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

main().catch((error) => {
  console.error("Failed to start document answer service:", error);
  process.exit(1);
});
