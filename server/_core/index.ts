import "dotenv/config";
import express from "express";
import { createServer, type Server } from "http";
import net from "net";
import { createExpressMiddleware } from "@trpc/server/adapters/express";
import { appRouter } from "../routers";
import { ProxyController } from "../controller";
import { BindError } from "../proxy/errors";
import { FileSettingsStore, type SettingsPatch } from "../settings";
import { createContextFactory } from "./context";
import { ENV } from "./env";
import { logger, scopedLog } from "./logger";

function isPortAvailable(port: number): Promise<boolean> {
  return new Promise(resolve => {
    const server = net.createServer();
    server.listen(port, () => {
      server.close(() => resolve(true));
    });
    server.on("error", () => resolve(false));
  });
}

async function findAvailablePort(startPort: number = 3000): Promise<number> {
  for (let port = startPort; port < startPort + 20; port++) {
    if (await isPortAvailable(port)) {
      return port;
    }
  }
  throw new Error(`No available port found starting from ${startPort}`);
}

function envOverrides(): SettingsPatch {
  const { listenPort, destinationUrl, bytesPerSecond } = ENV.proxy;
  const overrides: SettingsPatch = {};
  if (listenPort !== undefined) overrides.listenPort = listenPort;
  if (destinationUrl !== undefined) overrides.destinationUrl = destinationUrl;
  if (bytesPerSecond !== undefined) overrides.bytesPerSecond = bytesPerSecond;
  return overrides;
}

async function startServer() {
  const controller = new ProxyController({
    store: new FileSettingsStore(ENV.settingsFile, scopedLog("Settings")),
    log: scopedLog("Proxy"),
    overrides: envOverrides(),
    server: { host: ENV.proxy.listenHost },
  });
  const settings = await controller.init();

  if (settings.destination) {
    try {
      const status = await controller.start();
      logger.info(`Proxy listening on port ${status.port} (${status.summary})`, "Server");
    } catch (err) {
      // The control API still comes up so the port can be changed
      if (!(err instanceof BindError)) throw err;
      logger.error(err.message, "Server");
    }
  } else {
    logger.warn("No destination configured; set one through the control API, then start the proxy", "Server");
  }

  const app = express();
  const server = createServer(app);

  // Request logging middleware
  app.use((req, res, next) => {
    const start = Date.now();
    const { method, url } = req;

    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.info(`${method} ${url} ${res.statusCode} - ${duration}ms`, 'HTTP');
    });

    next();
  });

  app.use(express.json());

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, proxy: controller.status().state });
  });

  // tRPC API
  app.use(
    "/api/trpc",
    createExpressMiddleware({
      router: appRouter,
      createContext: createContextFactory(controller),
    })
  );

  const preferredPort = ENV.controlPort;
  const port = await findAvailablePort(preferredPort);

  if (port !== preferredPort) {
    logger.warn(`Port ${preferredPort} is busy, using port ${port} instead`, 'Server');
  }

  server.listen(port, () => {
    logger.info(`Control API running on http://localhost:${port}/api/trpc`, 'Server');
  });

  registerShutdown(server, controller);
}

function registerShutdown(server: Server, controller: ProxyController) {
  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down`, 'Server');

    server.close();
    controller
      .stop()
      .then(() => process.exit(0))
      .catch((err) => {
        logger.error('Failed to stop proxy cleanly', 'Server', err);
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

startServer().catch((err) => {
  logger.error('Failed to start server', 'Server', err);
  process.exit(1);
});
