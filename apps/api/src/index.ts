import { buildApp } from "./server.js";
import { getConfig } from "./lib/config.js";
import { logger } from "./lib/logger.js";

async function start(): Promise<void> {
  const { port, host } = getConfig();
  const app = await buildApp();

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, "Shutting down");
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, "Shutdown failed");
          process.exit(1);
        },
      );
    });
  }

  try {
    await app.listen({ port, host });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

start().catch((err: unknown) => {
  logger.fatal({ err }, "Failed to start");
  process.exit(1);
});
