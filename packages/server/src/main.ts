import { loadServerConfig } from "./config.js";
import { createConsoleLogger } from "./logger.js";
import { startServer } from "./server.js";

void Promise.resolve()
  .then(() => startServer(loadServerConfig()))
  .catch((error: unknown) => {
    createConsoleLogger("server").error("Failed to start server", { error });
    process.exit(1);
  });
