import { getConfig } from "./config/env";
import { createApp } from "./app";
import { createQueryOrchestrator } from "./orchestrator";
import { logInfo } from "./utils/logger";

const config = getConfig();
const { server } = createApp(createQueryOrchestrator());

server.listen(config.PORT, "0.0.0.0", () => {
  logInfo(`[Server] Serving on port ${config.PORT} (${config.NODE_ENV})`);
});
