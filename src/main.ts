import { PORT } from "./config";
import { createApp } from "./server";
import { logger } from "./utils/logger";

const app = createApp();
app.listen(PORT, () => {
  logger.info("server_listening", { port: PORT });
});
