import { createServer } from "http";
import { createApp } from "./app";
import { loadConfig, loadEnvFiles } from "./config";
import { logger } from "./logger";

loadEnvFiles();
const env = loadConfig();
process.env.LOG_LEVEL = env.LOG_LEVEL;

const server = createServer(createApp());
server.listen(env.PORT, () => {
  logger.info("server", `Listening on port ${env.PORT}`);
});
