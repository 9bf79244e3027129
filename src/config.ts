import path from "node:path";
import pino from "pino";

const config = {
  logger: pino({
    name: process.env.APP_NAME ?? "plugin-host",
    level: process.env.LOG_LEVEL ?? "info",
  }),
  // Directory holding the helper executable and the plugin modules it loads.
  binDirectory: path.resolve(process.env.PLUGIN_HOST_BIN_DIR ?? "bin"),
  // Working directory of every helper invocation; must exist.
  workDirectory: path.resolve(process.env.PLUGIN_HOST_WORK_DIR ?? "_work"),
  helperName: process.env.PLUGIN_HOST_NAME ?? "plugin-host",
};

export default config;
