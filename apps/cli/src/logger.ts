import bunyan from "bunyan";
import config from "./config";

const LEVELS: readonly bunyan.LogLevelString[] = ["trace", "debug", "info", "warn", "error", "fatal"];

const log = bunyan.createLogger({
  name: "brinksmanship-cli",
  level: LEVELS.find((level) => level === config.logLevel) ?? "info",
});

export default log;
