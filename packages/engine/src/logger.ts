import bunyan from "bunyan";

const LEVELS: readonly bunyan.LogLevelString[] = ["trace", "debug", "info", "warn", "error", "fatal"];

const log = bunyan.createLogger({
  name: "brinksmanship-engine",
  level: LEVELS.find((level) => level === process.env.LOG_LEVEL) ?? "info",
});

export default log;
