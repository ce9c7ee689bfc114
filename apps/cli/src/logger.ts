import bunyan from "bunyan";

const LEVELS: readonly bunyan.LogLevelString[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export function isLogLevel(value: string): value is bunyan.LogLevelString {
  return LEVELS.some((level) => level === value);
}

// stderr, so that boards printed on stdout can be piped cleanly
const log = bunyan.createLogger({
  name: "pegcross",
  level: "info",
  stream: process.stderr,
});

/** Apply the configured level; unknown names fall back to "info". */
export function setLogLevel(level: string): void {
  if (isLogLevel(level)) {
    log.level(level);
  } else {
    log.warn({ level }, "Unknown log level, using info");
    log.level("info");
  }
}

export default log;
