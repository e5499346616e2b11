export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isEnabledFlag(value: string | undefined) {
  return value === "1" || value === "true";
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function levelFromEnv(): LogLevel {
  const raw = process.env.CYCLE_SYNC_LOG_LEVEL?.toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }
  return isEnabledFlag(process.env.CYCLE_SYNC_DEBUG) ? "debug" : "info";
}

let minLevel: LogLevel = levelFromEnv();
let logTarget: "stdout" | "stderr" = isEnabledFlag(
  process.env.CYCLE_SYNC_LOG_STDERR
)
  ? "stderr"
  : "stdout";

export function setLogTarget(target: "stdout" | "stderr") {
  logTarget = target;
}

export function setLogLevel(level: LogLevel) {
  minLevel = level;
}

function enabled(level: LogLevel) {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

// info and debug follow the target; warnings and errors always go to stderr
// so `--json` output stays clean.
function logLine(message: string) {
  if (logTarget === "stderr") {
    console.error(message);
    return;
  }
  console.log(message);
}

export function info(message: string) {
  if (enabled("info")) {
    logLine(message);
  }
}

export function warn(message: string) {
  if (enabled("warn")) {
    console.error(`warning: ${message}`);
  }
}

export function error(message: string) {
  if (enabled("error")) {
    console.error(`error: ${message}`);
  }
}

export function debug(message: string) {
  if (enabled("debug")) {
    logLine(`[debug] ${message}`);
  }
}
