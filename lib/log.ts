import { env, type LogLevel } from "@/lib/env";

const ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let level: LogLevel = env.LOG_LEVEL;

export function setLogLevel(next: LogLevel): void {
  level = next;
}

const enabled = (at: LogLevel) => ORDER[at] >= ORDER[level];

export function logDebug(msg: string) {
  if (enabled("debug")) console.debug(msg);
}
export function logInfo(msg: string) {
  if (enabled("info")) console.log(msg);
}
export function logWarn(msg: string) {
  if (enabled("warn")) console.warn(msg);
}
export function logError(msg: string, err?: unknown) {
  if (!enabled("error")) return;
  console.error(msg);
  if (err) console.error(err);
}
