import { config } from "./config";

export type LogLevel = "info" | "warn" | "error";

export function log(tag: string, message: string, level: LogLevel = "info"): void {
  if (config.LOG_LEVEL === "silent") return;

  const line = `[${tag}] ${message}`;
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}
