import pino from "pino";

export interface Logger {
  info(obj: Record<string, unknown>, msg?: string): void;
  info(msg: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  warn(msg: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  error(msg: string): void;
  debug(obj: Record<string, unknown>, msg?: string): void;
  debug(msg: string): void;
}

export function createLogger(name?: string, level?: string): Logger {
  return pino({ name: name ?? "turnstile", level: level ?? process.env["LOG_LEVEL"] ?? "info" });
}
