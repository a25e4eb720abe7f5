import { pino } from "pino";

type LogFn = {
  (obj: object, msg?: string): void;
  (msg: string): void;
};

// Any pino logger (or Fastify's request/app logger) satisfies this.
export type SimLogger = {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
};

export const silentLogger: SimLogger = pino({ level: "silent" });
