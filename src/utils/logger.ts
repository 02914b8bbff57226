import pino from "pino";

// stdout carries the tables; every log line goes to stderr.
const STDERR = 2;

const pretty = process.env.NODE_ENV !== "production";

export const logger = pretty
  ? pino({
      level: process.env.LOG_LEVEL ?? "info",
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: STDERR
        }
      }
    })
  : pino({ level: process.env.LOG_LEVEL ?? "info" }, pino.destination(STDERR));
