import pino, { type Logger } from "pino";
import { env } from "./config.js";

// stdout carries the operator transcript, so structured logs go to stderr.
export const logger: Logger = pino(
  {
    name: "voice-bridge",
    level: env.LOG_LEVEL
  },
  pino.destination(2)
);
