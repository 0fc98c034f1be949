import pino, { type LoggerOptions } from "pino";

const options: LoggerOptions = {
  name: "devstrap",
  level: process.env.LOG_LEVEL ?? "info",
};

// stdout belongs to the package managers and database tools we spawn.
export const logger =
  process.env.NODE_ENV === "development"
    ? pino({ ...options, transport: { target: "pino/file", options: { destination: 2 } } })
    : pino(options, pino.destination(2));
