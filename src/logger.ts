import pino from "pino";

// stdout belongs to command results (CLI) and the MCP stdio protocol; logs go to stderr.
export const logger = pino(
  {
    name: "bmctl",
    level: process.env.LOG_LEVEL ?? "warn",
  },
  pino.destination(2),
);
