import pino from "pino";

// stdout carries the status report (CLI) or the MCP protocol (server), so logs always go to stderr.
export const logger = pino(
  {
    name: "host-hardening",
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "warn"),
  },
  pino.destination(2),
);
