import pino from "pino";

// stdout carries the MCP stdio transport; logs go to stderr.
export const logger = pino(
  {
    name: "hadoop-ha",
    level: process.env.LOG_LEVEL ?? "info",
  },
  pino.destination(2),
);
