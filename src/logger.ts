import pino from "pino";

const defaultLevel = process.env.NODE_ENV === "test" ? "silent" : "info";

// stdout carries the MCP stdio transport, so logs always go to fd 2.
export const logger = pino(
  {
    name: "zfs-kmod",
    level: process.env.LOG_LEVEL ?? defaultLevel,
  },
  pino.destination(2),
);
