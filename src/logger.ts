import winston from "winston";

// stdout carries the MCP protocol, so every level goes to stderr.
const ALL_LEVELS = Object.keys(winston.config.npm.levels);

export const logger = winston.createLogger({
  level: "info",
  silent: process.env.NODE_ENV === "test",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: "form-builder" },
  transports: [new winston.transports.Console({ stderrLevels: ALL_LEVELS })],
});
