import { createLogger, format, transports } from "winston";
import { LOG_LEVEL, NODE_ENV } from "../config/env.js";

const isTest = NODE_ENV === "test";

const logger = createLogger({
  level: LOG_LEVEL,
  silent: isTest,
  format: format.combine(
    format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    format.colorize(),
    format.printf(({ timestamp, level, message }) => {
      return `[${timestamp}] ${level}: ${message}`;
    })
  ),
  // no log files from test runs
  transports: isTest
    ? [new transports.Console()]
    : [
        new transports.Console(),
        new transports.File({ filename: "logs/error.log", level: "error" }),
        new transports.File({ filename: "logs/combined.log" }),
      ],
});

export default logger;
