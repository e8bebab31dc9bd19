import pino from "pino";
import { config } from "./config.js";

// stdout carries command output, so logs go to stderr unless LOG_FILE is set.
export const logger = config.logFile
  ? pino({
      level: config.logLevel,
      transport: {
        target: "pino/file",
        options: {
          destination: config.logFile,
          mkdir: true
        }
      }
    })
  : pino({ level: config.logLevel }, pino.destination(2));
