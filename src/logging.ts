// Log output goes to stderr; stdout carries only what a command prints.

import { Logger } from "effect";

export const StderrLogger = Logger.replace(
  Logger.defaultLogger,
  Logger.withConsoleError(Logger.logfmtLogger),
);
