/**
 * Default logger: pino, named after the package.
 * Every component takes a Logger, so hosts can pass their own instead.
 */

import { pino } from "pino";
import type { Logger } from "../types.js";

export function createLogger(level = "info"): Logger {
  return pino({ name: "catalog-core", level });
}
