/**
 * Logging Module
 *
 * All server output goes through this module; debug lines are gated on `server.debug`.
 */

import { DEBUG_MODE } from "../config.js";

import { createLogger, type Logger } from "./configLogger.js";

export const logger: Logger = createLogger(DEBUG_MODE);

export { createLogger as createConfigLogger, type Logger } from "./configLogger.js";
export { logRequest, logResponse } from "./requestLogger.js";
