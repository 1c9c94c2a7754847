#!/usr/bin/env node
import os from "os";

import chalk from "chalk";
import stringWidth from "string-width";

import {
  APP_NAME,
  APP_VERSION,
  CONNECTION_TIMEOUT,
  DEFAULT_BACKEND,
  GATEWAY_ENABLED,
  GENERATION_DEFAULTS,
  GENERATION_TIMEOUT_MS,
  MAX_TOP_LOGPROBS,
  REMOTE_BACKENDS,
  SERVER_HOST,
  SERVER_PORT,
  validateConfig,
} from "./config.js";
import { OPENAI_ENDPOINTS, SERVICE_ENDPOINTS } from "./constants/endpoints.js";
import { logger } from "./logging/index.js";
import { createApp } from "./server/app.js";
import { createServices } from "./services/index.js";

import type { Server } from "http";

validateConfig();

const services = createServices();

const app = createApp({
  router: services.router,
  generation: services.generation,
  requestSettings: {
    defaults: GENERATION_DEFAULTS,
    maxTopLogprobs: MAX_TOP_LOGPROBS,
  },
  generationTimeoutMs: GENERATION_TIMEOUT_MS,
  connectionTimeout: CONNECTION_TIMEOUT,
});

function getNetworkIP(): string {
  const interfaces = os.networkInterfaces();
  for (const name of Object.keys(interfaces)) {
    const networkInterface = interfaces[name];
    if (networkInterface) {
      for (const net of networkInterface) {
        if (net.family === "IPv4" && !net.internal) {
          return net.address;
        }
      }
    }
  }
  return "localhost";
}

const BOX_WIDTH = 55;

const BOX_CHAR = {
  topLeft: "┌",
  topRight: "┐",
  bottomLeft: "└",
  bottomRight: "┘",
  horizontal: "─",
  vertical: "│",
  leftT: "├",
  rightT: "┤",
};

function createAlignedLine(text: string): string {
  const textWidth = stringWidth(text);
  const padding = Math.max(0, BOX_WIDTH - 2 - textWidth);
  const leftPadding = Math.floor(padding / 2);
  const rightPadding = padding - leftPadding;

  return (
    chalk.bold.blue(BOX_CHAR.vertical) +
    " ".repeat(leftPadding) +
    text +
    " ".repeat(rightPadding) +
    chalk.bold.blue(BOX_CHAR.vertical)
  );
}

function border(left: string, right: string): string {
  return chalk.bold.blue(left + BOX_CHAR.horizontal.repeat(BOX_WIDTH - 2) + right);
}

function printBanner(port: number, host: string): void {
  const backends = services.router.localBackends;

  logger.info("");
  logger.info(border(BOX_CHAR.topLeft, BOX_CHAR.topRight));
  logger.info(createAlignedLine(chalk.bold.green(APP_NAME) + chalk.dim(` v${APP_VERSION} - local chat completions`)));
  logger.info(createAlignedLine(chalk.dim(`Running on port: ${port}`)));
  logger.info(createAlignedLine(chalk.dim(`Binding address: ${host}`)));
  logger.info(border(BOX_CHAR.leftT, BOX_CHAR.rightT));
  logger.info(createAlignedLine(chalk.magenta("Backends:")));
  for (const backend of backends) {
    const marker = backend.id === DEFAULT_BACKEND ? chalk.yellow("* ") : "  ";
    logger.info(createAlignedLine(marker + chalk.cyan(`${backend.id}: `) + chalk.green(backend.model)));
  }
  if (GATEWAY_ENABLED) {
    logger.info(createAlignedLine(chalk.cyan("gateway: ") + chalk.green(`${REMOTE_BACKENDS.length} remote(s)`)));
  }
  logger.info(border(BOX_CHAR.leftT, BOX_CHAR.rightT));
  logger.info(createAlignedLine(chalk.magenta("Available Endpoints:")));
  logger.info(createAlignedLine(chalk.cyan(`POST ${OPENAI_ENDPOINTS.CHAT_COMPLETIONS}`)));
  logger.info(createAlignedLine(chalk.cyan(`GET  ${OPENAI_ENDPOINTS.MODELS}`)));
  logger.info(createAlignedLine(chalk.cyan(`GET  ${SERVICE_ENDPOINTS.HEALTH}  ${SERVICE_ENDPOINTS.PROPS}`)));
  logger.info(border(BOX_CHAR.leftT, BOX_CHAR.rightT));
  logger.info(createAlignedLine(chalk.cyan(`Local:   http://localhost:${port}/`)));
  logger.info(createAlignedLine(chalk.cyan(`Network: http://${getNetworkIP()}:${port}/`)));
  logger.info(border(BOX_CHAR.bottomLeft, BOX_CHAR.bottomRight) + "\n");
}

const server: Server = app.listen(SERVER_PORT, SERVER_HOST, () => {
  const address = server.address();
  const port = address !== null && typeof address === "object" ? address.port : SERVER_PORT;
  printBanner(port, SERVER_HOST);
});

server.on("error", (error: NodeJS.ErrnoException) => {
  if (error.syscall !== "listen") {
    throw error;
  }

  switch (error.code) {
    case "EACCES":
      logger.error(`\n[ERROR] Port ${SERVER_PORT} requires elevated privileges.`);
      process.exit(1);
      break;
    case "EADDRINUSE":
      logger.error(`\n[ERROR] Port ${SERVER_PORT} is already in use.`);
      process.exit(1);
      break;
    default:
      throw error;
  }
});
