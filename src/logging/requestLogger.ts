import chalk from "chalk";

import { isRecord } from "../utils/typeGuards.js";

import { logger } from "./index.js";

import type { Request } from "express";

function formatMethod(method: string): string {
  const upperMethod = method.toUpperCase();

  switch (upperMethod) {
    case "GET":
      return chalk.green(upperMethod);
    case "POST":
      return chalk.yellow(upperMethod);
    case "DELETE":
      return chalk.red(upperMethod);
    default:
      return chalk.white(upperMethod);
  }
}

function getStatusColor(status: number): typeof chalk.red {
  if (status >= 500) {return chalk.red;}
  if (status >= 400) {return chalk.yellow;}
  return chalk.green;
}

const STATUS_TEXT: Record<number, string> = {
  200: "OK",
  400: "Bad Request",
  404: "Not Found",
  500: "Internal Server Error",
  502: "Bad Gateway",
  503: "Service Unavailable",
};

function describeChatBody(body: unknown): string | null {
  if (!isRecord(body)) {
    return null;
  }
  const fields = body;
  const parts: string[] = [];
  if (typeof fields["model"] === "string") {
    parts.push(`model=${fields["model"]}`);
  }
  if (fields["stream"] === true) {
    parts.push("stream");
  }
  if (Array.isArray(fields["tools"]) && fields["tools"].length > 0) {
    parts.push(`tools=${fields["tools"].length}`);
  }
  return parts.length > 0 ? parts.join(" ") : null;
}

export function logRequest(req: Request, routeName: string): void {
  const timestamp = new Date().toISOString();
  const method = formatMethod(req.method);
  const endpoint = chalk.cyan(req.originalUrl);

  logger.info(`${chalk.blue("➤")} ${chalk.dim(timestamp)} ${method} ${endpoint} ${chalk.yellow(routeName)}`);

  const summary = describeChatBody(req.body);
  if (summary !== null) {
    logger.info(`  ${chalk.dim(summary)}`);
  }
}

export function logResponse(status: number, routeName: string, duration?: number): void {
  const statusColor = getStatusColor(status);
  const statusText = statusColor(`${status} ${STATUS_TEXT[status] ?? ""}`.trim());

  let output = `${chalk.blue("⮑")} ${statusText} ${chalk.yellow(routeName)}`;

  if (duration !== undefined) {
    output += ` ${chalk.dim("in")} ${chalk.magenta(`${duration}ms`)}`;
  }

  logger.info(output);
}
