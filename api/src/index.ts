import { fileURLToPath } from "node:url";
import path from "node:path";
import { describeEnvErrors } from "./config.js";
import { isLogLevel, logger } from "./logger.js";
import { buildApp, DEFAULT_MAX_UPLOAD_BYTES } from "./server.js";

const PORT = Number(process.env.PORT || "8080");

function isPositiveInteger(raw: string): boolean {
  return /^\d+$/.test(raw) && Number.parseInt(raw, 10) > 0;
}

/**
 * Validate server and pipeline configuration.
 * Returns an array of error messages, or empty array if valid.
 */
export function validateConfig(env: NodeJS.ProcessEnv = process.env): string[] {
  const errors: string[] = [];

  const port = (env.PORT || "").trim();
  if (port && (!isPositiveInteger(port) || Number(port) > 65535)) {
    errors.push("PORT must be an integer between 1 and 65535");
  }

  const level = (env.LOG_LEVEL || "").trim().toLowerCase();
  if (level && !isLogLevel(level)) {
    errors.push("LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent");
  }

  const maxUpload = (env.MAX_UPLOAD_BYTES || "").trim();
  if (maxUpload && !isPositiveInteger(maxUpload)) {
    errors.push("MAX_UPLOAD_BYTES must be a positive integer");
  }

  errors.push(...describeEnvErrors(env));
  return errors;
}

function init() {
  const configErrors = validateConfig();
  if (configErrors.length > 0) {
    logger.error("Configuration validation failed:");
    configErrors.forEach((error) => logger.error(`  - ${error}`));
    process.exit(1);
  }

  const maxUpload = (process.env.MAX_UPLOAD_BYTES || "").trim();
  const app = buildApp({
    logger,
    bodyLimit: maxUpload ? Number.parseInt(maxUpload, 10) : DEFAULT_MAX_UPLOAD_BYTES,
  });

  app.log.info("Configuration validation passed");
  return app;
}

// Only run when this file is executed directly
const entrypointPath = process.argv[1] ? path.resolve(process.argv[1]) : "";

if (entrypointPath && fileURLToPath(import.meta.url) === entrypointPath) {
  init()
    .listen({ port: PORT, host: "0.0.0.0" })
    .catch((err: unknown) => {
      console.error("Server startup failed:", err);
      process.exit(1);
    });
}
