import Fastify, { type FastifyError } from "fastify";
import { BadRequestError, isAppError, toAppError } from "./errors.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import { metadataSchema, type MetadataRequestBody } from "./schemas.js";
import { defaultMetadataDeps, generateMetadata, type MetadataDeps } from "./services/metadata.js";

export const DEFAULT_MAX_UPLOAD_BYTES = 25 * 1024 * 1024;

export interface AppOptions {
  logger?: Logger;
  metadataDeps?: MetadataDeps;
  /** Largest accepted request body in bytes (the base64 document inflates it by a third). */
  bodyLimit?: number;
}

export function buildApp(options: AppOptions = {}) {
  const log = options.logger ?? defaultLogger;
  const deps = options.metadataDeps ?? defaultMetadataDeps(log);

  const app = Fastify({
    loggerInstance: log,
    bodyLimit: options.bodyLimit ?? DEFAULT_MAX_UPLOAD_BYTES,
  });

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (isAppError(error)) {
      return reply.status(error.statusCode).send(error.toJSON());
    }
    if (error.validation) {
      return reply.status(400).send(new BadRequestError(error.message).toJSON());
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send(new BadRequestError(error.message).toJSON());
    }

    request.log.error({ err: error }, "request failed");
    return reply.status(500).send(toAppError(error).toJSON());
  });

  app.get("/healthz", async () => ({ ok: true }));

  app.post<{ Body: MetadataRequestBody }>("/metadata", { schema: metadataSchema }, async (req) => {
    const { filename, content, declaredType, maxKeywords, maxSummarySentences } = req.body;

    return generateMetadata(
      { filename, bytes: Buffer.from(content, "base64"), declaredType },
      { maxKeywords, maxSummarySentences },
      deps,
    );
  });

  return app;
}
