import cors from "@fastify/cors";
import multipart from "@fastify/multipart";
import Fastify, { type FastifyInstance } from "fastify";

import { AppError } from "./errors.js";
import { healthRoutes } from "./routes/health.js";
import { historyRoutes } from "./routes/history.js";
import { materialRoutes } from "./routes/material.js";
import { SESSION_HEADER } from "./routes/sessionHeader.js";
import { sessionRoutes } from "./routes/session.js";
import { tutorRoutes } from "./routes/tutor.js";
import type { AppController } from "./services/appController.js";

export type BuildAppOptions = {
  controller: AppController;
  corsOrigins: string[];
  maxUploadBytes: number;
  logger?: boolean;
};

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? true
  });

  await app.register(cors, {
    origin: options.corsOrigins,
    methods: ["GET", "POST", "DELETE"],
    exposedHeaders: [SESSION_HEADER]
  });

  await app.register(multipart, {
    limits: {
      fileSize: options.maxUploadBytes,
      files: 1,
      fields: 5
    },
    throwFileSizeLimit: true
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      return reply.code(error.statusCode).send({
        error: error.code,
        message: error.message
      });
    }

    if (typeof error.statusCode === "number" && error.statusCode < 500) {
      return reply.code(error.statusCode).send({
        error: error.code ?? "bad_request",
        message: error.message
      });
    }

    request.log.error({ err: error }, "Unhandled request error");
    return reply.code(500).send({
      error: "internal_server_error",
      message: error.message
    });
  });

  await app.register(healthRoutes);
  await app.register(sessionRoutes, { controller: options.controller });
  await app.register(materialRoutes, { controller: options.controller });
  await app.register(tutorRoutes, { controller: options.controller });
  await app.register(historyRoutes, { controller: options.controller });

  return app;
}
