import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";

import { GenerationError, ValidationError } from "../errors.js";
import type { AppController } from "../services/appController.js";
import { readSessionId } from "./sessionHeader.js";

type TutorRoutesOptions = {
  controller: AppController;
};

const askSchema = z.object({
  question: z.string()
});

export const tutorRoutes: FastifyPluginAsync<TutorRoutesOptions> = async (app, options) => {
  const { controller } = options;

  app.post("/api/ask", async (request) => {
    const session = controller.getSession(readSessionId(request));

    const parsed = askSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      throw new ValidationError("Please ask a question!");
    }

    const startedAt = Date.now();
    try {
      const turns = await controller.ask(session, parsed.data.question);
      request.log.info(
        { sessionId: session.id, pageCount: session.pages.length, elapsedMs: Date.now() - startedAt },
        "Tutor answered"
      );

      return { turns };
    } catch (error) {
      if (error instanceof GenerationError) {
        request.log.error({ err: error, sessionId: session.id }, "Tutor request failed");
      }

      throw error;
    }
  });
};
