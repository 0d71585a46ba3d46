import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";

import { ValidationError } from "../errors.js";
import type { AppController } from "../services/appController.js";
import { readSessionId } from "./sessionHeader.js";

type SessionRoutesOptions = {
  controller: AppController;
};

const signInSchema = z.object({
  username: z.string().default(""),
  password: z.string().default("")
});

export const sessionRoutes: FastifyPluginAsync<SessionRoutesOptions> = async (app, options) => {
  const { controller } = options;

  app.post("/api/session", async (request, reply) => {
    const parsed = signInSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      throw new ValidationError("Please enter both username and password.");
    }

    const session = controller.signIn(parsed.data.username, parsed.data.password);
    request.log.info({ sessionId: session.id }, "Session signed in");

    reply.header("x-session-id", session.id);
    return reply.code(201).send({
      sessionId: session.id,
      username: session.gate.username
    });
  });

  app.get("/api/session", async (request) => {
    const session = controller.getSession(readSessionId(request));

    return {
      sessionId: session.id,
      username: session.gate.username,
      pageCount: session.pages.length,
      turns: controller.history(session).length
    };
  });

  app.delete("/api/session", async (request) => {
    const session = controller.getSession(readSessionId(request));
    controller.signOut(session);
    request.log.info({ sessionId: session.id }, "Session signed out");

    return { ok: true };
  });
};
