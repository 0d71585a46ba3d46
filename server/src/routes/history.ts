import type { FastifyPluginAsync } from "fastify";

import type { AppController } from "../services/appController.js";
import { readSessionId } from "./sessionHeader.js";

type HistoryRoutesOptions = {
  controller: AppController;
};

export const historyRoutes: FastifyPluginAsync<HistoryRoutesOptions> = async (app, options) => {
  const { controller } = options;

  app.get("/api/history", async (request) => {
    const session = controller.getSession(readSessionId(request));
    return { turns: controller.history(session) };
  });

  app.delete("/api/history", async (request) => {
    const session = controller.getSession(readSessionId(request));
    controller.clearHistory(session);
    return { ok: true };
  });
};
