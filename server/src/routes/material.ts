import type { FastifyPluginAsync, FastifyRequest } from "fastify";

import { UnsupportedFormatError, ValidationError } from "../errors.js";
import type { AppController } from "../services/appController.js";
import { isSupportedMimeType } from "../services/pageExtractor.js";
import type { UploadedDocument } from "../types.js";
import { readSessionId } from "./sessionHeader.js";

type MaterialRoutesOptions = {
  controller: AppController;
};

export const materialRoutes: FastifyPluginAsync<MaterialRoutesOptions> = async (app, options) => {
  const { controller } = options;

  app.post("/api/material", async (request) => {
    const session = controller.getSession(readSessionId(request));

    let document: UploadedDocument;
    try {
      document = await readUploadedDocument(request);
    } catch (error) {
      controller.discardMaterial(session);
      throw error;
    }

    const summary = controller.upload(session, document);
    request.log.info(
      { sessionId: session.id, mimeType: document.mimeType, pageCount: summary.pageCount },
      "Material extracted"
    );

    return summary;
  });
};

async function readUploadedDocument(request: FastifyRequest): Promise<UploadedDocument> {
  let document: UploadedDocument | null = null;

  for await (const part of request.parts()) {
    if (part.type !== "file") {
      continue;
    }

    if (part.fieldname !== "file") {
      part.file.resume();
      continue;
    }

    if (!isSupportedMimeType(part.mimetype)) {
      part.file.resume();
      throw new UnsupportedFormatError(part.mimetype);
    }

    document = {
      mimeType: part.mimetype,
      bytes: await part.toBuffer(),
      fileName: part.filename || undefined
    };
  }

  if (!document) {
    throw new ValidationError("multipart field `file` is required");
  }

  return document;
}
