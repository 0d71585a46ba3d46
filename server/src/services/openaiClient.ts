import path from "node:path";
import { fileURLToPath } from "node:url";

import dotenv from "dotenv";
import OpenAI from "openai";

import { loadConfig } from "./env.js";
import { OpenAIVisionModel } from "./visionModel.js";

const serviceDir = path.dirname(fileURLToPath(import.meta.url));

// Repo-root .env first, then whatever sits in the working directory.
dotenv.config({ path: path.resolve(serviceDir, "../../../.env") });
dotenv.config();

export const config = loadConfig();

/** The tutor's model, built once from the validated environment. */
export const visionModel = new OpenAIVisionModel({
  client: new OpenAI({
    apiKey: config.openaiApiKey,
    baseURL: config.openaiBaseUrl
  }),
  model: config.visionModel,
  maxOutputTokens: config.maxOutputTokens
});
