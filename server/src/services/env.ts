import { z } from "zod";

import { ConfigError } from "../errors.js";

const blankToUndefined = (value: unknown): unknown => {
  if (typeof value !== "string") {
    return value;
  }

  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
};

const schema = z.object({
  OPENAI_API_KEY: z.preprocess(
    blankToUndefined,
    z.string({ required_error: "OPENAI_API_KEY is required" }).min(1, "OPENAI_API_KEY is required")
  ),
  OPENAI_BASE_URL: z.preprocess(
    blankToUndefined,
    z.string().url("OPENAI_BASE_URL must be a valid URL").optional()
  ),
  OPENAI_VISION_MODEL: z.string().default("gpt-4.1-mini"),
  MAX_OUTPUT_TOKENS: z.coerce.number().int().min(16).default(1200),
  PDF_RENDER_DPI: z.coerce.number().int().min(36).max(600).default(150),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(20),
  HOST: z.string().default("127.0.0.1"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  CORS_ORIGINS: z
    .string()
    .default("http://127.0.0.1:5173,http://localhost:5173")
    .transform((value) =>
      value
        .split(",")
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0)
    )
});

export type AppConfig = {
  openaiApiKey: string;
  openaiBaseUrl?: string;
  visionModel: string;
  maxOutputTokens: number;
  pdfRenderDpi: number;
  maxUploadBytes: number;
  host: string;
  port: number;
  corsOrigins: string[];
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${parsed.error.message}`);
  }

  return {
    openaiApiKey: parsed.data.OPENAI_API_KEY,
    openaiBaseUrl: parsed.data.OPENAI_BASE_URL,
    visionModel: parsed.data.OPENAI_VISION_MODEL,
    maxOutputTokens: parsed.data.MAX_OUTPUT_TOKENS,
    pdfRenderDpi: parsed.data.PDF_RENDER_DPI,
    maxUploadBytes: Math.round(parsed.data.MAX_UPLOAD_MB * 1024 * 1024),
    host: parsed.data.HOST,
    port: parsed.data.PORT,
    corsOrigins: parsed.data.CORS_ORIGINS
  };
}
