import type OpenAI from "openai";
import type { Response as ModelResponse } from "openai/resources/responses/responses";

import type { PageImage } from "../types.js";
import { toDataUrl } from "./pageExtractor.js";
import type { GenerativeModel } from "./tutorClient.js";

type OpenAIVisionModelOptions = {
  client: OpenAI;
  model: string;
  maxOutputTokens: number;
};

export class OpenAIVisionModel implements GenerativeModel {
  public constructor(private readonly options: OpenAIVisionModelOptions) {}

  public async generate(prompt: string, images: readonly PageImage[]): Promise<string> {
    const response = await this.options.client.responses.create({
      model: this.options.model,
      max_output_tokens: this.options.maxOutputTokens,
      input: [
        {
          role: "user",
          content: [
            { type: "input_text", text: prompt },
            ...images.map((image) => ({
              type: "input_image" as const,
              image_url: toDataUrl(image),
              detail: "auto" as const
            }))
          ]
        }
      ]
    });

    return extractOutputText(response);
  }
}

function extractOutputText(response: ModelResponse): string {
  if (response.output_text.trim()) {
    return response.output_text;
  }

  const chunks: string[] = [];
  for (const item of response.output) {
    if (item.type !== "message") {
      continue;
    }

    for (const content of item.content) {
      if (content.type === "output_text") {
        chunks.push(content.text);
      }
    }
  }

  return chunks.join("\n");
}
