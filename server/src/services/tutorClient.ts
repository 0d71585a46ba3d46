import { GenerationError, ValidationError, errorMessage } from "../errors.js";
import type { PageImage } from "../types.js";

export interface GenerativeModel {
  generate(prompt: string, images: readonly PageImage[]): Promise<string>;
}

const TUTOR_PREAMBLE = [
  "You are an expert university tutor.",
  "The user has provided one or more images (which could be pages from a PDF) and a question.",
  "Analyze all images to answer the question.",
  "If it's handwritten, do your best to read it.",
  "Explain concepts simply and clearly."
].join("\n");

export function buildTutorPrompt(question: string): string {
  return [TUTOR_PREAMBLE, "", `User Question: ${question}`].join("\n");
}

export class TutorClient {
  public constructor(private readonly model: GenerativeModel) {}

  /**
   * Sends the question and every page, in the order given, as one request.
   * The answer comes back verbatim; any failure surfaces as GenerationError.
   */
  public async ask(question: string, pages: readonly PageImage[]): Promise<string> {
    if (pages.length === 0) {
      throw new ValidationError("Please upload an image or PDF first!");
    }

    if (question.trim().length === 0) {
      throw new ValidationError("Please ask a question!");
    }

    let answer: string;
    try {
      answer = await this.model.generate(buildTutorPrompt(question), pages);
    } catch (error) {
      throw new GenerationError(`An error occurred: ${errorMessage(error)}`, { cause: error });
    }

    if (answer.trim().length === 0) {
      throw new GenerationError("An error occurred: the model returned an empty answer");
    }

    return answer;
  }
}
