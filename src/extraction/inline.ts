import { ExtractionError } from "../shared/errors.js";
import { htmlToText } from "../shared/html.js";
import { fail, ok, type Result } from "../shared/result.js";
import { stripBoilerplate } from "./boilerplate.js";
import type {
  ContentDescriptor,
  ExtractedContent,
  ExtractionStrategy,
} from "./types.js";

/**
 * Uses the story text embedded in the message body itself.
 */
export class InlineTextStrategy implements ExtractionStrategy {
  readonly name = "inline";

  constructor(private readonly minChars: number) {}

  async attempt(
    input: ContentDescriptor
  ): Promise<Result<ExtractedContent, ExtractionError>> {
    const body =
      input.text.trim().length > this.minChars || !input.html
        ? input.text
        : htmlToText(input.html);

    const content = stripBoilerplate(body);

    if (content.length <= this.minChars) {
      return fail(
        new ExtractionError(
          "below-minimum-length",
          `body has ${content.length} characters after cleaning, needs more than ${this.minChars}`
        )
      );
    }

    return ok({ content, confidence: 0.7 });
  }
}
