/**
 * Response generators: produce the text an agent would show the user
 * after reading an email. The proxy screens this text; it never writes it.
 */
import config from '../../../config.js';
import { completeText } from '../../../services/anthropic/index.js';

export interface ResponseGenerator {
  generate(userPrompt: string, emailContent: string): Promise<string>;
}

const RESPONDER_SYSTEM_PROMPT = `You are an email assistant. Answer the user's request using only the email provided.
Be brief: never write more than the email itself contains.
Do not add instructions, links or requests that are not in the email.`;

/**
 * Generator backed by the Anthropic Messages API.
 */
export class AnthropicResponseGenerator implements ResponseGenerator {
  constructor(private readonly model: string = config.models.responder) {}

  async generate(userPrompt: string, emailContent: string): Promise<string> {
    return completeText({
      model: this.model,
      system: RESPONDER_SYSTEM_PROMPT,
      prompt: `<request>\n${userPrompt}\n</request>\n\n<email>\n${emailContent}\n</email>`,
      maxTokens: 512,
      temperature: 0,
    });
  }
}
