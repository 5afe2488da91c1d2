import OpenAI from "openai";
import { RateLimitError } from "../errors";

export interface GenerationOptions {
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
}

/**
 * Hosted text generation. Output is non-deterministic and never feeds scoring.
 */
export interface TextGenerator {
  complete(prompt: string, options?: GenerationOptions): Promise<string>;
}

/**
 * TextGenerator over the OpenAI chat-completions API. The client's own
 * bounded retry handles transient failures; rate limiting surfaces as
 * RateLimitError once retries are spent.
 */
export class OpenAITextGenerator implements TextGenerator {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(params: { apiKey: string; model: string; maxRetries: number }) {
    this.client = new OpenAI({ apiKey: params.apiKey, maxRetries: params.maxRetries });
    this.model = params.model;
  }

  async complete(prompt: string, options?: GenerationOptions): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        max_tokens: options?.maxTokens ?? 500,
        temperature: options?.temperature ?? 0.7,
        messages: [
          ...(options?.systemPrompt ? [{ role: "system" as const, content: options.systemPrompt }] : []),
          { role: "user" as const, content: prompt },
        ],
      });

      return response.choices[0]?.message?.content ?? "";
    } catch (error) {
      if (error instanceof OpenAI.RateLimitError) {
        throw new RateLimitError(error.message);
      }
      throw error;
    }
  }
}
