import { GenerationError } from "./errors";
import { OllamaClient, type OllamaMessage } from "./ollamaClient";

export type ConversationTurn = {
  question: string;
  answer: string;
};

export type GenerationContext = {
  system?: string;
  history?: ReadonlyArray<ConversationTurn>;
  data?: unknown;
};

export type GenerateOptions = {
  signal?: AbortSignal;
};

/**
 * Text generation collaborator. Output is untrusted data: callers validate it
 * before acting on it.
 */
export interface LanguageModel {
  generate(prompt: string, context: GenerationContext, options?: GenerateOptions): Promise<string>;
}

export type OllamaLanguageModelOptions = {
  client: OllamaClient;
  model: string;
  temperature?: number;
};

export function buildMessages(prompt: string, context: GenerationContext): OllamaMessage[] {
  const messages: OllamaMessage[] = [];
  if (context.system) {
    messages.push({ role: "system", content: context.system });
  }

  for (const turn of context.history ?? []) {
    messages.push({ role: "user", content: turn.question });
    messages.push({ role: "assistant", content: turn.answer });
  }

  const data = context.data === undefined ? "" : `\n\nContext (JSON):\n${JSON.stringify(context.data, null, 2)}`;
  messages.push({ role: "user", content: `${prompt}${data}` });
  return messages;
}

export class OllamaLanguageModel implements LanguageModel {
  constructor(private readonly options: OllamaLanguageModelOptions) {}

  async generate(prompt: string, context: GenerationContext, options: GenerateOptions = {}): Promise<string> {
    try {
      const response = await this.options.client.chat(
        {
          model: this.options.model,
          messages: buildMessages(prompt, context),
          options: { temperature: this.options.temperature ?? 0.2 },
        },
        { signal: options.signal },
      );

      const text = response.message.content.trim();
      if (text.length === 0) {
        throw new GenerationError(`Model ${this.options.model} returned an empty response`);
      }
      return text;
    } catch (error) {
      if (error instanceof GenerationError) {
        throw error;
      }
      throw new GenerationError(`Language model ${this.options.model} failed`, error);
    }
  }
}
