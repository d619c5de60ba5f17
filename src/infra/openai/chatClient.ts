import OpenAI from 'openai';
import type { BotConfig } from '../../config/index.js';

export type ChatRequest = {
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
};

/** Returns the first choice's text, or an empty string when the model sent none. */
export type ChatCompleter = (req: ChatRequest) => Promise<string>;

export function openAiCompleter(client: OpenAI, model: string, timeoutMs: number): ChatCompleter {
  return async req => {
    const completion = await client.chat.completions.create(
      {
        model,
        messages: [
          { role: 'system', content: req.system },
          { role: 'user', content: req.user },
        ],
        temperature: req.temperature,
        max_tokens: req.maxTokens,
      },
      { timeout: timeoutMs }
    );
    return completion.choices[0]?.message?.content ?? '';
  };
}

/** Only built when captions come from the model and the run is not a dry run. */
export function createChatCompleter(config: BotConfig): ChatCompleter | null {
  if (config.captionMode !== 'ai' || config.dryRun || !config.openaiApiKey) return null;
  const client = new OpenAI({
    apiKey: config.openaiApiKey,
    baseURL: config.openaiBaseUrl,
    timeout: config.openaiTimeoutMs,
    maxRetries: 1,
  });
  return openAiCompleter(client, config.openaiChatModel, config.openaiTimeoutMs);
}
