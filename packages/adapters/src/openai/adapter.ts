import OpenAI, { APIConnectionTimeoutError, APIError } from 'openai';
import type {
  ChatMessage,
  ModelRequest,
  ModelResponse,
  ProviderCapabilities,
  ProviderConfig,
  Usage,
} from '@mender/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';
import { BaseProviderAdapter, type ErrorTypeConfig } from '../base-adapter';
import { executeProviderRequest } from '../common';

/**
 * Adapter for OpenAI and any OpenAI-compatible chat completions endpoint
 * (OpenRouter, vLLM, Ollama) selected through `base_url`.
 */
export class OpenAIAdapter extends BaseProviderAdapter implements ProviderAdapter {
  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error): error is APIError => error instanceof APIError,
    isTimeoutError: (error) => error instanceof APIConnectionTimeoutError,
  };

  private readonly client: OpenAI;
  private readonly model: string;
  private readonly maxTokens?: number;
  private readonly temperature?: number;

  constructor(config: ProviderConfig) {
    super();
    const apiKey = BaseProviderAdapter.resolveApiKey(config, 'OpenAI');
    this.model = config.model;
    this.maxTokens = config.maxTokens;
    this.temperature = config.temperature;
    this.client = new OpenAI({
      apiKey,
      baseURL: config.base_url,
      // Retries are handled by executeProviderRequest.
      maxRetries: 0,
    });
  }

  id(): string {
    return 'openai';
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsStreaming: false,
      latencyClass: 'medium',
    };
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    const model = req.modelHint ?? this.model;
    return executeProviderRequest(ctx, 'openai', model, async (signal) => {
      try {
        const completion = await this.client.chat.completions.create(
          {
            model,
            messages: req.messages.map(toOpenAIMessage),
            max_tokens: req.maxTokens ?? this.maxTokens,
            temperature: req.temperature ?? this.temperature ?? 0.2,
          },
          { signal },
        );

        const choice = completion.choices[0];
        const usage: Usage | undefined = completion.usage
          ? {
              inputTokens: completion.usage.prompt_tokens,
              outputTokens: completion.usage.completion_tokens,
              totalTokens: completion.usage.total_tokens,
            }
          : undefined;

        return {
          text: choice?.message.content ?? undefined,
          usage,
          raw: completion,
        };
      } catch (error) {
        throw this.mapError(error);
      }
    });
  }
}

function toOpenAIMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}
