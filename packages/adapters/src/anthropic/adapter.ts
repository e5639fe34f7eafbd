import Anthropic from '@anthropic-ai/sdk';
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

const DEFAULT_MAX_TOKENS = 8192;

export class AnthropicAdapter extends BaseProviderAdapter implements ProviderAdapter {
  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error): error is InstanceType<typeof Anthropic.APIError> =>
      error instanceof Anthropic.APIError,
    isTimeoutError: (error) => error instanceof Anthropic.APIConnectionTimeoutError,
  };

  private readonly client: Anthropic;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature?: number;

  constructor(config: ProviderConfig) {
    super();
    const apiKey = BaseProviderAdapter.resolveApiKey(config, 'Anthropic');
    this.model = config.model;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = config.temperature;
    this.client = new Anthropic({ apiKey, maxRetries: 0 });
  }

  id(): string {
    return 'anthropic';
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsStreaming: false,
      maxContextTokens: 200_000,
      latencyClass: 'medium',
    };
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    const model = req.modelHint ?? this.model;
    return executeProviderRequest(ctx, 'anthropic', model, async (signal) => {
      try {
        const { system, messages } = splitSystem(req.messages);

        const response = await this.client.messages.create(
          {
            model,
            max_tokens: req.maxTokens ?? this.maxTokens,
            system,
            messages,
            temperature: req.temperature ?? this.temperature,
          },
          { signal },
        );

        const text = response.content.flatMap((b) => (b.type === 'text' ? [b.text] : [])).join('');

        const usage: Usage = {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
          totalTokens: response.usage.input_tokens + response.usage.output_tokens,
        };

        return { text, usage, raw: response };
      } catch (error) {
        throw this.mapError(error);
      }
    });
  }
}

/**
 * The Messages API takes system prompts separately; several are joined by newlines.
 */
function splitSystem(messages: ChatMessage[]): {
  system?: string;
  messages: Anthropic.MessageParam[];
} {
  let system: string | undefined;
  const mapped: Anthropic.MessageParam[] = [];

  for (const m of messages) {
    if (m.role === 'system') {
      system = system ? system + '\n' + m.content : m.content;
    } else {
      mapped.push({ role: m.role, content: m.content });
    }
  }

  return { system, messages: mapped };
}
