/**
 * A message in a conversation with an LLM provider.
 */
export interface ChatMessage {
  /** The role of the message sender */
  role: 'system' | 'user' | 'assistant';
  /** The text content of the message */
  content: string;
}

/**
 * Request payload for generating a model response.
 *
 * @example
 * ```typescript
 * const request: ModelRequest = {
 *   messages: [{ role: 'user', content: 'Fix the issues below' }],
 *   maxTokens: 4000,
 *   temperature: 0.2
 * };
 * ```
 */
export interface ModelRequest {
  /** Conversation history to send to the model */
  messages: ChatMessage[];
  /** Maximum tokens to generate in the response */
  maxTokens?: number;
  /** Sampling temperature (0-2, higher = more random) */
  temperature?: number;
  /** Overrides the provider's configured model for this request */
  modelHint?: string;
}

/**
 * Token usage statistics from a model response.
 */
export interface Usage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

/**
 * Response from a model generation request.
 */
export interface ModelResponse {
  /** Generated text content */
  text?: string;
  /** Token usage statistics */
  usage?: Usage;
  /** Raw provider-specific response data */
  raw?: unknown;
}

/**
 * Describes the capabilities of an LLM provider adapter.
 */
export interface ProviderCapabilities {
  supportsStreaming: boolean;
  /** Maximum context window size in tokens */
  maxContextTokens?: number;
  /** Expected response latency classification */
  latencyClass: 'fast' | 'medium' | 'slow';
}
