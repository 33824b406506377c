/**
 * OpenAI-compatible request/response type definitions.
 * These types define the contract between the router, its HTTP clients
 * and the upstream backends.
 */

/** Coarse task category used to restrict eligible backends. */
export type Category = 'fast' | 'powerful';

/** A single message in a chat conversation. */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string | null;
  name?: string;
  tool_calls?: ToolCall[];
  tool_call_id?: string;
}

/** A tool call within an assistant message. */
export interface ToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

/**
 * Normalized chat completion request.
 * `model` is informational only: the router picks the upstream model.
 * `category` pins the task category and skips classification.
 */
export interface ChatCompletionRequest {
  model?: string;
  messages: ChatMessage[];
  category?: Category | 'auto';
  temperature?: number;
  max_tokens?: number;
  top_p?: number;
  stop?: string | string[];
  presence_penalty?: number;
  frequency_penalty?: number;
  user?: string;
}

/** A single choice in a chat completion response. */
export interface ChatCompletionChoice {
  index: number;
  message: {
    role: 'assistant';
    content: string | null;
    tool_calls?: ToolCall[];
  };
  /** Usually stop, length, tool_calls or content_filter; some upstreams add their own. */
  finish_reason: string | null;
}

/** Token usage statistics. */
export interface Usage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

/** OpenAI-compatible chat completion response. */
export interface ChatCompletionResponse {
  id: string;
  object: 'chat.completion';
  created: number;
  model: string;
  choices: ChatCompletionChoice[];
  usage?: Usage;
  system_fingerprint?: string;
}

/** OpenAI-compatible error response. */
export interface OpenAIErrorResponse {
  error: {
    message: string;
    type: string;
    param: string | null;
    code: string | null;
  };
}

/** OpenAI-compatible models list response. */
export interface ModelsResponse {
  object: 'list';
  data: ModelInfo[];
}

/** A single model entry in the models list. */
export interface ModelInfo {
  id: string;
  object: 'model';
  created: number;
  owned_by: string;
  category: Category;
}
