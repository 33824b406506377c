/**
 * Inbound request validation.
 * Chat completion bodies are parsed into the fixed ChatCompletionRequest
 * shape here, before classification ever sees them.
 */

import { z } from 'zod';
import { RequestValidationError } from '../shared/errors.js';
import type { ChatCompletionRequest } from '../shared/types.js';

const ToolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function'),
  function: z.object({
    name: z.string(),
    arguments: z.string(),
  }),
});

const ChatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.string().nullable().default(null),
  name: z.string().optional(),
  tool_calls: z.array(ToolCallSchema).optional(),
  tool_call_id: z.string().optional(),
});

export const ChatCompletionRequestSchema = z
  .object({
    model: z.string().optional(),
    messages: z.array(ChatMessageSchema).min(1, { message: 'messages must not be empty' }),
    category: z.enum(['fast', 'powerful', 'auto']).optional(),
    temperature: z.number().min(0).max(2).optional(),
    max_tokens: z.number().int().positive().optional(),
    top_p: z.number().min(0).max(1).optional(),
    stop: z.union([z.string(), z.array(z.string())]).optional(),
    presence_penalty: z.number().min(-2).max(2).optional(),
    frequency_penalty: z.number().min(-2).max(2).optional(),
    user: z.string().optional(),
    stream: z.boolean().optional(),
  })
  .refine((body) => body.stream !== true, {
    message: 'Streaming responses are not supported',
    path: ['stream'],
  })
  .transform(({ stream: _stream, ...request }) => request);

/**
 * Validate a parsed JSON body.
 * @throws RequestValidationError with a readable summary of every issue.
 */
export function parseChatCompletionRequest(body: unknown): ChatCompletionRequest {
  const result = ChatCompletionRequestSchema.safeParse(body);
  if (!result.success) {
    throw new RequestValidationError(z.prettifyError(result.error));
  }
  return result.data;
}
