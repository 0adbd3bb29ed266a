import { z } from 'zod';

const TextPartSchema = z.object({
  type: z.enum(['input_text', 'output_text', 'text']),
  text: z.string(),
});

const ImagePartSchema = z.object({
  type: z.literal('input_image'),
  image_url: z.string().min(1),
});

export const ContentPartSchema = z.union([TextPartSchema, ImagePartSchema]);

const ItemContentSchema = z.union([z.string(), z.array(ContentPartSchema)]);

export const MessageItemSchema = z.object({
  type: z.enum(['message', 'user_message', 'system_message', 'assistant_message']),
  role: z.enum(['user', 'system', 'developer', 'assistant']).optional(),
  content: ItemContentSchema,
});

export const FunctionCallItemSchema = z.object({
  type: z.literal('function_call'),
  call_id: z.string().min(1),
  name: z.string().min(1),
  arguments: z.string().default('{}'),
});

export const FunctionCallOutputItemSchema = z
  .object({
    type: z.enum(['function_call_output', 'tool_call_result']),
    call_id: z.string().min(1).optional(),
    tool_call_id: z.string().min(1).optional(),
    output: z.string().optional(),
    content: z.string().optional(),
  })
  .refine((item) => item.call_id !== undefined || item.tool_call_id !== undefined, {
    message: 'call_id is required',
    path: ['call_id'],
  });

export const FunctionToolSchema = z.object({
  type: z.literal('function'),
  name: z.string().min(1),
  description: z.string().optional(),
  parameters: z.record(z.unknown()).optional(),
});

/** Input items are loose records here; known kinds are validated one by one during conversion. */
export const CreateResponseRequestSchema = z.object({
  model: z.string().min(1),
  input: z.union([z.string(), z.array(z.record(z.unknown()))]),
  instructions: z.string().optional(),
  tools: z.array(FunctionToolSchema).optional(),
  background: z.boolean().optional(),
  max_output_tokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  top_p: z.number().min(0).max(1).optional(),
  metadata: z.record(z.string()).optional(),
});

export type CreateResponseRequest = z.input<typeof CreateResponseRequestSchema>;
export type ParsedResponseRequest = z.output<typeof CreateResponseRequestSchema>;
export type MessageItem = z.output<typeof MessageItemSchema>;
export type FunctionCallItem = z.output<typeof FunctionCallItemSchema>;
export type FunctionCallOutputItem = z.output<typeof FunctionCallOutputItemSchema>;
export type FunctionTool = z.output<typeof FunctionToolSchema>;
