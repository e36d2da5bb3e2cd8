import { z } from "zod";

/**
 * Wire shapes for the native message API and the chat-completions API.
 * Inbound shapes are zod schemas so untrusted bodies are validated before
 * conversion; outbound shapes are plain types.
 */

// --- Native (message API) request ---

const textBlockSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
});

export const imageSourceSchema = z.object({
  type: z.string(),
  media_type: z.string().optional(),
  data: z.string().optional(),
  url: z.string().optional(),
});

export const nativeContentBlockSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
  source: imageSourceSchema.optional(),
  id: z.string().optional(),
  name: z.string().optional(),
  input: z.unknown().optional(),
  tool_use_id: z.string().optional(),
  content: z.union([z.string(), z.array(textBlockSchema)]).optional(),
});

export const nativeMessageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.union([z.string(), z.array(nativeContentBlockSchema)]),
});

export const nativeToolSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  input_schema: z.record(z.unknown()).optional(),
});

export const nativeRequestSchema = z.object({
  model: z.string().default(""),
  system: z.union([z.string(), z.array(textBlockSchema)]).optional(),
  messages: z.array(nativeMessageSchema).default([]),
  max_tokens: z.number().optional(),
  temperature: z.number().optional(),
  top_p: z.number().optional(),
  stream: z.boolean().optional(),
  stop_sequences: z.array(z.string()).optional(),
  tools: z.array(nativeToolSchema).optional(),
  tool_choice: z
    .object({ type: z.string(), name: z.string().optional() })
    .optional(),
});

export type NativeContentBlock = z.infer<typeof nativeContentBlockSchema>;
export type NativeMessage = z.infer<typeof nativeMessageSchema>;

// --- Native (message API) response ---

export type NativeResponseBlock =
  | { type: "text"; text: string }
  | {
      type: "tool_use";
      id: string;
      name: string;
      input: Record<string, unknown>;
    };

export type StopReason = "end_turn" | "max_tokens" | "tool_use" | "stop_sequence";

export interface NativeUsage {
  input_tokens: number;
  output_tokens: number;
  cache_read_input_tokens: number;
}

export interface NativeResponse {
  id: string;
  type: "message";
  role: "assistant";
  content: NativeResponseBlock[];
  model: string;
  stop_reason: StopReason;
  stop_sequence: null;
  usage: NativeUsage;
}

/**
 * Event types that mark a stream chunk as already native.
 */
export const NATIVE_EVENT_TYPES: ReadonlySet<string> = new Set([
  "message_start",
  "content_block_start",
  "content_block_delta",
  "content_block_stop",
  "message_delta",
  "message_stop",
  "ping",
  "error",
]);

// --- Foreign (chat-completions) request ---

export type ForeignContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export interface ForeignToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

export type ForeignMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string | ForeignContentPart[] }
  | { role: "assistant"; content: string | null; tool_calls?: ForeignToolCall[] }
  | { role: "tool"; tool_call_id: string; content: string };

export interface ForeignTool {
  type: "function";
  function: {
    name: string;
    description?: string;
    parameters?: Record<string, unknown>;
  };
}

export type ForeignToolChoice =
  | "auto"
  | "none"
  | "required"
  | { type: "function"; function: { name: string } };

export interface ForeignRequest {
  model: string;
  messages: ForeignMessage[];
  max_tokens?: number;
  temperature?: number;
  top_p?: number;
  stream?: boolean;
  stream_options?: { include_usage: boolean };
  stop?: string[];
  tools?: ForeignTool[];
  tool_choice?: ForeignToolChoice;
}

// --- Foreign (chat-completions) response ---

export const foreignUsageSchema = z.object({
  prompt_tokens: z.number().default(0),
  completion_tokens: z.number().default(0),
  prompt_tokens_details: z
    .object({ cached_tokens: z.number().optional() })
    .nullable()
    .optional(),
});

const foreignToolCallSchema = z.object({
  id: z.string().optional(),
  type: z.string().optional(),
  function: z.object({
    name: z.string().default(""),
    arguments: z.union([z.string(), z.record(z.unknown())]).optional(),
  }),
});

export const foreignResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullable().optional(),
            tool_calls: z.array(foreignToolCallSchema).nullable().optional(),
          })
          .optional(),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .default([]),
  usage: foreignUsageSchema.nullable().optional(),
});

export const foreignStreamChunkSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        delta: z
          .object({
            content: z.string().nullable().optional(),
            tool_calls: z
              .array(
                z.object({
                  index: z.number().optional(),
                  id: z.string().optional(),
                  function: z
                    .object({
                      name: z.string().optional(),
                      arguments: z.string().optional(),
                    })
                    .optional(),
                }),
              )
              .nullable()
              .optional(),
          })
          .optional(),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .default([]),
  usage: foreignUsageSchema.nullable().optional(),
});

export type ForeignUsage = z.infer<typeof foreignUsageSchema>;
export type ForeignResponse = z.infer<typeof foreignResponseSchema>;
export type ForeignStreamChunk = z.infer<typeof foreignStreamChunkSchema>;
