/**
 * Format conversion between the native message API and the chat-completions API.
 * Requests go native → foreign, responses and stream chunks go foreign → native.
 */
import { randomUUID } from "crypto";
import { ConversionError, errorMessage } from "../errors";
import {
  ForeignContentPart,
  ForeignMessage,
  ForeignRequest,
  ForeignResponse,
  ForeignStreamChunk,
  ForeignTool,
  ForeignToolCall,
  ForeignToolChoice,
  ForeignUsage,
  NATIVE_EVENT_TYPES,
  NativeContentBlock,
  NativeMessage,
  NativeResponse,
  NativeResponseBlock,
  NativeUsage,
  StopReason,
  foreignResponseSchema,
  foreignStreamChunkSchema,
  nativeRequestSchema,
} from "../types/protocol";

// Native model ids that have a known foreign counterpart
const MODEL_MAP: Record<string, string> = {
  "claude-3-5-sonnet-20241022": "gpt-4o",
  "claude-sonnet-4-5": "gpt-4o",
  "claude-sonnet-4-5-thinking": "gpt-4o",
  "claude-3-opus-20240229": "gpt-4-turbo",
  "claude-3-sonnet-20240229": "gpt-4",
  "claude-3-haiku-20240307": "gpt-3.5-turbo",
};

const DEFAULT_FOREIGN_MODEL = "gpt-4o";

const FINISH_REASON_MAP: Record<string, StopReason> = {
  stop: "end_turn",
  length: "max_tokens",
  tool_calls: "tool_use",
  content_filter: "stop_sequence",
};

/**
 * Remap native model ids. Ids that are not native (for example a backend's
 * model override) pass through.
 */
export function mapModel(model: string): string {
  const mapped = MODEL_MAP[model];
  if (mapped) return mapped;
  if (model.startsWith("claude-")) return DEFAULT_FOREIGN_MODEL;
  return model;
}

export function mapFinishReason(reason: string | null | undefined): StopReason {
  if (!reason) return "end_turn";
  return FINISH_REASON_MAP[reason] ?? "end_turn";
}

export function generateMessageId(): string {
  return `msg_${randomUUID().replace(/-/g, "").slice(0, 24)}`;
}

function generateToolUseId(): string {
  return `toolu_${randomUUID().replace(/-/g, "").slice(0, 24)}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function joinText(blocks: Array<{ type: string; text?: string }>): string {
  return blocks
    .filter((block) => block.type === "text" && block.text !== undefined)
    .map((block) => block.text ?? "")
    .join("\n");
}

function toolResultContent(block: NativeContentBlock): string {
  const content = block.content;
  if (content === undefined) return "";
  if (typeof content === "string") return content;
  return joinText(content);
}

function imagePart(block: NativeContentBlock): ForeignContentPart | null {
  const source = block.source;
  if (!source) return null;

  if (source.type === "base64" && source.data !== undefined) {
    const mediaType = source.media_type ?? "image/png";
    return { type: "image_url", image_url: { url: `data:${mediaType};base64,${source.data}` } };
  }
  if (source.type === "url" && source.url !== undefined) {
    return { type: "image_url", image_url: { url: source.url } };
  }
  return null;
}

function convertUserMessage(content: NativeContentBlock[]): ForeignMessage[] {
  const messages: ForeignMessage[] = [];
  const parts: ForeignContentPart[] = [];

  for (const block of content) {
    if (block.type === "tool_result") {
      // Tool results answer the previous assistant turn, so they go first
      messages.push({
        role: "tool",
        tool_call_id: block.tool_use_id ?? "",
        content: toolResultContent(block),
      });
    } else if (block.type === "text" && block.text !== undefined) {
      parts.push({ type: "text", text: block.text });
    } else if (block.type === "image") {
      const part = imagePart(block);
      if (part) parts.push(part);
    }
  }

  const first = parts[0];
  if (parts.length === 1 && first.type === "text") {
    messages.push({ role: "user", content: first.text });
  } else if (parts.length > 0) {
    messages.push({ role: "user", content: parts });
  } else if (messages.length === 0) {
    messages.push({ role: "user", content: "" });
  }

  return messages;
}

function convertAssistantMessage(content: NativeContentBlock[]): ForeignMessage {
  const text = joinText(content);
  const toolCalls: ForeignToolCall[] = content
    .filter((block) => block.type === "tool_use")
    .map((block): ForeignToolCall => ({
      id: block.id ?? generateToolUseId(),
      type: "function",
      function: {
        name: block.name ?? "",
        arguments: JSON.stringify(block.input ?? {}),
      },
    }));

  if (toolCalls.length > 0) {
    return { role: "assistant", content: text === "" ? null : text, tool_calls: toolCalls };
  }
  return { role: "assistant", content: text };
}

function convertMessage(msg: NativeMessage): ForeignMessage[] {
  if (typeof msg.content === "string") {
    return msg.role === "user"
      ? [{ role: "user", content: msg.content }]
      : [{ role: "assistant", content: msg.content }];
  }
  if (msg.role === "user") {
    return convertUserMessage(msg.content);
  }
  return [convertAssistantMessage(msg.content)];
}

function convertToolChoice(choice: { type: string; name?: string }): ForeignToolChoice {
  switch (choice.type) {
    case "none":
      return "none";
    case "any":
    case "required":
      return "required";
    case "tool":
      if (choice.name) {
        return { type: "function", function: { name: choice.name } };
      }
      return "auto";
    default:
      return "auto";
  }
}

/**
 * Convert a native request body to a chat-completions request.
 * Throws ConversionError when the body does not have the native shape.
 */
export function convertAnthropicToOpenAI(body: unknown): ForeignRequest {
  const parsed = nativeRequestSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "body";
    throw new ConversionError(`cannot convert request: ${where}: ${issue?.message ?? "invalid"}`);
  }

  const req = parsed.data;
  const messages: ForeignMessage[] = [];

  if (req.system !== undefined) {
    const systemText = typeof req.system === "string" ? req.system : joinText(req.system);
    if (systemText !== "") {
      messages.push({ role: "system", content: systemText });
    }
  }

  for (const msg of req.messages) {
    messages.push(...convertMessage(msg));
  }

  const result: ForeignRequest = {
    model: mapModel(req.model),
    messages,
  };

  if (req.max_tokens !== undefined) result.max_tokens = req.max_tokens;
  if (req.temperature !== undefined) result.temperature = req.temperature;
  if (req.top_p !== undefined) result.top_p = req.top_p;
  if (req.stream !== undefined) result.stream = req.stream;
  if (req.stop_sequences !== undefined) result.stop = req.stop_sequences;

  // Ask for usage in the final chunk of a streamed reply
  if (req.stream) {
    result.stream_options = { include_usage: true };
  }

  if (req.tools) {
    result.tools = req.tools.map((tool): ForeignTool => ({
      type: "function",
      function: {
        name: tool.name,
        ...(tool.description !== undefined ? { description: tool.description } : {}),
        ...(tool.input_schema !== undefined ? { parameters: tool.input_schema } : {}),
      },
    }));
  }

  if (req.tool_choice) {
    result.tool_choice = convertToolChoice(req.tool_choice);
  }

  return result;
}

function parseToolArguments(args: string | Record<string, unknown> | undefined): Record<string, unknown> {
  if (args === undefined) return {};
  if (typeof args !== "string") return args;
  if (args.trim() === "") return {};

  try {
    const value: unknown = JSON.parse(args);
    return isRecord(value) ? value : {};
  } catch {
    return {};
  }
}

export function convertUsage(usage: ForeignUsage | null | undefined): NativeUsage {
  if (!usage) {
    return { input_tokens: 0, output_tokens: 0, cache_read_input_tokens: 0 };
  }
  const cached = usage.prompt_tokens_details?.cached_tokens ?? 0;
  return {
    input_tokens: Math.max(0, usage.prompt_tokens - cached),
    output_tokens: usage.completion_tokens,
    cache_read_input_tokens: cached,
  };
}

/**
 * Convert a parsed chat-completions response to a native message.
 */
export function convertOpenAIResponseToAnthropic(response: ForeignResponse): NativeResponse {
  const choice = response.choices[0];
  const message = choice?.message;
  const content: NativeResponseBlock[] = [];

  if (message?.content) {
    content.push({ type: "text", text: message.content });
  }

  for (const tc of message?.tool_calls ?? []) {
    content.push({
      type: "tool_use",
      id: tc.id ?? generateToolUseId(),
      name: tc.function.name,
      input: parseToolArguments(tc.function.arguments),
    });
  }

  if (content.length === 0) {
    content.push({ type: "text", text: "" });
  }

  return {
    id: response.id || generateMessageId(),
    type: "message",
    role: "assistant",
    content,
    model: response.model ?? "",
    stop_reason: mapFinishReason(choice?.finish_reason),
    stop_sequence: null,
    usage: convertUsage(response.usage),
  };
}

/**
 * Convert a buffered response body. Bodies that are already native messages
 * come back unchanged. Throws ConversionError when the body is not a JSON object.
 */
export function convertResponseBody(text: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new ConversionError(`cannot convert response: ${errorMessage(e)}`);
  }

  if (!isRecord(parsed)) {
    throw new ConversionError("cannot convert response: body is not a JSON object");
  }
  if (parsed.type === "message") {
    return text;
  }

  const result = foreignResponseSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConversionError(
      `cannot convert response: ${result.error.issues[0]?.message ?? "unexpected shape"}`,
    );
  }

  return JSON.stringify(convertOpenAIResponseToAnthropic(result.data));
}

export function formatSSE(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

export function streamErrorEvent(message: string): string {
  return formatSSE("error", { type: "error", error: { type: "api_error", message } });
}

interface PendingToolCall {
  id?: string;
  name: string;
  args: string;
}

/**
 * Line-level converter for a chat-completions SSE stream. Each call returns
 * the native SSE text to write for that input, possibly empty.
 *
 * Text streams as it arrives. Tool call fragments may interleave across call
 * indices, so each call is accumulated and written as one whole `tool_use`
 * block when the stream finishes.
 */
export class OpenAIStreamConverter {
  private started = false;
  private nextIndex = 0;
  private openTextIndex: number | null = null;
  private readonly toolCalls = new Map<number, PendingToolCall>();
  private finishReason: string | null = null;
  private usage: ForeignUsage | null = null;
  private converted = false;
  private passthrough = false;
  private done = false;
  private text = "";

  constructor(
    private readonly model: string,
    readonly messageId: string = generateMessageId(),
  ) {}

  get isDone(): boolean {
    return this.done;
  }

  /**
   * Text content seen so far, converted or passed through.
   */
  get assembledText(): string {
    return this.text;
  }

  processLine(rawLine: string): string {
    if (this.done) return "";

    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
    if (line === "") return "";
    if (line.startsWith(":")) return `${line}\n`;
    if (!line.startsWith("data:")) return "";

    const data = line.slice(5).trimStart();
    if (data === "[DONE]") return this.finish();

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch {
      return "";
    }
    if (!isRecord(parsed)) return "";

    const nativeType = parsed.type;
    if (typeof nativeType === "string" && NATIVE_EVENT_TYPES.has(nativeType)) {
      return this.passNative(nativeType, parsed, data);
    }

    const chunk = foreignStreamChunkSchema.safeParse(parsed);
    if (!chunk.success) return "";
    return this.convertChunk(chunk.data);
  }

  /**
   * Close the stream. Safe to call more than once; later calls return "".
   */
  finish(): string {
    if (this.done) return "";
    this.done = true;

    if (this.passthrough && !this.converted) return "";

    let out = this.ensureStarted();
    out += this.closeTextBlock();
    out += this.flushToolCalls();

    const usage = convertUsage(this.usage);
    out += formatSSE("message_delta", {
      type: "message_delta",
      delta: { stop_reason: mapFinishReason(this.finishReason), stop_sequence: null },
      usage: this.usage
        ? {
            input_tokens: usage.input_tokens,
            output_tokens: usage.output_tokens,
            cache_read_input_tokens: usage.cache_read_input_tokens,
          }
        : { output_tokens: 0 },
    });
    out += formatSSE("message_stop", { type: "message_stop" });
    return out;
  }

  /**
   * Terminal error event for an upstream that broke mid-stream.
   */
  fail(message: string): string {
    if (this.done) return "";
    this.done = true;
    return streamErrorEvent(message);
  }

  private passNative(type: string, event: Record<string, unknown>, data: string): string {
    this.passthrough = true;

    const delta = event.delta;
    if (type === "content_block_delta" && isRecord(delta) && typeof delta.text === "string") {
      this.text += delta.text;
    }
    if (type === "message_stop") {
      this.done = true;
    }
    return `event: ${type}\ndata: ${data}\n\n`;
  }

  private ensureStarted(): string {
    if (this.started) return "";
    this.started = true;
    this.converted = true;
    return formatSSE("message_start", {
      type: "message_start",
      message: {
        id: this.messageId,
        type: "message",
        role: "assistant",
        content: [],
        model: this.model,
        stop_reason: null,
        stop_sequence: null,
        usage: { input_tokens: 0, output_tokens: 0 },
      },
    });
  }

  private closeTextBlock(): string {
    if (this.openTextIndex === null) return "";
    const index = this.openTextIndex;
    this.openTextIndex = null;
    return formatSSE("content_block_stop", { type: "content_block_stop", index });
  }

  private openTextBlock(): string {
    const index = this.nextIndex++;
    this.openTextIndex = index;
    return formatSSE("content_block_start", {
      type: "content_block_start",
      index,
      content_block: { type: "text", text: "" },
    });
  }

  private flushToolCalls(): string {
    let out = "";
    const calls = [...this.toolCalls.entries()].sort(([a], [b]) => a - b);
    for (const [, call] of calls) {
      const index = this.nextIndex++;
      out += formatSSE("content_block_start", {
        type: "content_block_start",
        index,
        content_block: { type: "tool_use", id: call.id ?? generateToolUseId(), name: call.name, input: {} },
      });
      if (call.args !== "") {
        out += formatSSE("content_block_delta", {
          type: "content_block_delta",
          index,
          delta: { type: "input_json_delta", partial_json: call.args },
        });
      }
      out += formatSSE("content_block_stop", { type: "content_block_stop", index });
    }
    this.toolCalls.clear();
    return out;
  }

  private convertChunk(chunk: ForeignStreamChunk): string {
    let out = this.ensureStarted();

    if (chunk.usage) {
      this.usage = chunk.usage;
    }

    const choice = chunk.choices[0];
    if (!choice) return out;

    const delta = choice.delta;
    if (delta?.content) {
      if (this.openTextIndex === null) {
        out += this.openTextBlock();
      }
      this.text += delta.content;
      out += formatSSE("content_block_delta", {
        type: "content_block_delta",
        index: this.openTextIndex,
        delta: { type: "text_delta", text: delta.content },
      });
    }

    for (const tc of delta?.tool_calls ?? []) {
      const callIndex = tc.index ?? 0;
      let call = this.toolCalls.get(callIndex);
      if (!call) {
        call = { name: "", args: "" };
        this.toolCalls.set(callIndex, call);
      }
      if (tc.id && call.id === undefined) call.id = tc.id;
      if (tc.function?.name && call.name === "") call.name = tc.function.name;
      call.args += tc.function?.arguments ?? "";
    }

    if (choice.finish_reason) {
      this.finishReason = choice.finish_reason;
    }

    return out;
  }
}
