/**
 * Delivery over a Dify-style chat endpoint: POST {apiUrl}/chat-messages.
 *
 * The first turn of a conversation is sent without conversation_id; the
 * service answers with one, and later turns pass it back to continue the
 * same conversation.
 */

import { DeliveryError, httpError, isRetryableStatus, transportError } from "./errors.js";
import type { Delivery, DeliveryRequest, DeliveryResult } from "./delivery.js";
import type { ResponseMode } from "./types.js";

const SERVICE_NAME = "Chat API";
const ERROR_SNIPPET_LEN = 200;
const ANSWER_FALLBACK_FIELDS = ["message", "content", "text", "response"];

export interface ChatMessagesOptions {
  apiUrl: string;
  apiKey: string;
  userId: string;
}

type ResponseBody = NonNullable<Response["body"]>;

export function buildChatHeaders(
  apiKey: string,
  runId: string,
  traceId: string,
  mode: ResponseMode
): Record<string, string> {
  return {
    Authorization: `Bearer ${apiKey}`,
    "Content-Type": "application/json",
    Accept: mode === "streaming" ? "text/event-stream" : "application/json",
    "X-Chatflow-Eval-Run": runId,
    "X-Chatflow-Eval-Trace": traceId,
  };
}

export function buildChatPayload(
  request: DeliveryRequest,
  userId: string,
  mode: ResponseMode
): Record<string, unknown> {
  const payload: Record<string, unknown> = {
    inputs: request.inputs,
    query: request.query,
    response_mode: mode,
    user: userId,
  };
  if (request.sessionId) {
    payload.conversation_id = request.sessionId;
  }
  return payload;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(value: unknown): string | null {
  return typeof value === "string" && value.length > 0 ? value : null;
}

function describeErrorBody(text: string): string {
  try {
    const data: unknown = JSON.parse(text);
    if (isRecord(data) && typeof data.message === "string") {
      return data.message;
    }
  } catch {
    // not JSON; fall through to the raw snippet
  }
  return text.slice(0, ERROR_SNIPPET_LEN) || "empty body";
}

async function postChatMessage(
  options: ChatMessagesOptions,
  request: DeliveryRequest,
  mode: ResponseMode
): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(`${options.apiUrl}/chat-messages`, {
      method: "POST",
      headers: buildChatHeaders(options.apiKey, request.runId, request.traceId, mode),
      body: JSON.stringify(buildChatPayload(request, options.userId, mode)),
      signal: AbortSignal.timeout(request.timeoutMs),
    });
  } catch (err) {
    throw transportError(err, request.timeoutMs);
  }

  if (!response.ok) {
    const text = await response.text().catch(() => "no body");
    throw httpError(SERVICE_NAME, response.status, describeErrorBody(text));
  }

  return response;
}

/**
 * Pick the reply text out of a blocking response body.
 */
export function extractAnswer(data: Record<string, unknown>): string {
  if (typeof data.answer === "string") {
    return data.answer.trim();
  }
  for (const field of ANSWER_FALLBACK_FIELDS) {
    const value = readString(data[field]);
    if (value) return value.trim();
  }
  return "";
}

export class BlockingChatMessages implements Delivery {
  readonly mode = "blocking" as const;

  constructor(private readonly options: ChatMessagesOptions) {}

  async deliver(request: DeliveryRequest): Promise<DeliveryResult> {
    const response = await postChatMessage(this.options, request, this.mode);

    let data: unknown;
    try {
      data = await response.json();
    } catch (err) {
      if (err instanceof SyntaxError) {
        throw new DeliveryError("protocol", `${SERVICE_NAME} returned invalid JSON: ${err.message}`);
      }
      throw transportError(err, request.timeoutMs);
    }

    if (!isRecord(data)) {
      throw new DeliveryError("protocol", `${SERVICE_NAME} returned a non-object response`);
    }

    return {
      replyText: extractAnswer(data),
      sessionId: readString(data.conversation_id),
      messageId: readString(data.message_id) ?? readString(data.id),
    };
  }
}

function parseDataLine(line: string): unknown {
  if (!line.startsWith("data:")) return undefined;
  const json = line.slice("data:".length).trim();
  if (!json) return undefined;
  try {
    return JSON.parse(json);
  } catch {
    // keep-alive noise and partial vendor lines are skipped, not fatal
    return undefined;
  }
}

/**
 * Yield the JSON payload of every `data:` line of a server-sent event stream.
 */
export async function* readEventStream(body: ResponseBody): AsyncGenerator<unknown> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let finished = false;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      buffer += decoder.decode(value, { stream: true });

      let newline = buffer.indexOf("\n");
      while (newline !== -1) {
        const payload = parseDataLine(buffer.slice(0, newline).replace(/\r$/, ""));
        buffer = buffer.slice(newline + 1);
        if (payload !== undefined) yield payload;
        newline = buffer.indexOf("\n");
      }
    }

    finished = true;
    const tail = parseDataLine((buffer + decoder.decode()).trim());
    if (tail !== undefined) yield tail;
  } finally {
    if (!finished) {
      await reader.cancel().catch(() => undefined);
    }
    reader.releaseLock();
  }
}

/**
 * Consume chat stream events until message_end and assemble the reply.
 */
export async function assembleChatStream(events: AsyncIterable<unknown>): Promise<DeliveryResult> {
  let answer = "";
  let sessionId: string | null = null;
  let messageId: string | null = null;

  for await (const event of events) {
    if (!isRecord(event)) continue;

    switch (event.event) {
      case "message":
      case "agent_message":
        answer += typeof event.answer === "string" ? event.answer : "";
        sessionId ??= readString(event.conversation_id);
        messageId ??= readString(event.message_id);
        break;
      case "message_replace":
        answer = typeof event.answer === "string" ? event.answer : answer;
        break;
      case "message_end":
        sessionId ??= readString(event.conversation_id);
        messageId ??= readString(event.message_id) ?? readString(event.id);
        return { replyText: answer.trim(), sessionId, messageId };
      case "error": {
        const status = typeof event.status === "number" ? event.status : null;
        throw new DeliveryError(
          "stream",
          `${SERVICE_NAME} stream error: ${readString(event.message) ?? "unknown error"}`,
          { status, retryable: status === null || isRetryableStatus(status) }
        );
      }
      default:
        break;
    }
  }

  throw new DeliveryError("protocol", `${SERVICE_NAME} stream ended before message_end`);
}

export class StreamingChatMessages implements Delivery {
  readonly mode = "streaming" as const;

  constructor(private readonly options: ChatMessagesOptions) {}

  async deliver(request: DeliveryRequest): Promise<DeliveryResult> {
    const response = await postChatMessage(this.options, request, this.mode);
    if (!response.body) {
      throw new DeliveryError("protocol", `${SERVICE_NAME} returned an empty stream`);
    }

    try {
      return await assembleChatStream(readEventStream(response.body));
    } catch (err) {
      throw transportError(err, request.timeoutMs);
    }
  }
}
