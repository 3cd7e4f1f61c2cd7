import OpenAI from "openai";
import type { EvalConfig } from "./config.js";
import { BlockingChatMessages, StreamingChatMessages } from "./chat-messages.js";
import { BlockingResponses, StreamingResponses } from "./openai-responses.js";
import type { ExtraInputs, ResponseMode } from "./types.js";

export interface DeliveryRequest {
  query: string;
  sessionId: string | null;
  inputs: ExtraInputs;
  timeoutMs: number;
  runId: string;
  traceId: string;
}

export interface DeliveryResult {
  replyText: string;
  sessionId: string | null;
  messageId: string | null;
}

/**
 * Sends one turn and returns the assembled reply, or throws a DeliveryError.
 * Streaming and blocking transports share this shape so the retry layer
 * never needs to know which one it is driving.
 */
export interface Delivery {
  readonly mode: ResponseMode;
  deliver(request: DeliveryRequest): Promise<DeliveryResult>;
}

export function createDelivery(config: EvalConfig): Delivery {
  if (config.provider === "openai-responses") {
    const openai = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.apiUrl || undefined,
      maxRetries: 0,
      timeout: config.timeoutMs,
    });
    const options = { model: config.model };
    return config.responseMode === "streaming"
      ? new StreamingResponses(openai, options)
      : new BlockingResponses(openai, options);
  }

  const options = { apiUrl: config.apiUrl, apiKey: config.apiKey, userId: config.userId };
  return config.responseMode === "streaming"
    ? new StreamingChatMessages(options)
    : new BlockingChatMessages(options);
}
