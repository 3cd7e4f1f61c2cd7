import OpenAI from "openai";
import { DeliveryError, errorMessage, isRetryableStatus } from "./errors.js";
import type { Delivery, DeliveryRequest, DeliveryResult } from "./delivery.js";

const SERVICE_NAME = "OpenAI API";

export interface ResponsesOptions {
  model: string;
}

/**
 * Extract final assistant text from response output.
 */
export function extractFinalText(
  output: OpenAI.Responses.ResponseOutputItem[]
): string {
  const textItems = output.filter(
    (item): item is OpenAI.Responses.ResponseOutputMessage =>
      item.type === "message" && item.role === "assistant"
  );

  return textItems
    .flatMap((msg) =>
      msg.content
        .filter(
          (c): c is OpenAI.Responses.ResponseOutputText =>
            c.type === "output_text"
        )
        .map((c) => c.text)
    )
    .join("\n");
}

function buildInput(request: DeliveryRequest): OpenAI.Responses.ResponseInput {
  const input: OpenAI.Responses.ResponseInput = [];

  // Extra inputs have no native slot in the Responses API; pass them as context
  if (Object.keys(request.inputs).length > 0) {
    input.push({
      role: "developer",
      content: `Conversation inputs: ${JSON.stringify(request.inputs)}`,
    });
  }

  input.push({ role: "user", content: request.query });
  return input;
}

function buildMetadata(request: DeliveryRequest): Record<string, string> {
  return {
    eval_run: request.runId,
    eval_trace: request.traceId,
  };
}

/**
 * Translate SDK errors into the shared DeliveryError classification.
 */
export function toDeliveryError(err: unknown): DeliveryError {
  if (err instanceof DeliveryError) {
    return err;
  }
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return new DeliveryError("timeout", `${SERVICE_NAME} request timed out`, { cause: err });
  }
  if (err instanceof OpenAI.APIConnectionError) {
    return new DeliveryError("network", `${SERVICE_NAME} connection failed: ${err.message}`, {
      cause: err,
    });
  }
  if (err instanceof OpenAI.APIError && typeof err.status === "number") {
    return new DeliveryError("http", `${SERVICE_NAME} ${err.status}: ${err.message}`, {
      status: err.status,
      retryable: isRetryableStatus(err.status),
      cause: err,
    });
  }
  return new DeliveryError("unknown", `${SERVICE_NAME} call failed: ${errorMessage(err)}`, {
    cause: err,
  });
}

/**
 * Conversation handles come from the Conversations API: created on the
 * first turn, then passed unchanged on every later turn.
 */
async function resolveConversation(
  openai: OpenAI,
  request: DeliveryRequest
): Promise<string> {
  if (request.sessionId) {
    return request.sessionId;
  }
  const conversation = await openai.conversations.create(
    { metadata: buildMetadata(request) },
    { timeout: request.timeoutMs }
  );
  return conversation.id;
}

export class BlockingResponses implements Delivery {
  readonly mode = "blocking" as const;

  constructor(
    private readonly openai: OpenAI,
    private readonly options: ResponsesOptions
  ) {}

  async deliver(request: DeliveryRequest): Promise<DeliveryResult> {
    try {
      const conversationId = await resolveConversation(this.openai, request);
      const response = await this.openai.responses.create(
        {
          model: this.options.model,
          input: buildInput(request),
          conversation: conversationId,
          metadata: buildMetadata(request),
        },
        { timeout: request.timeoutMs }
      );

      return {
        replyText: extractFinalText(response.output).trim(),
        sessionId: conversationId,
        messageId: response.id,
      };
    } catch (err) {
      throw toDeliveryError(err);
    }
  }
}

/**
 * Consume Responses stream events until response.completed.
 */
export async function assembleResponseStream(
  events: AsyncIterable<OpenAI.Responses.ResponseStreamEvent>,
  conversationId: string
): Promise<DeliveryResult> {
  let text = "";

  for await (const event of events) {
    switch (event.type) {
      case "response.output_text.delta":
        text += event.delta;
        break;
      case "response.completed": {
        const finalText = extractFinalText(event.response.output);
        return {
          replyText: (finalText || text).trim(),
          sessionId: conversationId,
          messageId: event.response.id,
        };
      }
      case "response.failed":
        throw new DeliveryError(
          "stream",
          `${SERVICE_NAME} response failed: ${event.response.error?.message ?? "unknown error"}`
        );
      case "error":
        throw new DeliveryError("stream", `${SERVICE_NAME} stream error: ${event.message}`);
      default:
        break;
    }
  }

  throw new DeliveryError("protocol", `${SERVICE_NAME} stream ended before response.completed`);
}

export class StreamingResponses implements Delivery {
  readonly mode = "streaming" as const;

  constructor(
    private readonly openai: OpenAI,
    private readonly options: ResponsesOptions
  ) {}

  async deliver(request: DeliveryRequest): Promise<DeliveryResult> {
    try {
      const conversationId = await resolveConversation(this.openai, request);
      const stream = await this.openai.responses.create(
        {
          model: this.options.model,
          input: buildInput(request),
          conversation: conversationId,
          metadata: buildMetadata(request),
          stream: true,
        },
        { timeout: request.timeoutMs }
      );
      return await assembleResponseStream(stream, conversationId);
    } catch (err) {
      throw toDeliveryError(err);
    }
  }
}
