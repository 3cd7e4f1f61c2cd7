import test from "node:test";
import assert from "node:assert/strict";
import OpenAI from "openai";
import { DeliveryError } from "../errors.js";
import { BlockingResponses, StreamingResponses, toDeliveryError } from "../openai-responses.js";
import type { DeliveryRequest } from "../delivery.js";

type FetchCall = { url: string; body: unknown };

const MODEL = "gpt-5-mini-2025-08-07";

function makeRequest(overrides: Partial<DeliveryRequest> = {}): DeliveryRequest {
  return {
    query: "What is my balance?",
    sessionId: null,
    inputs: {},
    timeoutMs: 1000,
    runId: "2026-02-06T18-10-04Z",
    traceId: "trace_balance_000_06t18_10_04z",
    ...overrides,
  };
}

function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function sse(events: unknown[]): Response {
  const body = events.map((event) => `data: ${JSON.stringify(event)}\n\n`).join("");
  return new Response(body, {
    status: 200,
    headers: { "content-type": "text/event-stream" },
  });
}

function assistantMessage(text: string) {
  return { type: "message", role: "assistant", id: "msg_1", status: "completed", content: [{ type: "output_text", text, annotations: [] }] };
}

/**
 * SDK client whose HTTP calls are answered in process.
 */
function makeClient(calls: FetchCall[], respond: (url: string) => Response): OpenAI {
  const stub: typeof fetch = async (input, init) => {
    const url = String(input);
    const body = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
    calls.push({ url, body });
    return respond(url);
  };
  return new OpenAI({ apiKey: "test-key", baseURL: "http://chat.test/v1", maxRetries: 0, fetch: stub });
}

function conversationsOrResponse(response: () => Response) {
  return (url: string): Response =>
    url.endsWith("/conversations") ? json({ id: "conv_abc", object: "conversation", created_at: 0, metadata: {} }) : response();
}

async function rejected(promise: Promise<unknown>): Promise<DeliveryError> {
  try {
    await promise;
  } catch (err) {
    assert.ok(err instanceof DeliveryError);
    return err;
  }
  assert.fail("expected delivery to fail");
}

test("first turn creates a conversation and sends inputs as context", async () => {
  const calls: FetchCall[] = [];
  const openai = makeClient(
    calls,
    conversationsOrResponse(() => json({ id: "resp_1", object: "response", output: [assistantMessage(" 42 dollars ")] }))
  );
  const delivery = new BlockingResponses(openai, { model: MODEL });

  const result = await delivery.deliver(makeRequest({ inputs: { account: "checking" } }));

  assert.deepEqual(result, { replyText: "42 dollars", sessionId: "conv_abc", messageId: "resp_1" });
  assert.deepEqual(
    calls.map((call) => call.url),
    ["http://chat.test/v1/conversations", "http://chat.test/v1/responses"]
  );
  assert.deepEqual(calls[1]?.body, {
    model: MODEL,
    input: [
      { role: "developer", content: 'Conversation inputs: {"account":"checking"}' },
      { role: "user", content: "What is my balance?" },
    ],
    conversation: "conv_abc",
    metadata: { eval_run: "2026-02-06T18-10-04Z", eval_trace: "trace_balance_000_06t18_10_04z" },
  });
});

test("later turns reuse the conversation without creating another", async () => {
  const calls: FetchCall[] = [];
  const openai = makeClient(
    calls,
    conversationsOrResponse(() => json({ id: "resp_2", object: "response", output: [assistantMessage("Still 42")] }))
  );
  const delivery = new BlockingResponses(openai, { model: MODEL });

  const result = await delivery.deliver(makeRequest({ sessionId: "conv_existing" }));

  assert.equal(result.sessionId, "conv_existing");
  assert.equal(calls.length, 1);
  assert.equal(calls[0]?.url, "http://chat.test/v1/responses");
  assert.deepEqual(calls[0]?.body, {
    model: MODEL,
    input: [{ role: "user", content: "What is my balance?" }],
    conversation: "conv_existing",
    metadata: { eval_run: "2026-02-06T18-10-04Z", eval_trace: "trace_balance_000_06t18_10_04z" },
  });
});

test("streaming delivery returns the completed response text", async () => {
  const calls: FetchCall[] = [];
  const openai = makeClient(
    calls,
    conversationsOrResponse(() =>
      sse([
        { type: "response.output_text.delta", delta: "Hi " },
        { type: "response.output_text.delta", delta: "there" },
        { type: "response.completed", response: { id: "resp_3", output: [assistantMessage("Hi there!")] } },
      ])
    )
  );
  const delivery = new StreamingResponses(openai, { model: MODEL });

  const result = await delivery.deliver(makeRequest({ sessionId: "conv_s" }));

  assert.deepEqual(result, { replyText: "Hi there!", sessionId: "conv_s", messageId: "resp_3" });
  const body = calls[0]?.body;
  assert.ok(typeof body === "object" && body !== null && "stream" in body);
  assert.equal(body.stream, true);
});

test("streaming delivery falls back to accumulated deltas", async () => {
  const openai = makeClient(
    [],
    conversationsOrResponse(() =>
      sse([
        { type: "response.output_text.delta", delta: " from " },
        { type: "response.output_text.delta", delta: "deltas " },
        { type: "response.completed", response: { id: "resp_4", output: [] } },
      ])
    )
  );
  const delivery = new StreamingResponses(openai, { model: MODEL });

  const result = await delivery.deliver(makeRequest({ sessionId: "conv_s" }));
  assert.equal(result.replyText, "from deltas");
});

test("a failed or truncated stream is a delivery failure", async () => {
  const failing = new StreamingResponses(
    makeClient(
      [],
      conversationsOrResponse(() =>
        sse([{ type: "response.failed", response: { id: "resp_5", error: { code: "server_error", message: "model overloaded" } } }])
      )
    ),
    { model: MODEL }
  );
  const failed = await rejected(failing.deliver(makeRequest({ sessionId: "conv_s" })));
  assert.equal(failed.kind, "stream");
  assert.equal(failed.message, "OpenAI API response failed: model overloaded");

  const truncated = new StreamingResponses(
    makeClient([], conversationsOrResponse(() => sse([{ type: "response.output_text.delta", delta: "partial" }]))),
    { model: MODEL }
  );
  const ended = await rejected(truncated.deliver(makeRequest({ sessionId: "conv_s" })));
  assert.equal(ended.kind, "protocol");
  assert.equal(ended.message, "OpenAI API stream ended before response.completed");
});

test("http status errors keep the status classification", async () => {
  const badRequest = new BlockingResponses(
    makeClient([], conversationsOrResponse(() => json({ error: { message: "unknown model", type: "invalid_request_error" } }, 400))),
    { model: MODEL }
  );
  const invalid = await rejected(badRequest.deliver(makeRequest({ sessionId: "conv_s" })));
  assert.equal(invalid.kind, "http");
  assert.equal(invalid.status, 400);
  assert.equal(invalid.retryable, false);
  assert.match(invalid.message, /^OpenAI API 400: /);

  const unavailable = new BlockingResponses(
    makeClient([], conversationsOrResponse(() => json({ error: { message: "try again" } }, 503))),
    { model: MODEL }
  );
  const outage = await rejected(unavailable.deliver(makeRequest({ sessionId: "conv_s" })));
  assert.equal(outage.status, 503);
  assert.equal(outage.retryable, true);
});

test("a conversation that cannot be created fails the turn", async () => {
  const calls: FetchCall[] = [];
  const openai = makeClient(calls, () => json({ error: { message: "forbidden" } }, 403));
  const delivery = new BlockingResponses(openai, { model: MODEL });

  const err = await rejected(delivery.deliver(makeRequest()));
  assert.equal(err.status, 403);
  assert.equal(err.retryable, false);
  assert.deepEqual(
    calls.map((call) => call.url),
    ["http://chat.test/v1/conversations"]
  );
});

test("toDeliveryError classifies connection failures", () => {
  const timeout = toDeliveryError(new OpenAI.APIConnectionTimeoutError());
  assert.equal(timeout.kind, "timeout");
  assert.equal(timeout.message, "OpenAI API request timed out");

  const network = toDeliveryError(new OpenAI.APIConnectionError({ message: "socket hang up" }));
  assert.equal(network.kind, "network");
  assert.equal(network.message, "OpenAI API connection failed: socket hang up");

  const other = toDeliveryError(new Error("boom"));
  assert.equal(other.kind, "unknown");
  assert.equal(other.retryable, true);
});
