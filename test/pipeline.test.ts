import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  appendResponseSteps,
  halt,
  insertResponseSteps,
  newRequest,
  prependRequestSteps,
  requestUrl,
  run,
  type Exchange,
  type ResponseStep,
  type TransportOptions,
} from "../pipeline.ts";
import { TransportError, ValidationError } from "../types.ts";
import { refusingFetch } from "./fake_clickhouse.ts";

interface Sent {
  url: string;
  method: string;
  headers: Headers;
  body: unknown;
}

function echoFetch(contentType: string, payload: string, sent: Sent[] = []): typeof globalThis.fetch {
  return async (input, init) => {
    sent.push({
      url: input.toString(),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: init?.body,
    });
    return new Response(payload, { status: 200, headers: { "content-type": contentType } });
  };
}

type PlainExchange = Exchange<TransportOptions, object, never>;

describe("requestUrl", () => {
  it("requires a base URL", () => {
    assert.throws(() => requestUrl({}, ""), { name: "ValidationError", message: "baseUrl is required" });
  });

  it("rejects a malformed base URL", () => {
    assert.throws(() => requestUrl({ baseUrl: "not a url" }, ""), ValidationError);
  });

  it("appends to an existing query string", () => {
    assert.equal(requestUrl({ baseUrl: "http://h:8123/?x=1" }, "y=2").toString(), "http://h:8123/?x=1&y=2");
    assert.equal(requestUrl({ baseUrl: "http://h:8123" }, "y=2").toString(), "http://h:8123/?y=2");
  });
});

describe("run", () => {
  it("sends the request and decodes text bodies", async () => {
    const sent: Sent[] = [];
    const request = newRequest<TransportOptions>({
      body: "payload",
      query: "a=1",
      options: { baseUrl: "http://h:8123", fetch: echoFetch("text/plain; charset=UTF-8", "ok\n", sent) },
    });
    const [, response] = await run(request);

    assert.equal(response.status, 200);
    assert.equal(response.body, "ok\n");
    assert.equal(sent.length, 1);
    assert.equal(sent[0]?.url, "http://h:8123/?a=1");
    assert.equal(sent[0]?.method, "POST");
    assert.equal(sent[0]?.body, "payload");
  });

  it("keeps binary bodies as bytes", async () => {
    const request = newRequest<TransportOptions>({
      options: { baseUrl: "http://h:8123", fetch: echoFetch("application/octet-stream", "AB") },
    });
    const [, response] = await run(request);
    assert.deepEqual(response.body, new Uint8Array([65, 66]));
  });

  it("does not send a body with GET", async () => {
    const sent: Sent[] = [];
    const request = newRequest<TransportOptions>({
      method: "GET",
      body: "ignored",
      options: { baseUrl: "http://h:8123", fetch: echoFetch("text/plain", "", sent) },
    });
    await run(request);
    assert.equal(sent[0]?.body, null);
  });

  it("puts custom and auth headers", async () => {
    const sent: Sent[] = [];
    const request = newRequest<TransportOptions>({
      options: {
        baseUrl: "http://h:8123",
        fetch: echoFetch("text/plain", "", sent),
        headers: { "x-trace": "t1" },
        auth: { username: "reader", password: "test-secret" },
      },
    });
    await run(request);
    const headers = sent[0]?.headers;
    assert.equal(headers?.get("x-trace"), "t1");
    assert.equal(headers?.get("x-clickhouse-user"), "reader");
    assert.equal(headers?.get("x-clickhouse-key"), "test-secret");
  });

  it("does not let custom headers override headers set by earlier steps", async () => {
    const sent: Sent[] = [];
    const request = newRequest<TransportOptions>({
      options: { baseUrl: "http://h:8123", fetch: echoFetch("text/plain", "", sent), headers: { "x-mode": "custom" } },
    });
    prependRequestSteps(request, [
      [
        "set_mode",
        (req) => {
          req.headers.set("x-mode", "step");
          return req;
        },
      ],
    ]);
    await run(request);
    assert.equal(sent[0]?.headers.get("x-mode"), "step");
  });

  it("stops at a halting response step", async () => {
    const seen: string[] = [];
    const stop: ResponseStep<TransportOptions, object, never> = (req, res) => {
      seen.push("stop");
      res.status = 299;
      return halt<PlainExchange>([req, res]);
    };
    const after: ResponseStep<TransportOptions, object, never> = (req, res) => {
      seen.push("after");
      return [req, res];
    };
    const request = newRequest<TransportOptions>({
      options: { baseUrl: "http://h:8123", fetch: echoFetch("text/plain", "") },
    });
    appendResponseSteps(request, [
      ["stop", stop],
      ["after", after],
    ]);

    const [, response] = await run(request);
    assert.deepEqual(seen, ["stop"]);
    assert.equal(response.status, 299);
  });

  it("wraps fetch failures in TransportError", async () => {
    const request = newRequest<TransportOptions>({
      options: { baseUrl: "http://localhost:8123", fetch: refusingFetch },
    });
    await assert.rejects(run(request), (err: unknown) => {
      assert.ok(err instanceof TransportError);
      assert.equal(err.message, "Request to http://localhost:8123 failed: fetch failed");
      assert.ok(err.cause instanceof TypeError);
      return true;
    });
  });

  it("reports a timeout as a TransportError", async () => {
    const hanging: typeof globalThis.fetch = (_input, init) =>
      new Promise((_resolve, reject) => {
        const signal = init?.signal;
        if (signal) signal.addEventListener("abort", () => reject(signal.reason));
      });
    const request = newRequest<TransportOptions>({
      options: { baseUrl: "http://localhost:8123", fetch: hanging, timeout: 10 },
    });
    await assert.rejects(run(request), TransportError);
  });
});

describe("decode_body", () => {
  async function decoded(contentType: string, payload: string, options: TransportOptions = {}) {
    const request = newRequest<TransportOptions>({
      options: { baseUrl: "http://h:8123", fetch: echoFetch(contentType, payload), ...options },
    });
    const [, response] = await run(request);
    return response.body;
  }

  it("parses JSON", async () => {
    assert.deepEqual(await decoded("application/json; charset=UTF-8", '{"rows":1}'), { rows: 1 });
  });

  it("leaves newline-delimited JSON as text", async () => {
    assert.equal(await decoded("application/x-ndjson; charset=UTF-8", '{"a":1}\n{"a":2}\n'), '{"a":1}\n{"a":2}\n');
  });

  it("treats any charset as text", async () => {
    assert.equal(await decoded("binary/custom; charset=UTF-8", "hi"), "hi");
  });

  it("keeps octet-stream as bytes even with a charset", async () => {
    assert.deepEqual(await decoded("application/octet-stream; charset=UTF-8", "AB"), new Uint8Array([65, 66]));
  });

  it("can be turned off", async () => {
    assert.deepEqual(await decoded("application/json", "[1]", { decodeBody: false }), new Uint8Array([91, 49, 93]));
  });

  it("propagates malformed JSON", async () => {
    await assert.rejects(decoded("application/json", "{"), SyntaxError);
  });
});

describe("insertResponseSteps", () => {
  const noop: ResponseStep<TransportOptions, object, never> = (req, res) => [req, res];

  it("inserts ahead of the named step", () => {
    const request = newRequest<TransportOptions>({ options: {} });
    insertResponseSteps(request, "decode_body", [["mine", noop]]);
    assert.deepEqual(
      request.responseSteps.map(([name]) => name),
      ["decompress_body", "mine", "decode_body"],
    );
  });

  it("appends when the named step is absent", () => {
    const request = newRequest<TransportOptions>({ options: {} });
    insertResponseSteps(request, "missing", [["mine", noop]]);
    assert.deepEqual(
      request.responseSteps.map(([name]) => name),
      ["decompress_body", "decode_body", "mine"],
    );
  });
});
