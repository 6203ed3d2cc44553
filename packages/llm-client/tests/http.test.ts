import { describe, it, expect, vi, afterEach } from "vitest";
import { FetchTransport, mergeHeaders, readStreamText } from "../src/utils/http.js";
import { AbortedError, TransportError } from "../src/types/errors.js";
import { chunkedStream } from "./helpers.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const request = {
  method: "POST" as const,
  url: "https://api.example.com/v1/chat",
  headers: { "Content-Type": "application/json" },
  body: '{"a":1}',
};

function stubFetch(impl: (url: string, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

// ===========================================================================
// mergeHeaders
// ===========================================================================

describe("mergeHeaders", () => {
  it("sets Content-Type: application/json by default", () => {
    expect(mergeHeaders()).toEqual({ "Content-Type": "application/json" });
  });

  it("merges multiple header objects, later overriding earlier", () => {
    const result = mergeHeaders(
      { Authorization: "Bearer test-secret", "X-Custom": "first" },
      { "X-Custom": "second", "X-New": "value" },
    );
    expect(result).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
      "X-Custom": "second",
      "X-New": "value",
    });
  });

  it("ignores undefined header sets", () => {
    expect(mergeHeaders(undefined, { "X-Key": "val" }, undefined)).toEqual({
      "Content-Type": "application/json",
      "X-Key": "val",
    });
  });
});

// ===========================================================================
// FetchTransport
// ===========================================================================

describe("FetchTransport.send", () => {
  it("sends the request and returns status, lower-cased headers and text", async () => {
    const fetchMock = stubFetch(async () =>
      new Response('{"ok":true}', { status: 201, headers: { "X-Request-Id": "req-1" } }),
    );

    const res = await new FetchTransport().send(request);

    expect(res.status).toBe(201);
    expect(res.body).toBe('{"ok":true}');
    expect(res.headers["x-request-id"]).toBe("req-1");

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://api.example.com/v1/chat");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"a":1}');
  });

  it("resolves on error statuses", async () => {
    stubFetch(async () => new Response("nope", { status: 500 }));

    const res = await new FetchTransport().send(request);
    expect(res).toMatchObject({ status: 500, body: "nope" });
  });

  it("maps a network failure to TransportError", async () => {
    stubFetch(async () => {
      throw new TypeError("fetch failed");
    });

    const error = await new FetchTransport().send(request).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: "request to https://api.example.com/v1/chat failed: fetch failed",
    });
  });

  it("maps an aborted request to AbortedError", async () => {
    const controller = new AbortController();
    controller.abort();
    stubFetch(async () => {
      throw new DOMException("This operation was aborted", "AbortError");
    });

    await expect(
      new FetchTransport().send({ ...request, signal: controller.signal }),
    ).rejects.toBeInstanceOf(AbortedError);
  });

  it("maps a timeout to TransportError", async () => {
    stubFetch(async () => {
      throw new DOMException("The operation timed out", "TimeoutError");
    });

    await expect(new FetchTransport({ timeout: 5 }).send(request)).rejects.toThrow(
      "request timed out: https://api.example.com/v1/chat",
    );
  });

  it("passes a signal to fetch when a timeout is configured", async () => {
    const fetchMock = stubFetch(async () => new Response("{}"));

    await new FetchTransport({ timeout: 1000 }).send(request);

    expect(fetchMock.mock.calls[0]?.[1]?.signal).toBeInstanceOf(AbortSignal);
  });
});

describe("FetchTransport.sendStream", () => {
  it("returns the body stream unread", async () => {
    stubFetch(async () => new Response(chunkedStream(["data: a\n\n"]), { status: 200 }));

    const res = await new FetchTransport().sendStream(request);

    expect(res.status).toBe(200);
    expect(await readStreamText(res.body)).toBe("data: a\n\n");
  });

  it("rejects a response without a body", async () => {
    stubFetch(async () => new Response(null, { status: 204 }));

    await expect(new FetchTransport().sendStream(request)).rejects.toBeInstanceOf(TransportError);
  });
});

describe("readStreamText", () => {
  it("joins all chunks", async () => {
    expect(await readStreamText(chunkedStream(["hel", "lo"]))).toBe("hello");
  });
});
