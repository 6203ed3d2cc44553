import { describe, it, expect } from "vitest";
import {
  MAX_PATCH_DEPTH,
  applyRequestPatch,
  compileRequestPatch,
  deepMerge,
  parseFieldPath,
  removeField,
  type OutgoingRequest,
} from "../src/patch/request-patch.js";
import { InvalidConfigError } from "../src/types/errors.js";
import type { JsonObject } from "../src/types/json.js";
import { parseJson } from "../src/utils/json.js";

function request(body: JsonObject, headers: Record<string, string> = {}): OutgoingRequest {
  return { url: "https://api.example.com/v1/chat", body, headers };
}

function nested(depth: number): JsonObject {
  let value: JsonObject = { leaf: 1 };
  for (let i = 1; i < depth; i++) {
    value = { next: value };
  }
  return value;
}

// ===========================================================================
// Compilation
// ===========================================================================

describe("compileRequestPatch", () => {
  it("splits removal paths into segments", () => {
    const compiled = compileRequestPatch({ remove_fields: ["a.b.0", "c"] });
    expect(compiled.removals).toEqual([["a", "b", "0"], ["c"]]);
  });

  it("rejects an empty removal path", () => {
    expect(() => compileRequestPatch({ remove_fields: [""] })).toThrow(InvalidConfigError);
  });

  it("rejects a removal path with an empty segment", () => {
    try {
      compileRequestPatch({ remove_fields: ["a..b"] });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigError);
      expect(err).toMatchObject({ field: "patch.remove_fields" });
    }
  });

  it("accepts a body at the depth limit and rejects one past it", () => {
    expect(() => compileRequestPatch({ body: nested(MAX_PATCH_DEPTH) })).not.toThrow();

    try {
      compileRequestPatch({ body: nested(MAX_PATCH_DEPTH + 1) });
      expect.unreachable();
    } catch (err) {
      expect(err).toMatchObject({ kind: "invalid_config", field: "patch.body" });
    }
  });

  it("copies the body so later edits to the source do not leak in", () => {
    const body: JsonObject = { a: 1 };
    const compiled = compileRequestPatch({ body });
    body["a"] = 2;
    expect(compiled.body).toEqual({ a: 1 });
  });
});

describe("parseFieldPath", () => {
  it("splits on dots", () => {
    expect(parseFieldPath("messages.0.content")).toEqual(["messages", "0", "content"]);
  });

  it("names the offending path", () => {
    expect(() => parseFieldPath("a.")).toThrow('removal path "a." contains an empty segment');
  });
});

// ===========================================================================
// Deep merge
// ===========================================================================

describe("deepMerge", () => {
  it("merges objects key by key", () => {
    expect(deepMerge({ a: { x: 1, y: 2 }, b: 1 }, { a: { y: 3, z: 4 } })).toEqual({
      a: { x: 1, y: 3, z: 4 },
      b: 1,
    });
  });

  it("replaces arrays wholesale", () => {
    expect(deepMerge({ stop: ["a", "b"] }, { stop: ["c"] })).toEqual({ stop: ["c"] });
  });

  it("lets a scalar replace an object and vice versa", () => {
    expect(deepMerge({ a: { x: 1 } }, { a: 5 })).toEqual({ a: 5 });
    expect(deepMerge({ a: 5 }, { a: { x: 1 } })).toEqual({ a: { x: 1 } });
  });

  it("sets null values rather than deleting", () => {
    expect(deepMerge({ a: 1 }, { a: null })).toEqual({ a: null });
  });

  it("keeps a `__proto__` key from parsed JSON as a plain field", () => {
    const merged = deepMerge({ a: 1 }, parseJson('{"__proto__":{"extra":1}}'));

    expect(JSON.stringify(merged)).toBe('{"a":1,"__proto__":{"extra":1}}');
    expect(Object.getPrototypeOf(merged)).toBe(Object.prototype);
  });
});

// ===========================================================================
// Removal
// ===========================================================================

describe("removeField", () => {
  it("removes a nested object key", () => {
    expect(removeField({ a: { b: 1, c: 2 } }, "a.b")).toEqual({ a: { c: 2 } });
  });

  it("removes an array element and shifts the rest", () => {
    expect(removeField({ list: [1, 2, 3] }, "list.1")).toEqual({ list: [1, 3] });
  });

  it("removes the first element of a nested array", () => {
    expect(removeField({ a: { b: ["x", "y"] } }, "a.b.0")).toEqual({ a: { b: ["y"] } });
  });

  it("ignores missing paths", () => {
    const body = { a: { b: 1 } };
    expect(removeField(body, "a.x.y")).toEqual(body);
    expect(removeField(body, "list.9")).toEqual(body);
  });

  it("does not mutate its input", () => {
    const body = { a: 1, b: 2 };
    removeField(body, "a");
    expect(body).toEqual({ a: 1, b: 2 });
  });
});

// ===========================================================================
// Apply
// ===========================================================================

describe("applyRequestPatch", () => {
  it("replaces the url", () => {
    const patch = compileRequestPatch({ url: "https://proxy.example.com/chat" });
    expect(applyRequestPatch(request({}), patch).url).toBe("https://proxy.example.com/chat");
  });

  it("deep-merges the body fragment", () => {
    const patch = compileRequestPatch({ body: { options: { seed: 7 } } });
    const result = applyRequestPatch(request({ model: "m", options: { top_k: 3 } }), patch);
    expect(result.body).toEqual({ model: "m", options: { top_k: 3, seed: 7 } });
  });

  it("sets, overrides and deletes headers case-insensitively", () => {
    const patch = compileRequestPatch({
      headers: { authorization: "Bearer test-secret", "X-Trace": "on", "x-remove": null },
    });
    const result = applyRequestPatch(
      request({}, { Authorization: "Bearer old", "X-Remove": "1", Accept: "*/*" }),
      patch,
    );

    expect(result.headers).toEqual({
      Accept: "*/*",
      authorization: "Bearer test-secret",
      "X-Trace": "on",
    });
  });

  it("removes fields after merging", () => {
    const patch = compileRequestPatch({
      body: { stream_options: { include_usage: true } },
      remove_fields: ["stream_options"],
    });
    const result = applyRequestPatch(request({ model: "m" }), patch);
    expect(result.body).toEqual({ model: "m" });
  });

  it("removes sibling indices in descending order", () => {
    const patch = compileRequestPatch({ remove_fields: ["items.0", "items.2"] });
    const result = applyRequestPatch(request({ items: ["a", "b", "c", "d"] }), patch);
    expect(result.body).toEqual({ items: ["b", "d"] });
  });

  it("keeps non-index removals in list order around an index group", () => {
    const patch = compileRequestPatch({
      remove_fields: ["items.1", "extra", "items.3"],
    });
    const result = applyRequestPatch(
      request({ items: [0, 1, 2, 3], extra: true, keep: 1 }),
      patch,
    );
    expect(result.body).toEqual({ items: [0, 2], keep: 1 });
  });

  it("leaves the request and the patch untouched", () => {
    const original = request({ a: { b: 1 }, list: [1, 2] }, { "X-A": "1" });
    const snapshot = structuredClone(original);
    const patch = compileRequestPatch({
      body: { a: { c: 2 } },
      headers: { "X-A": null },
      remove_fields: ["list.0"],
    });

    const result = applyRequestPatch(original, patch);
    expect(original).toEqual(snapshot);
    expect(patch.body).toEqual({ a: { c: 2 } });

    // The result must not alias the patch fragment.
    const merged = result.body["a"];
    if (merged !== null && typeof merged === "object" && !Array.isArray(merged)) {
      merged["c"] = 99;
    }
    expect(patch.body).toEqual({ a: { c: 2 } });
  });

  it("rewrites url, body and headers and drops removed fields in one pass", () => {
    const patch = compileRequestPatch({
      url: "https://proxy/x",
      body: { temperature: 0.5 },
      headers: { "X-Dbg": null },
      remove_fields: ["unsafe_field"],
    });

    const result = applyRequestPatch(
      { url: "https://api/y", body: { temperature: 0.2, unsafe_field: true }, headers: { "X-Dbg": "1" } },
      patch,
    );

    expect(result).toEqual({ url: "https://proxy/x", body: { temperature: 0.5 }, headers: {} });
    expect(Object.keys(result.body)).toEqual(["temperature"]);
  });

  it("is a no-op for an empty patch", () => {
    const original = request({ model: "m" }, { A: "1" });
    expect(applyRequestPatch(original, compileRequestPatch({}))).toEqual(original);
  });
});
