import { describe, expect, it } from "vitest";

import { canonicalizeSchema, serializeSchema } from "../serialize.js";

describe("canonicalizeSchema", () => {
  it("orders known keywords first and the rest alphabetically", () => {
    const out = canonicalizeSchema({ zeta: 1, properties: {}, alpha: 2, type: "object", title: "T" });
    expect(JSON.stringify(out)).toBe('{"title":"T","type":"object","properties":{},"alpha":2,"zeta":1}');
  });

  it("keeps property names in document order", () => {
    const out = canonicalizeSchema({
      type: "object",
      properties: { zebra: { type: "string" }, apple: { format: "date", type: "string" } },
    });
    expect(JSON.stringify(out)).toBe(
      '{"type":"object","properties":{"zebra":{"type":"string"},"apple":{"type":"string","format":"date"}}}',
    );
  });

  it("recurses into items and composition lists", () => {
    const out = canonicalizeSchema({
      oneOf: [{ minimum: 1, type: "integer" }],
      items: { description: "d", type: "string" },
    });
    expect(JSON.stringify(out)).toBe('{"items":{"type":"string","description":"d"},"oneOf":[{"type":"integer","minimum":1}]}');
  });
});

describe("serializeSchema", () => {
  it("renders canonical YAML lines without a trailing blank line", () => {
    const result = serializeSchema({ properties: { name: { type: "string" } }, type: "object" });
    expect(result).toEqual({ ok: true, value: ["type: object", "properties:", "  name:", "    type: string"] });
  });

  it("is deterministic for identical input", () => {
    const schema = { type: "object", required: ["a", "b"], properties: { a: { type: "integer" }, b: { enum: [1, 2] } } };
    expect(serializeSchema(schema)).toEqual(serializeSchema(structuredClone(schema)));
  });

  it("does not fold long descriptions", () => {
    const description = "word ".repeat(40).trim();
    const result = serializeSchema({ type: "string", description });
    expect(result).toEqual({ ok: true, value: ["type: string", `description: ${description}`] });
  });
});

describe("property names", () => {
  it("writes a property named __proto__ like any other", () => {
    const schema: unknown = JSON.parse('{"properties":{"__proto__":{"type":"string"},"name":{"type":"string"}},"type":"object"}');
    expect(serializeSchema(schema)).toEqual({
      ok: true,
      value: ["type: object", "properties:", "  __proto__:", "    type: string", "  name:", "    type: string"],
    });
  });
});
