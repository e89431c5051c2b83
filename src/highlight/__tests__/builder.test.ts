import { describe, expect, it } from "vitest";

import { PET_YAML, petDocument } from "../../__tests__/fixtures.js";
import { gutterStyle, palette } from "../../theme.js";
import { buildHighlightedLines, gutterFragment, highlightSchema, lineText } from "../builder.js";

const JSON_REQUEST = { kind: "request", mediaType: "application/json" } as const;

describe("gutterFragment", () => {
  it("pads the 1-based line number to a fixed width", () => {
    expect(gutterFragment(1)).toEqual({ text: " 1   ", style: gutterStyle });
    expect(gutterFragment(42)).toEqual({ text: " 42  ", style: gutterStyle });
    expect(gutterFragment(1234)).toEqual({ text: " 1234 ", style: gutterStyle });
  });
});

describe("buildHighlightedLines", () => {
  it("renders the request schema of GET /pets line by line", () => {
    const document = petDocument();
    const operation = document.paths["/pets"].get ?? null;
    const result = buildHighlightedLines(document, operation, JSON_REQUEST);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.map(lineText)).toEqual([
      " 1   type: object",
      " 2   properties:",
      " 3     name:",
      " 4       type: string",
    ]);
    expect(result.value[0]).toEqual([
      { text: " 1   ", style: { dim: true } },
      { text: "type", style: { fg: palette.yamlKey } },
      { text: ":", style: { fg: palette.yamlPunctuation } },
      { text: " ", style: {} },
      { text: "object", style: { fg: palette.yamlString } },
    ]);
  });

  it("gives identical output when built twice from the same input", () => {
    const document = petDocument();
    const operation = document.paths["/pets"].post ?? null;
    const first = buildHighlightedLines(document, operation, JSON_REQUEST);
    const second = buildHighlightedLines(document, operation, JSON_REQUEST);
    expect(second).toEqual(first);
  });

  it("follows request body and schema references", () => {
    const document = petDocument();
    const result = buildHighlightedLines(document, document.paths["/pets"].post ?? null, JSON_REQUEST);
    expect(result.ok && result.value.map(lineText)).toEqual(
      PET_YAML.map((line, idx) => `${gutterFragment(idx + 1).text}${line}`),
    );
  });

  it("renders the selected response status", () => {
    const document = petDocument();
    const operation = document.paths["/pets"].post ?? null;
    const result = buildHighlightedLines(document, operation, {
      kind: "response",
      status: "default",
      mediaType: "application/json",
    });
    expect(result.ok && result.value.map(lineText)).toEqual([
      " 1   type: object",
      " 2   properties:",
      " 3     message:",
      " 4       type: string",
    ]);
  });

  it("is empty without an operation", () => {
    expect(buildHighlightedLines(petDocument(), null, JSON_REQUEST)).toEqual({ ok: true, value: [] });
  });

  it("is empty when the operation has no body of that media type", () => {
    const document = petDocument();
    expect(buildHighlightedLines(document, document.paths["/pets/{id}"].delete ?? null, JSON_REQUEST)).toEqual({
      ok: true,
      value: [],
    });
    expect(
      buildHighlightedLines(document, document.paths["/pets"].get ?? null, {
        kind: "request",
        mediaType: "text/plain",
      }),
    ).toEqual({ ok: true, value: [] });
  });

  it("reports a dangling reference", () => {
    const document = petDocument();
    const result = buildHighlightedLines(document, document.paths["/broken"].get ?? null, JSON_REQUEST);
    expect(result).toEqual({
      ok: false,
      error: {
        kind: "ReferenceResolutionError",
        message: "reference #/components/schemas/Missing points at a missing component",
        ref: "#/components/schemas/Missing",
      },
    });
  });
});

describe("highlightSchema", () => {
  it("renders multi-line descriptions as block scalars", () => {
    const result = highlightSchema(petDocument(), { type: "string", description: "first\nsecond: line" });
    expect(result.ok && result.value.map(lineText)).toEqual([
      " 1   type: string",
      " 2   description: |-",
      " 3     first",
      " 4     second: line",
    ]);
    expect(result.ok && result.value[3][2]).toEqual({ text: "second: line", style: { fg: palette.yamlString } });
  });
});
