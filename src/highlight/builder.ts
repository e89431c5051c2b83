import { ok, type Result } from "../errors.js";
import { mediaTypeSchema, requestBodyContent, responseContent } from "../spec/content.js";
import { resolveSchema } from "../spec/resolve.js";
import { gutterStyle, tokenStyle, type TextStyle } from "../theme.js";
import type { OperationObject, SpecDocument } from "../types.js";
import { serializeSchema } from "./serialize.js";
import { tokenizeYaml } from "./yamlTokens.js";

export type StyledFragment = { text: string; style: TextStyle };

export type HighlightedLine = StyledFragment[];

export type SchemaSource =
  | { kind: "request"; mediaType: string }
  | { kind: "response"; status: string; mediaType: string };

export function gutterFragment(lineNumber: number): StyledFragment {
  return { text: ` ${String(lineNumber).padEnd(3, " ")} `, style: gutterStyle };
}

export function highlightSchema(document: SpecDocument, schema: unknown): Result<HighlightedLine[]> {
  const resolved = resolveSchema(document, schema);
  if (!resolved.ok) {
    return resolved;
  }

  const text = serializeSchema(resolved.value);
  if (!text.ok) {
    return text;
  }

  const tokens = tokenizeYaml(text.value);
  if (!tokens.ok) {
    return tokens;
  }

  return ok(
    tokens.value.map((lineTokens, idx) => [
      gutterFragment(idx + 1),
      ...lineTokens.map((token) => ({ text: token.text, style: tokenStyle(token.kind) })),
    ]),
  );
}

export function buildHighlightedLines(
  document: SpecDocument,
  operation: OperationObject | null,
  source: SchemaSource,
): Result<HighlightedLine[]> {
  if (!operation) {
    return ok([]);
  }

  const content =
    source.kind === "request"
      ? requestBodyContent(document, operation)
      : responseContent(document, operation, source.status);
  if (!content.ok) {
    return content;
  }

  const schema = content.value ? mediaTypeSchema(content.value, source.mediaType) : undefined;
  if (schema === undefined) {
    return ok([]);
  }
  return highlightSchema(document, schema);
}

export function lineText(line: HighlightedLine): string {
  return line.map((fragment) => fragment.text).join("");
}
