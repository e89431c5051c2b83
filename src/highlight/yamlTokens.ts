import { fail, ok, type Result } from "../errors.js";

export type TokenKind =
  | "whitespace"
  | "key"
  | "punctuation"
  | "string"
  | "number"
  | "constant"
  | "comment"
  | "blockIndicator"
  | "text";

export type YamlToken = { kind: TokenKind; text: string };

type LexerState = {
  // indentation of the key or dash that opened a block scalar, null outside one
  blockParent: number | null;
};

const KEY_RE = /^("(?:\\.|[^"\\])*"|'(?:''|[^'])*'|[^\s#'"\-[\]{}][^#]*?|-[^\s#][^#]*?)(:)(?=\s|$)/;
const DOUBLE_QUOTED_RE = /^"(?:\\.|[^"\\])*"/;
const SINGLE_QUOTED_RE = /^'(?:''|[^'])*'/;
const BLOCK_INDICATOR_RE = /^[|>][-+]?\d*$/;
const NUMBER_RE = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?$|^[-+]?\.(?:inf|Inf|INF)$|^\.(?:nan|NaN|NAN)$/;
const CONSTANT_RE = /^(?:true|True|TRUE|false|False|FALSE|null|Null|NULL|~)$/;
const FLOW_RE = /"(?:\\.|[^"\\])*"|'(?:''|[^'])*'|[[\]{},:]|[^\s[\]{},:]+/g;

function scalarKind(text: string): TokenKind {
  if (NUMBER_RE.test(text)) {
    return "number";
  }
  if (CONSTANT_RE.test(text)) {
    return "constant";
  }
  return "string";
}

function pushWhitespace(tokens: YamlToken[], rest: string): string {
  const match = /^\s+/.exec(rest);
  if (!match) {
    return rest;
  }
  tokens.push({ kind: "whitespace", text: match[0] });
  return rest.slice(match[0].length);
}

function flowTokens(tokens: YamlToken[], text: string): void {
  let cursor = 0;
  for (const match of text.matchAll(FLOW_RE)) {
    const start = match.index ?? 0;
    if (start > cursor) {
      tokens.push({ kind: "whitespace", text: text.slice(cursor, start) });
    }
    const t = match[0];
    if (/^[[\]{},:]$/.test(t)) {
      tokens.push({ kind: "punctuation", text: t });
    } else if (t.startsWith('"') || t.startsWith("'")) {
      tokens.push({ kind: "string", text: t });
    } else {
      tokens.push({ kind: scalarKind(t), text: t });
    }
    cursor = start + t.length;
  }
  if (cursor < text.length) {
    tokens.push({ kind: "whitespace", text: text.slice(cursor) });
  }
}

function valueTokens(tokens: YamlToken[], value: string, parent: number, state: LexerState, lineNumber: number): Result<void> {
  let rest = pushWhitespace(tokens, value);
  if (rest.length === 0) {
    return ok(undefined);
  }

  if (rest.startsWith("#")) {
    tokens.push({ kind: "comment", text: rest });
    return ok(undefined);
  }

  if (rest.startsWith('"') || rest.startsWith("'")) {
    const match = (rest.startsWith('"') ? DOUBLE_QUOTED_RE : SINGLE_QUOTED_RE).exec(rest);
    if (!match) {
      return fail("HighlightError", `unterminated quoted scalar on line ${lineNumber}`);
    }
    tokens.push({ kind: "string", text: match[0] });
    rest = pushWhitespace(tokens, rest.slice(match[0].length));
    if (rest.length > 0) {
      tokens.push({ kind: rest.startsWith("#") ? "comment" : "text", text: rest });
    }
    return ok(undefined);
  }

  if (rest.startsWith("[") || rest.startsWith("{")) {
    flowTokens(tokens, rest);
    return ok(undefined);
  }

  const commentAt = rest.search(/\s#/);
  const scalar = commentAt >= 0 ? rest.slice(0, commentAt) : rest;
  const trailing = commentAt >= 0 ? rest.slice(commentAt) : "";

  if (BLOCK_INDICATOR_RE.test(scalar)) {
    tokens.push({ kind: "blockIndicator", text: scalar });
    state.blockParent = parent;
  } else {
    tokens.push({ kind: scalarKind(scalar), text: scalar });
  }

  if (trailing.length > 0) {
    const afterSpace = pushWhitespace(tokens, trailing);
    tokens.push({ kind: "comment", text: afterSpace });
  }
  return ok(undefined);
}

function lineTokens(line: string, state: LexerState, lineNumber: number): Result<YamlToken[]> {
  const tokens: YamlToken[] = [];
  const indentMatch = /^[ \t]*/.exec(line);
  const leading = indentMatch ? indentMatch[0] : "";

  if (state.blockParent !== null) {
    if (line.trim().length === 0 || leading.replace(/\t/g, " ").length > state.blockParent) {
      if (leading.length > 0) {
        tokens.push({ kind: "whitespace", text: leading });
      }
      if (line.length > leading.length) {
        tokens.push({ kind: "string", text: line.slice(leading.length) });
      }
      return ok(tokens);
    }
    state.blockParent = null;
  }

  if (leading.includes("\t")) {
    return fail("HighlightError", `tab character in indentation on line ${lineNumber}`);
  }
  if (leading.length > 0) {
    tokens.push({ kind: "whitespace", text: leading });
  }

  let column = leading.length;
  let rest = line.slice(leading.length);

  while (rest === "-" || rest.startsWith("- ")) {
    tokens.push({ kind: "punctuation", text: "-" });
    const afterDash = rest.slice(1);
    const parent = column;
    rest = pushWhitespace(tokens, afterDash);
    column += 1 + (afterDash.length - rest.length);
    if (rest.length === 0) {
      return ok(tokens);
    }
    if (rest === "-" || rest.startsWith("- ") || KEY_RE.test(rest)) {
      continue;
    }
    const value = valueTokens(tokens, rest, parent, state, lineNumber);
    return value.ok ? ok(tokens) : value;
  }

  if (rest.startsWith("#")) {
    tokens.push({ kind: "comment", text: rest });
    return ok(tokens);
  }

  const key = KEY_RE.exec(rest);
  if (key) {
    tokens.push({ kind: "key", text: key[1] });
    tokens.push({ kind: "punctuation", text: key[2] });
    const value = valueTokens(tokens, rest.slice(key[0].length), column, state, lineNumber);
    return value.ok ? ok(tokens) : value;
  }

  const value = valueTokens(tokens, rest, column, state, lineNumber);
  return value.ok ? ok(tokens) : value;
}

export function tokenizeYaml(lines: readonly string[]): Result<YamlToken[][]> {
  const state: LexerState = { blockParent: null };
  const out: YamlToken[][] = [];
  for (let i = 0; i < lines.length; i += 1) {
    const tokens = lineTokens(lines[i], state, i + 1);
    if (!tokens.ok) {
      return tokens;
    }
    out.push(tokens.value);
  }
  return ok(out);
}
