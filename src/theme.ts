import type { TokenKind } from "./highlight/yamlTokens.js";

export type TextStyle = {
  fg?: string;
  dim?: boolean;
  bold?: boolean;
  underline?: boolean;
};

export const palette = {
  bg: "#101215",
  border: "#405266",
  focus: "#7db2d3",
  section: "#7db2d3",
  hint: "#9db3c2",
  ok: "#76d6a8",
  warn: "#f0c56d",
  error: "#ef8d8d",
  methodGet: "#88d3a8",
  methodPost: "#f1c76e",
  methodPut: "#88c6f0",
  methodPatch: "#cf9bf2",
  methodDelete: "#f19393",
  yamlKey: "#268bd2",
  yamlString: "#2aa198",
  yamlNumber: "#d33682",
  yamlConstant: "#cb4b16",
  yamlPunctuation: "#93a1a1",
  yamlComment: "#586e75",
  yamlBlock: "#b58900",
  yamlText: "#839496",
};

export const gutterStyle: TextStyle = { dim: true };

const tokenStyles: Record<TokenKind, TextStyle> = {
  whitespace: {},
  key: { fg: palette.yamlKey },
  punctuation: { fg: palette.yamlPunctuation },
  string: { fg: palette.yamlString },
  number: { fg: palette.yamlNumber },
  constant: { fg: palette.yamlConstant },
  comment: { fg: palette.yamlComment },
  blockIndicator: { fg: palette.yamlBlock },
  text: { fg: palette.yamlText },
};

export function tokenStyle(kind: TokenKind): TextStyle {
  return tokenStyles[kind];
}

export function borderColor(focused: boolean): string {
  return focused ? palette.focus : palette.border;
}

export function methodColor(method: string): string {
  switch (method.toUpperCase()) {
    case "GET":
      return palette.methodGet;
    case "POST":
      return palette.methodPost;
    case "PUT":
      return palette.methodPut;
    case "PATCH":
      return palette.methodPatch;
    case "DELETE":
      return palette.methodDelete;
    default:
      return palette.hint;
  }
}

export function statusColor(status: string): string {
  if (status.startsWith("5")) {
    return palette.error;
  }
  if (status.startsWith("4")) {
    return palette.warn;
  }
  if (status.startsWith("3")) {
    return palette.section;
  }
  if (status.startsWith("2")) {
    return palette.ok;
  }
  return palette.hint;
}
