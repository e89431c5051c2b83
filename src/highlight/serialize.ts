import { stringify } from "yaml";

import { errorMessage, fail, ok, type Result } from "../errors.js";
import { isPlainObject, setEntry } from "../spec/resolve.js";

const KEYWORD_ORDER = [
  "$ref",
  "title",
  "type",
  "format",
  "description",
  "enum",
  "const",
  "default",
  "nullable",
  "readOnly",
  "writeOnly",
  "deprecated",
  "required",
  "properties",
  "additionalProperties",
  "items",
  "allOf",
  "oneOf",
  "anyOf",
  "not",
  "discriminator",
  "minimum",
  "exclusiveMinimum",
  "maximum",
  "exclusiveMaximum",
  "multipleOf",
  "minLength",
  "maxLength",
  "pattern",
  "minItems",
  "maxItems",
  "uniqueItems",
  "minProperties",
  "maxProperties",
  "example",
  "examples",
];

const KEYWORD_RANK = new Map(KEYWORD_ORDER.map((keyword, index) => [keyword, index]));

// Maps from names to subschemas. Names keep their object order.
const SCHEMA_MAPS = new Set(["properties", "patternProperties", "definitions", "$defs"]);
const SCHEMA_VALUES = new Set(["additionalProperties", "items", "not"]);
const SCHEMA_LISTS = new Set(["allOf", "oneOf", "anyOf"]);

function compareKeywords(a: string, b: string): number {
  const rankA = KEYWORD_RANK.get(a) ?? KEYWORD_ORDER.length;
  const rankB = KEYWORD_RANK.get(b) ?? KEYWORD_ORDER.length;
  if (rankA !== rankB) {
    return rankA - rankB;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export function canonicalizeSchema(schema: unknown): unknown {
  if (!isPlainObject(schema)) {
    return schema;
  }

  const out: { [key: string]: unknown } = {};
  for (const key of Object.keys(schema).sort(compareKeywords)) {
    const value = schema[key];
    if (SCHEMA_MAPS.has(key) && isPlainObject(value)) {
      const named: { [key: string]: unknown } = {};
      for (const [name, subschema] of Object.entries(value)) {
        setEntry(named, name, canonicalizeSchema(subschema));
      }
      setEntry(out, key, named);
    } else if (SCHEMA_VALUES.has(key)) {
      setEntry(out, key, canonicalizeSchema(value));
    } else if (SCHEMA_LISTS.has(key) && Array.isArray(value)) {
      setEntry(out, key, value.map((item) => canonicalizeSchema(item)));
    } else {
      setEntry(out, key, value);
    }
  }
  return out;
}

export function serializeSchema(schema: unknown): Result<string[]> {
  let text: string;
  try {
    text = stringify(canonicalizeSchema(schema), { lineWidth: 0, aliasDuplicateObjects: false });
  } catch (err) {
    return fail("SerializationError", errorMessage(err));
  }

  const lines = text.split("\n");
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return ok(lines);
}
