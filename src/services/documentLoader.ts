import { readFileSync } from "node:fs";

import { parse } from "yaml";
import { z } from "zod";

import { errorMessage, fail, ok, type Result } from "../errors.js";
import type { SpecDocument } from "../types.js";

const referenceSchema = z.object({ $ref: z.string() }).passthrough();

const schemaObject = z.record(z.unknown());

const mediaTypeSchema = z
  .object({
    schema: schemaObject.optional(),
    example: z.unknown().optional(),
  })
  .passthrough();

const requestBodySchema = z
  .object({
    description: z.string().optional(),
    required: z.boolean().optional(),
    content: z.record(mediaTypeSchema).default({}),
  })
  .passthrough();

const responseSchema = z
  .object({
    description: z.string().optional(),
    content: z.record(mediaTypeSchema).optional(),
  })
  .passthrough();

const operationSchema = z
  .object({
    operationId: z.string().optional(),
    summary: z.string().optional(),
    description: z.string().optional(),
    tags: z.array(z.string()).optional(),
    requestBody: z.union([referenceSchema, requestBodySchema]).optional(),
    responses: z.record(z.union([referenceSchema, responseSchema])).optional(),
  })
  .passthrough();

const pathItemSchema = z
  .object({
    get: operationSchema.optional(),
    put: operationSchema.optional(),
    post: operationSchema.optional(),
    delete: operationSchema.optional(),
    options: operationSchema.optional(),
    head: operationSchema.optional(),
    patch: operationSchema.optional(),
    trace: operationSchema.optional(),
  })
  .passthrough();

const documentSchema = z
  .object({
    openapi: z.string().regex(/^3\./, "only OpenAPI 3.x documents are supported"),
    info: z
      .object({
        title: z.string(),
        version: z.string(),
        description: z.string().optional(),
      })
      .passthrough(),
    paths: z.record(pathItemSchema).default({}),
    components: z
      .object({
        schemas: z.record(z.union([referenceSchema, schemaObject])).optional(),
        requestBodies: z.record(z.union([referenceSchema, requestBodySchema])).optional(),
        responses: z.record(z.union([referenceSchema, responseSchema])).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export function parseDocument(text: string, source: string): Result<SpecDocument> {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (err) {
    return fail("DocumentLoadError", `${source}: ${errorMessage(err)}`);
  }

  const parsed = documentSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join(".") : "document";
    return fail("DocumentLoadError", `${source}: ${where}: ${issue.message}`);
  }

  const document: SpecDocument = parsed.data;
  return ok(document);
}

export function loadDocument(path: string): Result<SpecDocument> {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    return fail("DocumentLoadError", errorMessage(err));
  }
  return parseDocument(text, path);
}
