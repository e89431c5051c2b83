export const HTTP_METHODS = ["get", "put", "post", "delete", "options", "head", "patch", "trace"] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type Reference = { $ref: string };

export type SchemaObject = { [keyword: string]: unknown };

export type MediaTypeObject = {
  schema?: SchemaObject | Reference;
  example?: unknown;
};

export type RequestBodyObject = {
  description?: string;
  required?: boolean;
  content: Record<string, MediaTypeObject>;
};

export type ResponseObject = {
  description?: string;
  content?: Record<string, MediaTypeObject>;
};

export type OperationObject = {
  operationId?: string;
  summary?: string;
  description?: string;
  tags?: string[];
  requestBody?: RequestBodyObject | Reference;
  responses?: Record<string, ResponseObject | Reference>;
};

export type PathItemObject = Partial<Record<HttpMethod, OperationObject>>;

export type SpecDocument = {
  openapi: string;
  info: { title: string; version: string; description?: string };
  paths: Record<string, PathItemObject>;
  components?: {
    schemas?: Record<string, SchemaObject | Reference>;
    requestBodies?: Record<string, RequestBodyObject | Reference>;
    responses?: Record<string, ResponseObject | Reference>;
  };
};

export type OperationEntry = {
  path: string;
  method: HttpMethod;
  operation: OperationObject;
};

export function isReference(value: unknown): value is Reference {
  return typeof value === "object" && value !== null && "$ref" in value && typeof value.$ref === "string";
}

export function listOperations(document: SpecDocument): OperationEntry[] {
  const entries: OperationEntry[] = [];
  for (const [path, item] of Object.entries(document.paths)) {
    for (const method of HTTP_METHODS) {
      const operation = item[method];
      if (operation) {
        entries.push({ path, method, operation });
      }
    }
  }
  return entries;
}
