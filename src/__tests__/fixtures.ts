import type { KeyEvent } from "../tui/events.js";
import type { SpecDocument } from "../types.js";

/**
 * Operations, in list order:
 * 0 GET /pets, 1 POST /pets, 2 DELETE /pets/{id}, 3 GET /broken
 */
export function petDocument(): SpecDocument {
  return {
    openapi: "3.0.3",
    info: { title: "Pets", version: "1.0.0" },
    paths: {
      "/pets": {
        get: {
          summary: "List pets",
          requestBody: {
            content: {
              "application/json": {
                schema: { type: "object", properties: { name: { type: "string" } } },
              },
            },
          },
          responses: {
            "200": {
              description: "ok",
              content: {
                "application/json": {
                  schema: { type: "array", items: { $ref: "#/components/schemas/Pet" } },
                },
              },
            },
          },
        },
        post: {
          summary: "Create pet",
          requestBody: { $ref: "#/components/requestBodies/NewPet" },
          responses: {
            default: {
              description: "error",
              content: { "application/json": { schema: { $ref: "#/components/schemas/Error" } } },
            },
            "201": { $ref: "#/components/responses/Created" },
          },
        },
      },
      "/pets/{id}": {
        delete: {
          summary: "Remove pet",
          responses: { "204": { description: "gone" } },
        },
      },
      "/broken": {
        get: {
          summary: "Dangling reference",
          requestBody: {
            content: { "application/json": { schema: { $ref: "#/components/schemas/Missing" } } },
          },
        },
      },
    },
    components: {
      schemas: {
        Pet: {
          properties: { id: { format: "int64", type: "integer" }, name: { type: "string" } },
          required: ["id"],
          type: "object",
        },
        Error: { type: "object", properties: { message: { type: "string" } } },
        Node: {
          type: "object",
          properties: { children: { type: "array", items: { $ref: "#/components/schemas/Node" } } },
        },
      },
      requestBodies: {
        NewPet: {
          content: {
            "application/json": { schema: { $ref: "#/components/schemas/Pet" } },
            "application/xml": { schema: { type: "string" } },
          },
        },
      },
      responses: {
        Created: {
          description: "created",
          content: { "application/json": { schema: { $ref: "#/components/schemas/Pet" } } },
        },
      },
    },
  };
}

export const PET_YAML = [
  "type: object",
  "required:",
  "  - id",
  "properties:",
  "  id:",
  "    type: integer",
  "    format: int64",
  "  name:",
  "    type: string",
];

export function key(name: string, extra: Partial<KeyEvent> = {}): KeyEvent {
  return {
    name,
    sequence: name.length === 1 ? name : "",
    ctrl: false,
    meta: false,
    shift: false,
    ...extra,
  };
}
