/**
 * JSON schema of the route file
 */

const declaration = {
  oneOf: [
    { type: "string", minLength: 1 },
    {
      type: "object",
      required: ["name"],
      additionalProperties: false,
      properties: {
        name: { type: "string", minLength: 1 },
        args: {
          type: "object",
          additionalProperties: { type: ["string", "number", "boolean", "null"] },
        },
      },
    },
  ],
} as const;

export const ROUTE_FILE_SCHEMA = {
  $schema: "http://json-schema.org/draft-07/schema#",
  type: "object",
  required: ["routes"],
  additionalProperties: false,
  properties: {
    routes: {
      type: "array",
      items: {
        type: "object",
        required: ["id", "uri"],
        additionalProperties: false,
        properties: {
          id: { type: "string", minLength: 1 },
          uri: { type: "string", minLength: 1 },
          order: { type: "integer" },
          predicates: { type: "array", items: declaration },
          filters: { type: "array", items: declaration },
          metadata: { type: "object" },
        },
      },
    },
    shortcuts: {
      type: "array",
      items: {
        type: "object",
        required: ["name", "kind", "mode", "fieldOrder"],
        additionalProperties: false,
        properties: {
          name: { type: "string", minLength: 1 },
          kind: { enum: ["predicate", "filter"] },
          mode: { enum: ["DEFAULT", "GATHER_LIST", "GATHER_LIST_TAIL_FLAG"] },
          fieldOrder: { type: "array", items: { type: "string", minLength: 1 } },
          fieldPrefix: { type: "string" },
          fieldTypes: {
            type: "object",
            additionalProperties: { enum: ["string", "boolean", "number", "list"] },
          },
        },
      },
    },
    services: { type: "object" },
    options: {
      type: "object",
      additionalProperties: false,
      properties: {
        coerce: { type: "boolean" },
        logLevel: { enum: ["error", "warn", "info", "debug"] },
      },
    },
  },
} as const;
