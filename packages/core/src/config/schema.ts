/**
 * AJV JSON Schema for the resolved configuration.
 * Plain object schema, validated after defaults, file and env are merged.
 */

export const configSchema = {
  type: 'object' as const,
  properties: {
    db: {
      type: 'object' as const,
      properties: {
        type: { type: 'string' as const, enum: ['postgres', 'sqlite'] },
        host: { type: 'string' as const, minLength: 1 },
        port: { type: 'integer' as const, minimum: 1, maximum: 65535 },
        database: { type: 'string' as const, minLength: 1 },
        user: { type: 'string' as const, minLength: 1 },
        ssl: { type: 'boolean' as const },
      },
      required: ['type', 'host', 'port', 'database', 'user', 'ssl'] as const,
      additionalProperties: false,
    },
    schemaTtlSeconds: { type: 'integer' as const, minimum: 0 },
    scope: { type: 'string' as const, enum: ['admin', 'star', 'both'] },
    model: { type: 'string' as const, minLength: 1 },
    storePath: { type: 'string' as const, minLength: 1 },
    maxRows: { type: 'integer' as const, minimum: 1 },
    statementTimeoutMs: { type: 'integer' as const, minimum: 1 },
  },
  required: ['db', 'schemaTtlSeconds', 'scope', 'model', 'storePath', 'maxRows', 'statementTimeoutMs'] as const,
  additionalProperties: false,
};
