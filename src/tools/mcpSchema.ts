import { toJSONSchema, type z } from 'zod';

/**
 * JSON Schema for `tools/list`; MCP requires a top-level object type.
 * Fields with a default are optional for the caller.
 */
export function zodToMcpInputSchema(schema: z.ZodType): Record<string, unknown> {
  const { $schema: _schema, $defs: _defs, ...rest } = toJSONSchema(schema, {
    target: 'draft-07',
    io: 'input',
    reused: 'inline',
    unrepresentable: 'any',
  });
  const normalized: Record<string, unknown> = { ...rest };

  const type = normalized.type;
  if (type === undefined) {
    normalized.type = 'object';
    return normalized;
  }
  if (type !== 'object') {
    throw new Error(`Invalid MCP inputSchema: expected top-level type "object", got ${JSON.stringify(type)}`);
  }

  return normalized;
}
