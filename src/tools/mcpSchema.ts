import { z, toJSONSchema } from 'zod';

/** MCP wants a plain draft-07 object schema without $schema or $defs. */
export function zodToMcpInputSchema(schema: z.ZodType): Record<string, unknown> {
  const normalized: Record<string, unknown> = {
    ...toJSONSchema(schema, {
      target: 'draft-07',
      io: 'input',
      reused: 'inline',
      unrepresentable: 'any',
    }),
  };
  delete normalized.$schema;
  delete normalized.$defs;

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
