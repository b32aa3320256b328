import type { ToolDefinition } from '@toolgate/protocol';

export const SQL_TOOLS: readonly ToolDefinition[] = [
  {
    name: 'read_query',
    description: 'Run a SELECT query and return the matching rows',
    parameters: {
      type: 'object',
      properties: {
        sql: { type: 'string', description: 'SELECT statement to run' },
        params: { type: 'array', description: 'Values for ? placeholders' },
      },
      required: ['sql'],
    },
  },
  {
    name: 'write_query',
    description: 'Run an INSERT, UPDATE or DELETE statement (rejected on read-only connections)',
    parameters: {
      type: 'object',
      properties: {
        sql: { type: 'string', description: 'Statement to run' },
        params: { type: 'array', description: 'Values for ? placeholders' },
      },
      required: ['sql'],
    },
  },
  {
    name: 'list_tables',
    description: 'List the tables in the database',
    parameters: { type: 'object', properties: {} },
  },
  {
    name: 'describe_table',
    description: 'Show the columns of a table',
    parameters: {
      type: 'object',
      properties: {
        table: { type: 'string', description: 'Table name' },
      },
      required: ['table'],
    },
  },
];
