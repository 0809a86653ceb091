const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

export function normalizeTableFqn(fqn: string): { schema: string; table: string; identifier: string } {
  const trimmed = fqn.trim();
  const parts = trimmed.split('.');
  if (parts.length !== 2) {
    throw new Error(`Invalid table FQN: ${fqn}. Expected schema.table.`);
  }
  const [schema, table] = parts;
  if (!IDENTIFIER.test(schema) || !IDENTIFIER.test(table)) {
    throw new Error(`Invalid table FQN: ${fqn}. Schema and table must be lowercase identifiers.`);
  }
  return { schema, table, identifier: `${schema}.${table}` };
}

export const QA_SCHEMA = 'qa';

export function qaTable(table: string): string {
  return normalizeTableFqn(`${QA_SCHEMA}.${table}`).identifier;
}
