/**
 * Schema SQL loading and statement splitting.
 *
 * Reads schema.sql beside this module and splits it into individual
 * statements, keeping BEGIN...END blocks (triggers) whole.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

const moduleDir = dirname(fileURLToPath(import.meta.url));

/**
 * Load and parse the schema SQL file into individual statements.
 */
export function loadSchemaStatements(): string[] {
  const schema = readFileSync(join(moduleDir, 'schema.sql'), 'utf-8');
  return splitStatements(schema);
}

/**
 * Split SQL text into individual statements, respecting BEGIN...END blocks.
 */
export function splitStatements(sql: string): string[] {
  const statements: string[] = [];
  let current = '';
  let inTrigger = false;

  for (const line of sql.split('\n')) {
    const trimmed = line.trim();

    // Skip pure comment lines when starting a new statement
    if (!current && trimmed.startsWith('--')) continue;

    current += (current ? '\n' : '') + line;

    if (/\bBEGIN\s*$/i.test(trimmed)) {
      inTrigger = true;
    }

    if (inTrigger && /^END\s*;/i.test(trimmed)) {
      inTrigger = false;
      statements.push(current.trim().replace(/;$/, ''));
      current = '';
      continue;
    }

    if (!inTrigger && trimmed.endsWith(';')) {
      const stmt = current.trim().replace(/;$/, '').trim();
      if (stmt) statements.push(stmt);
      current = '';
    }
  }

  if (current.trim()) {
    const stmt = current.trim().replace(/;$/, '').trim();
    if (stmt) statements.push(stmt);
  }

  return statements;
}
