/**
 * Split a migration file into executable statements.
 *
 * Line comments are dropped; semicolons inside `$$ ... $$` bodies do not
 * end a statement.
 */
export function splitSqlStatements(sql: string): string[] {
  const withoutComments = sql.replace(/--[^\n]*/g, '');
  const statements: string[] = [];
  let current = '';
  let inDollarQuote = false;

  for (const chunk of withoutComments.split(';')) {
    current += chunk;

    const markers = chunk.match(/\$\$/g) ?? [];
    if (markers.length % 2 === 1) {
      inDollarQuote = !inDollarQuote;
    }

    if (inDollarQuote) {
      current += ';';
      continue;
    }

    const statement = current.trim();
    if (statement !== '') {
      statements.push(statement);
    }
    current = '';
  }

  const rest = current.trim();
  if (rest !== '') {
    statements.push(rest);
  }

  return statements;
}
