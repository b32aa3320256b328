/**
 * SQL statement inspection
 */

// Leading whitespace, `-- ` / `#` line comments and plain `/* */` block comments.
// Executable (`/*!`) and hint (`/*+`) comments are left in place, so a statement
// starting with one is never a SELECT.
const LEADING_NOISE = /^(?:\s+|--\s[^\n]*(?:\n|$)|--$|#[^\n]*(?:\n|$)|\/\*(?![!+])[\s\S]*?\*\/)*/;

/** MySQL unquoted identifier, at most 64 characters */
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_$]{0,63}$/;

/**
 * True if the statement's first keyword is SELECT (case-insensitive)
 */
export function isSelectStatement(sql: string): boolean {
  const body = sql.replace(LEADING_NOISE, '');
  return /^select\b/i.test(body);
}

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}
