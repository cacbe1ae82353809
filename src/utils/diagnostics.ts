/**
 * Conditions the engine reports instead of throwing.
 *
 * SOURCE_UNAVAILABLE   backing store unreachable; result is empty
 * MALFORMED_ROW        unparsable field coerced to zero / null
 * UNCLASSIFIED_ENTITY  no gazetteer match; defaulted to Other
 * STORE_WRITE_FAILURE  target or exclusion write rejected; nothing changed
 */
export type DiagnosticCode =
  | 'SOURCE_UNAVAILABLE'
  | 'MALFORMED_ROW'
  | 'UNCLASSIFIED_ENTITY'
  | 'STORE_WRITE_FAILURE';

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  context?: Record<string, string | number | null>;
}

/**
 * Best-effort result plus whatever went wrong producing it
 */
export interface WithDiagnostics<T> {
  data: T;
  diagnostics: Diagnostic[];
}

export type StoreWriteResult = { success: true } | { success: false; error: string };

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}
