import type { SourceSpan } from '../frontend/ast.js';
import type { Diagnostic, DiagnosticId } from './types.js';

/**
 * Push an error diagnostic located at the start of `span`.
 */
export function diagAt(
  diagnostics: Diagnostic[] | undefined,
  id: DiagnosticId,
  span: SourceSpan,
  message: string,
): void {
  diagnostics?.push({
    id,
    severity: 'error',
    message,
    file: span.file,
    line: span.start.line,
    column: span.start.column,
  });
}

export function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
