import { Diagnostic } from './types.js';

export type LineWriter = (line: string) => void;

/**
 * Format a diagnostic the way the run log shows it
 */
export function formatDiagnostic(entity: string, diagnostic: Diagnostic): string {
  return `${entity} - ${diagnostic.severity}: ${diagnostic.message}`;
}

/**
 * Write an entity's diagnostics to stderr. DBG lines only appear in debug mode.
 */
export function reportDiagnostics(
  entity: string,
  diagnostics: Diagnostic[],
  debug = false,
  write: LineWriter = line => console.error(line)
): void {
  for (const diagnostic of diagnostics) {
    if (diagnostic.severity === 'DBG' && !debug) continue;
    write(formatDiagnostic(entity, diagnostic));
  }
}
