import type { ScriptError } from './index.js';

export type DiagnosticSeverity = 'error' | 'warning';

export interface Diagnostic {
  severity: DiagnosticSeverity;
  error: ScriptError;
}

/**
 * Errors and warnings of one parse call.
 *
 * Owned by a single parser instance and cleared at the start of every
 * parse entry point.
 */
export class DiagnosticLog {
  private entries: Diagnostic[] = [];

  error(error: ScriptError): void {
    this.entries.push({ severity: 'error', error });
  }

  warning(error: ScriptError): void {
    this.entries.push({ severity: 'warning', error });
  }

  clear(): void {
    this.entries = [];
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.entries;
  }

  get errors(): string[] {
    return this.messages('error');
  }

  get warnings(): string[] {
    return this.messages('warning');
  }

  get errorCount(): number {
    return this.count('error');
  }

  get warningCount(): number {
    return this.count('warning');
  }

  private messages(severity: DiagnosticSeverity): string[] {
    return this.entries.filter((d) => d.severity === severity).map((d) => d.error.message);
  }

  private count(severity: DiagnosticSeverity): number {
    return this.entries.reduce((n, d) => (d.severity === severity ? n + 1 : n), 0);
  }
}
