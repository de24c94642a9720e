/**
 * Diagnostics
 *
 * Structured warnings returned next to the generated file map. Nothing in the
 * generation path logs or throws for a recoverable schema problem; it records
 * a diagnostic here and carries on.
 */

export type DiagnosticCode =
  | 'dangling-foreign-key'
  | 'junction-arity'
  | 'unmatched-junction'
  | 'unmapped-type'
  | 'unsupported-feature'
  | 'path-collision'

export type DiagnosticSeverity = 'warning' | 'info'

export interface Diagnostic {
  code: DiagnosticCode
  severity: DiagnosticSeverity
  message: string
  table?: string
  column?: string
  path?: string
}

export type DiagnosticLocation = Pick<Diagnostic, 'table' | 'column' | 'path'>

/**
 * Append-only sink shared by the stages of one generation run
 */
export class DiagnosticCollector {
  private readonly entries: Diagnostic[] = []
  private readonly seen = new Set<string>()

  warn(code: DiagnosticCode, message: string, location: DiagnosticLocation = {}): void {
    this.add({ code, severity: 'warning', message, ...location })
  }

  info(code: DiagnosticCode, message: string, location: DiagnosticLocation = {}): void {
    this.add({ code, severity: 'info', message, ...location })
  }

  add(diagnostic: Diagnostic): void {
    // Stages may report the same problem; keep the first
    const key = `${diagnostic.code}|${diagnostic.table ?? ''}|${diagnostic.column ?? ''}|${diagnostic.path ?? ''}|${diagnostic.message}`
    if (this.seen.has(key)) return
    this.seen.add(key)
    this.entries.push(diagnostic)
  }

  addAll(diagnostics: Iterable<Diagnostic>): void {
    for (const diagnostic of diagnostics) this.add(diagnostic)
  }

  list(): Diagnostic[] {
    return [...this.entries]
  }

  get size(): number {
    return this.entries.length
  }
}

export function hasWarnings(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((diagnostic) => diagnostic.severity === 'warning')
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const where = [diagnostic.table, diagnostic.column].filter(Boolean).join('.')
  const location = diagnostic.path ?? where
  return location ? `[${diagnostic.code}] ${location}: ${diagnostic.message}` : `[${diagnostic.code}] ${diagnostic.message}`
}
