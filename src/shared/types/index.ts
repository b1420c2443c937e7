/**
 * Shared Types
 */

export type Severity = "error" | "warning"

export interface Diagnostic {
  severity: Severity
  summary: string
  detail?: string
}

export type Diagnostics = Diagnostic[]
