/**
 * Diagnostic helpers
 *
 * Handlers report failures to the framework as diagnostics rather than
 * throwing, so a plan can surface several problems at once.
 */

import type { Diagnostic, Diagnostics } from "../types"
import { errorMessage } from "../errors"

export function diagErrorf(summary: string, detail?: string): Diagnostics {
  const diagnostic: Diagnostic = { severity: "error", summary }
  if (detail !== undefined) {
    diagnostic.detail = detail
  }
  return [diagnostic]
}

export function diagFromError(error: unknown): Diagnostics {
  return diagErrorf(errorMessage(error))
}
