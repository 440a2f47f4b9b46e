/**
 * Note sheet types
 */

/**
 * Why a sheet could not be loaded
 */
export type SheetErrorKind =
  | 'empty'
  | 'invalid-token'
  | 'out-of-range'
  | 'missing-file'
  | 'bad-archive'

export interface SheetError {
  kind: SheetErrorKind
  message: string
  /** Offending token, if any */
  token?: string
  /** Zero-based token position, if any */
  position?: number
}

/**
 * Outcome of parsing sheet text
 */
export type SheetParseResult =
  | { ok: true; notes: number[] }
  | { ok: false; error: SheetError }

/**
 * Outcome of loading a sheet from a file or pack
 */
export type SheetLoadResult =
  | { ok: true; notes: number[]; name: string }
  | { ok: false; error: SheetError }
