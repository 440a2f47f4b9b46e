/**
 * Note sheet loader
 * A sheet is a list of note indices separated by single spaces, e.g. "0 4 7 12"
 */

import { readFile } from 'node:fs/promises'
import path from 'node:path'
import type { SheetLoadResult, SheetParseResult } from '@taptiles/shared'

const INTEGER_TOKEN = /^[+-]?\d+$/

/**
 * Decode raw sheet bytes as UTF-8 (a leading BOM is dropped)
 */
export function decodeSheet(data: Uint8Array): string {
  return new TextDecoder('utf-8').decode(data)
}

/**
 * Split on literal single spaces. Trailing empty tokens are dropped;
 * leading or doubled spaces leave empty tokens that fail validation.
 */
function splitTokens(text: string): string[] {
  const tokens = text.split(' ')
  while (tokens.length > 0 && tokens[tokens.length - 1] === '') {
    tokens.pop()
  }
  return tokens
}

/**
 * Parse and validate sheet text. Every token must be an integer in [0, noteCount);
 * the first bad token fails the whole sheet.
 */
export function parseSheet(text: string, noteCount: number): SheetParseResult {
  const tokens = splitTokens(text)
  if (tokens.length === 0) {
    return {
      ok: false,
      error: { kind: 'empty', message: 'Sheet contains no notes' },
    }
  }

  const notes: number[] = []
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i]

    if (!INTEGER_TOKEN.test(token)) {
      return {
        ok: false,
        error: {
          kind: 'invalid-token',
          message: `Token ${i} is not an integer: ${JSON.stringify(token)}`,
          token,
          position: i,
        },
      }
    }

    const value = Number(token)
    if (value < 0 || value >= noteCount) {
      return {
        ok: false,
        error: {
          kind: 'out-of-range',
          message: `Token ${i} (${token}) is outside [0, ${noteCount})`,
          token,
          position: i,
        },
      }
    }

    // Normalizes "-0" and "+3"
    notes.push(value + 0)
  }

  return { ok: true, notes }
}

/**
 * Load a sheet from raw file content
 * @param data - File bytes
 * @param fileName - Display name kept on success
 * @param noteCount - Number of playable notes
 */
export function loadSheet(
  data: Uint8Array,
  fileName: string,
  noteCount: number
): SheetLoadResult {
  const result = parseSheet(decodeSheet(data), noteCount)
  if (!result.ok) return result

  return {
    ok: true,
    notes: result.notes,
    name: fileName,
  }
}

/**
 * Load a sheet from disk. The base name is used for display.
 * An unreadable file is reported as a failed load.
 */
export async function loadSheetFile(
  filePath: string,
  noteCount: number
): Promise<SheetLoadResult> {
  let data: Uint8Array
  try {
    data = await readFile(filePath)
  } catch (error) {
    return {
      ok: false,
      error: {
        kind: 'missing-file',
        message: `Failed to read sheet file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      },
    }
  }
  return loadSheet(data, path.basename(filePath), noteCount)
}
