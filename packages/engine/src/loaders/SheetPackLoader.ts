/**
 * Sheet pack loader
 * Loads sheet packs (ZIP files containing a sheet and an optional info.yml)
 */

import JSZip from 'jszip'
import type { SheetLoadResult } from '@taptiles/shared'
import { loadSheet } from './SheetLoader.js'

/**
 * Sheet pack metadata from info.yml. Other keys are ignored.
 */
export interface SheetPackInfo {
  sheet?: string // Sheet filename (default: sheet.txt)
  name?: string // Display name (default: archive filename)
}

const DEFAULT_SHEET_FILE = 'sheet.txt'

/**
 * Strip a trailing # comment outside of quotes
 */
function stripInlineComment(s: string): string {
  let inSq = false
  let inDq = false
  const buf: string[] = []

  for (const ch of s) {
    if (ch === "'" && !inDq) {
      inSq = !inSq
    } else if (ch === '"' && !inSq) {
      inDq = !inDq
    }

    if (!inSq && !inDq && ch === '#') {
      break
    }
    buf.push(ch)
  }

  return buf.join('').trimEnd()
}

/**
 * Parse info.yml (flat "key: value" pairs, only sheet and name are read)
 */
export function parseInfoYml(text: string): SheetPackInfo {
  const info: SheetPackInfo = {}

  for (const raw of text.split('\n')) {
    const line = stripInlineComment(raw).trim()

    if (!line || line.startsWith('#')) continue
    if (!line.includes(':')) continue

    const colonIdx = line.indexOf(':')
    const k = line.substring(0, colonIdx).trim()
    const v = line.substring(colonIdx + 1).trim().replace(/^["']|["']$/g, '')

    if (k === 'sheet') {
      info.sheet = v
    } else if (k === 'name') {
      info.name = v
    }
  }

  return info
}

function badArchive(fileName: string, error: unknown): SheetLoadResult {
  return {
    ok: false,
    error: {
      kind: 'bad-archive',
      message: `Failed to open sheet pack ${fileName}: ${error instanceof Error ? error.message : String(error)}`,
    },
  }
}

/**
 * Load a sheet pack from ZIP data. Never rejects: a corrupt archive or entry
 * is reported as a bad-archive failure.
 * @param data - Archive bytes
 * @param fileName - Archive filename, the fallback display name
 * @param noteCount - Number of playable notes
 */
export async function loadSheetPack(
  data: Uint8Array,
  fileName: string,
  noteCount: number
): Promise<SheetLoadResult> {
  let zip: JSZip
  let info: SheetPackInfo = {}
  try {
    zip = await JSZip.loadAsync(data)

    // info.yml is optional
    const infoFile = zip.file('info.yml')
    if (infoFile) {
      info = parseInfoYml(await infoFile.async('text'))
    }
  } catch (error) {
    return badArchive(fileName, error)
  }

  const sheetFilename = info.sheet ?? DEFAULT_SHEET_FILE
  const sheetFile = zip.file(sheetFilename)
  if (!sheetFile) {
    return {
      ok: false,
      error: {
        kind: 'missing-file',
        message: `Sheet file not found in pack: ${sheetFilename}`,
      },
    }
  }

  let sheetData: Uint8Array
  try {
    sheetData = await sheetFile.async('uint8array')
  } catch (error) {
    return badArchive(fileName, error)
  }
  return loadSheet(sheetData, info.name ?? fileName, noteCount)
}
