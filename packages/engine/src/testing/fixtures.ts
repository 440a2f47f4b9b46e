/**
 * Test fixtures: in-memory sheet packs and a recording note player
 */

import JSZip from 'jszip'
import type { NotePlayer } from '../audio/NotePlayer.js'

export async function buildPack(files: Record<string, string>): Promise<Uint8Array> {
  const zip = new JSZip()
  for (const [name, content] of Object.entries(files)) {
    zip.file(name, content)
  }
  return zip.generateAsync({ type: 'uint8array' })
}

/**
 * Deflated single-entry pack whose compressed bytes are overwritten
 */
export async function buildCorruptPack(content: string): Promise<Uint8Array> {
  const data = await new JSZip()
    .file('sheet.txt', content)
    .generateAsync({ type: 'uint8array', compression: 'DEFLATE' })

  // Local file header: compressed size at 18, name and extra lengths at 26 and 28
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
  const compressedSize = view.getUint32(18, true)
  const start = 30 + view.getUint16(26, true) + view.getUint16(28, true)
  data.fill(0xff, start, start + compressedSize)
  return data
}

export interface RecordingNotePlayer extends NotePlayer {
  readonly played: number[]
}

export function recordingNotePlayer(): RecordingNotePlayer {
  const played: number[] = []
  return {
    played,
    play(noteIndex) {
      played.push(noteIndex)
    },
  }
}
