import { describe, it, expect } from 'vitest'
import { decodeSheet, loadSheet, loadSheetFile, parseSheet } from './SheetLoader.js'
import { NoteSheet } from './NoteSheet.js'

const encode = (text: string) => new TextEncoder().encode(text)

describe('parseSheet', () => {
  it('should parse space separated note indices', () => {
    expect(parseSheet('0 1 2', 24)).toEqual({ ok: true, notes: [0, 1, 2] })
  })

  it('should reject the whole sheet on an out of range index', () => {
    expect(parseSheet('0 1 99', 24)).toEqual({
      ok: false,
      error: {
        kind: 'out-of-range',
        message: 'Token 2 (99) is outside [0, 24)',
        token: '99',
        position: 2,
      },
    })
  })

  it('should reject negative indices', () => {
    const result = parseSheet('3 -1', 24)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.kind).toBe('out-of-range')
  })

  it('should reject tokens that are not integers', () => {
    const result = parseSheet('0 x 2', 24)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('invalid-token')
      expect(result.error.position).toBe(1)
      expect(result.error.token).toBe('x')
    }
  })

  it('should accept signed integers', () => {
    expect(parseSheet('+3 -0', 24)).toEqual({ ok: true, notes: [3, 0] })
  })

  it('should tolerate trailing spaces only', () => {
    expect(parseSheet('0 1 2  ', 24)).toEqual({ ok: true, notes: [0, 1, 2] })

    const leading = parseSheet(' 0 1', 24)
    expect(leading.ok).toBe(false)
    if (!leading.ok) expect(leading.error.position).toBe(0)

    const doubled = parseSheet('0  1', 24)
    expect(doubled.ok).toBe(false)
    if (!doubled.ok) expect(doubled.error.position).toBe(1)
  })

  it('should not treat newlines as separators', () => {
    const result = parseSheet('0 1 2\n', 24)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('invalid-token')
      expect(result.error.token).toBe('2\n')
    }
  })

  it('should reject an empty sheet', () => {
    const result = parseSheet('', 24)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.kind).toBe('empty')
  })
})

describe('decodeSheet', () => {
  it('should drop a UTF-8 byte order mark', () => {
    expect(decodeSheet(new Uint8Array([0xef, 0xbb, 0xbf, 0x31, 0x20, 0x32]))).toBe('1 2')
  })
})

describe('loadSheet', () => {
  it('should keep the file name on success', () => {
    expect(loadSheet(encode('5 3 8'), 'tune.txt', 24)).toEqual({
      ok: true,
      notes: [5, 3, 8],
      name: 'tune.txt',
    })
  })

  it('should respect the configured note count', () => {
    expect(loadSheet(encode('0 4'), 'tune.txt', 4).ok).toBe(false)
  })

  it('should report an unreadable file as a failed load', async () => {
    const result = await loadSheetFile('/nonexistent/taptiles/sheet.txt', 24)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.kind).toBe('missing-file')
  })
})

describe('NoteSheet', () => {
  it('should start empty', () => {
    const sheet = new NoteSheet()
    expect(sheet.loaded).toBe(false)
    expect(sheet.status).toBe('No sheet loaded')
    expect(sheet.noteForScore(1)).toBeNull()
  })

  it('should replace the sheet on a successful load', () => {
    const sheet = new NoteSheet()
    sheet.apply(loadSheet(encode('0 1 2'), 'a.txt', 24))
    sheet.apply(loadSheet(encode('7 9'), 'b.txt', 24))

    expect(sheet.toArray()).toEqual([7, 9])
    expect(sheet.fileName).toBe('b.txt')
    expect(sheet.status).toBe('Loaded b.txt')
  })

  it('should discard the previous sheet on a failed load', () => {
    const sheet = new NoteSheet()
    sheet.apply(loadSheet(encode('0 1 2'), 'a.txt', 24))
    sheet.apply(loadSheet(encode('0 1 99'), 'b.txt', 24))

    expect(sheet.loaded).toBe(false)
    expect(sheet.length).toBe(0)
    expect(sheet.status).toBe('No sheet loaded')
  })

  it('should index by (score - 1) mod length', () => {
    const sheet = new NoteSheet()
    sheet.apply({ ok: true, notes: [5, 3, 8], name: 'tune.txt' })

    expect(sheet.noteForScore(1)).toBe(5)
    expect(sheet.noteForScore(2)).toBe(3)
    expect(sheet.noteForScore(6)).toBe(8)
    // Score 0 wraps around to the last entry
    expect(sheet.noteForScore(0)).toBe(8)
  })
})
