// tests/shell/output.test.ts

import { describe, it, expect } from 'vitest'
import { stripVTControlCharacters } from 'util'
import { createOutput, hexBytes, sqlLiteral, type OutputSettings } from '../../shell/services/output'

function settings(lines: string[], overrides: Partial<OutputSettings> = {}): OutputSettings {
  return {
    write: (text) => lines.push(text),
    tableName: 'tbl',
    highlight: false,
    pager: '',
    pagerThreshold: 100,
    interactive: false,
    ...overrides,
  }
}

describe('output', () => {
  describe('sqlLiteral', () => {
    const cases: { value: unknown; expected: string }[] = [
      { value: null, expected: 'NULL' },
      { value: 42n, expected: '42' },
      { value: 1.5, expected: '1.5' },
      { value: "it's", expected: "'it''s'" },
      { value: Buffer.from([0x0a, 0xff]), expected: "X'0aff'" },
    ]

    for (const tc of cases) {
      it(`renders ${tc.expected}`, () => {
        expect(sqlLiteral(tc.value)).toBe(tc.expected)
      })
    }
  })

  it('hexBytes joins with the separator', () => {
    expect(hexBytes(Buffer.from([1, 171]), ' ')).toBe('01 ab')
  })

  describe('sql mode', () => {
    it('writes one INSERT per row as rows arrive', () => {
      const lines: string[] = []
      const output = createOutput('sql', ['id', 'name', 'n', 'b'], settings(lines, { tableName: 'items' }))
      output.addRow([1n, "a'b", null, Buffer.from([0x0a, 0xff])])
      expect(lines).toEqual(["INSERT INTO items VALUES(1, 'a''b', NULL, X'0aff');"])
      output.finish()
      expect(lines).toHaveLength(1)
    })
  })

  describe('csv mode', () => {
    it('writes a header and rows on finish', () => {
      const lines: string[] = []
      const output = createOutput('csv', ['id', 'name'], settings(lines))
      output.addRow([1n, 'x'])
      output.addRow([2n, null])
      expect(lines).toEqual([])
      output.finish()
      expect(lines).toEqual(['id,name\n1,x\n2,'])
    })

    it('quotes values that need it', () => {
      const lines: string[] = []
      const output = createOutput('csv', ['v'], settings(lines))
      output.addRow(['a,b'])
      output.finish()
      expect(lines).toEqual(['v\n"a,b"'])
    })
  })

  describe('table mode', () => {
    it('renders a bordered table', () => {
      const lines: string[] = []
      const output = createOutput('table', ['id', 'name'], settings(lines))
      output.addRow([1n, 'x'])
      output.addRow([2n, null])
      output.finish()

      expect(lines).toHaveLength(1)
      expect(stripVTControlCharacters(lines[0]).split('\n')).toEqual([
        '┌────┬──────┐',
        '│ id │ name │',
        '├────┼──────┤',
        '│ 1  │ x    │',
        '├────┼──────┤',
        '│ 2  │ NULL │',
        '└────┴──────┘',
      ])
    })

    it('shows blobs as spaced hex', () => {
      const lines: string[] = []
      const output = createOutput('table', ['b'], settings(lines))
      output.addRow([Buffer.from([0xde, 0xad])])
      output.finish()
      expect(stripVTControlCharacters(lines[0])).toContain('│ de ad │')
    })
  })

  describe('null mode', () => {
    it('writes nothing', () => {
      const lines: string[] = []
      const output = createOutput('null', ['id'], settings(lines))
      output.addRow([1n])
      output.finish()
      expect(lines).toEqual([])
    })
  })
})
