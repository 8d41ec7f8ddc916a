// tests/shell/repl.test.ts

import { describe, it, expect, beforeAll } from 'vitest'
import * as readline from 'readline'
import { PassThrough } from 'stream'
import { attachHints, completeLine, runInput } from '../../shell/repl'
import { SqliteCatalog } from '../../shell/lib/catalog'
import { createCompleter, type Completer } from '../../src/lib/sql/autocomplete'
import { ensureModuleLoaded } from '../../src/lib/sql/core'
import { createTestSession } from '../test-utils'

describe('repl', () => {
  beforeAll(async () => {
    await ensureModuleLoaded()
  })

  describe('runInput', () => {
    it('ignores blank lines', () => {
      const session = createTestSession()
      expect(runInput(session, '   ')).toBe('handled')
      expect(session.lines).toEqual([])
    })

    it('dispatches dot-commands', () => {
      expect(runInput(createTestSession(), '.quit')).toBe('quit')
    })

    it('executes SQL', () => {
      const session = createTestSession()
      session.mode = 'csv'
      expect(runInput(session, 'SELECT 1 AS one')).toBe('handled')
      expect(session.lines).toEqual(['one\n1'])
    })
  })

  describe('completeLine', () => {
    it('returns candidate texts and the replaced substring', () => {
      const completer: Completer = {
        complete: () => [{ from: 14, text: 'users ' }],
        hint: () => null,
      }
      expect(completeLine(completer, 'SELECT * FROM u')).toEqual([['users '], 'u'])
    })

    it('returns the whole line without candidates', () => {
      const completer: Completer = { complete: () => [], hint: () => null }
      expect(completeLine(completer, 'SELECT 1')).toEqual([[], 'SELECT 1'])
    })

    it('completes against the live schema', () => {
      const session = createTestSession()
      runInput(session, 'CREATE TABLE users (id INTEGER)')
      const completer = createCompleter(new SqliteCatalog(session.db))
      expect(completeLine(completer, 'SELECT * FROM us')).toEqual([['users '], 'us'])
      expect(completeLine(completer, 'sel')).toEqual([['select '], 'sel'])
    })
  })

  describe('attachHints', () => {
    it('removes its keypress listener when detached', () => {
      const rl = readline.createInterface({ input: new PassThrough(), output: new PassThrough() })
      const completer: Completer = { complete: () => [], hint: () => null }
      const before = process.stdin.listenerCount('keypress')

      const detach = attachHints(rl, completer, process.stdout)
      expect(process.stdin.listenerCount('keypress')).toBe(before + 1)

      detach()
      expect(process.stdin.listenerCount('keypress')).toBe(before)
      rl.close()
    })
  })
})
