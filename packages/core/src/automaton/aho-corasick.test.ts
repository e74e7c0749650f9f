import { describe, it, expect } from 'vitest'
import { AhoCorasick } from './aho-corasick'
import { createAutomaton, buildAutomaton } from './factory'
import { createLogger } from '../logging'
import {
  AlreadyBuiltError,
  NotBuiltError,
  EmptyPatternError,
  AutomatonLimitError,
  InvalidOptionsError,
  type Match,
} from '../types'

/** Every occurrence found by direct comparison, as sorted "pattern@start" keys. */
function naiveMatches(patterns: readonly string[], text: string): string[] {
  const found: string[] = []
  for (const pattern of new Set(patterns)) {
    for (let start = 0; start + pattern.length <= text.length; start++) {
      if (text.startsWith(pattern, start)) {
        found.push(`${pattern}@${start}`)
      }
    }
  }
  return found.sort()
}

function keys(matches: Iterable<Match<string>>): string[] {
  return [...matches].map((m) => `${m.pattern}@${m.start}`).sort()
}

/** Seeded mulberry32 generator so failures reproduce. */
function seeded(seed: number): () => number {
  let state = seed
  return () => {
    state = (state + 0x6d2b79f5) | 0
    let t = Math.imul(state ^ (state >>> 15), 1 | state)
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

function randomWord(next: () => number, alphabet: string, maxLength: number): string {
  const length = 1 + Math.floor(next() * maxLength)
  let word = ''
  for (let i = 0; i < length; i++) {
    word += alphabet[Math.floor(next() * alphabet.length)]
  }
  return word
}

describe('AhoCorasick', () => {
  describe('matching', () => {
    it('reports suffix patterns through merged outputs', () => {
      const ac = buildAutomaton(['he', 'she'])

      expect([...ac.search('ushers')]).toEqual([
        { pattern: 'she', start: 1, end: 4 },
        { pattern: 'he', start: 2, end: 4 },
      ])
    })

    it('reports each duplicate pattern once', () => {
      const ac = buildAutomaton(['he', 'he'])

      expect([...ac.search('hehe')]).toEqual([
        { pattern: 'he', start: 0, end: 2 },
        { pattern: 'he', start: 2, end: 4 },
      ])
    })

    it('yields an empty sequence when nothing matches', () => {
      expect([...buildAutomaton(['he', 'she']).search('xyz')]).toEqual([])
    })

    it('tests for any occurrence', () => {
      const ac = buildAutomaton(['needle'], true)

      expect(ac.test('haystack with a needle in it')).toBe(true)
      expect(ac.test('haystack')).toBe(false)
    })
  })

  describe('properties', () => {
    const next = seeded(42)
    const cases = Array.from({ length: 40 }, () => ({
      patterns: Array.from({ length: 1 + Math.floor(next() * 6) }, () => randomWord(next, 'abc', 4)),
      text: randomWord(next, 'abcd', 30),
    }))

    it('finds exactly the occurrences a direct comparison finds', () => {
      for (const { patterns, text } of cases) {
        expect(keys(buildAutomaton(patterns).search(text))).toEqual(naiveMatches(patterns, text))
      }
    })

    it('gives the same matches in both compiled modes', () => {
      for (const { patterns, text } of cases) {
        const nfa = [...buildAutomaton(patterns, false).search(text)]
        const dfa = [...buildAutomaton(patterns, true).search(text)]

        expect(dfa).toEqual(nfa)
      }
    })

    it('does not depend on insertion order', () => {
      for (const { patterns, text } of cases) {
        const reversed = [...patterns].reverse()

        expect(keys(buildAutomaton(reversed).search(text))).toEqual(keys(buildAutomaton(patterns).search(text)))
      }
    })

    it('returns identical results when searched twice', () => {
      const ac = buildAutomaton(['he', 'she', 'his', 'hers'], true)

      expect([...ac.search('ahishers')]).toEqual([...ac.search('ahishers')])
    })
  })

  describe('generic symbols', () => {
    it('matches sequences of numbers', () => {
      const ac = createAutomaton<number>()
      ac.insert([1, 2, 3])
      ac.insert([2, 3])
      ac.compile()

      expect([...ac.search([0, 1, 2, 3, 2, 3])]).toEqual([
        { pattern: [1, 2, 3], start: 1, end: 4 },
        { pattern: [2, 3], start: 2, end: 4 },
        { pattern: [2, 3], start: 4, end: 6 },
      ])
    })

    it('compares object symbols by reference', () => {
      const open = { kind: 'open' }
      const close = { kind: 'close' }
      const ac = createAutomaton<{ kind: string }>()
      ac.insert([open, close])
      ac.compile(true)

      expect([...ac.search([open, { kind: 'close' }, open, close])]).toEqual([
        { pattern: [open, close], start: 2, end: 4 },
      ])
    })
  })

  describe('streaming', () => {
    it('scans chunks through a scanner', () => {
      const scanner = buildAutomaton(['she']).createScanner()

      expect([...scanner.scan('us')]).toEqual([])
      expect([...scanner.scan('hers')]).toEqual([{ pattern: 'she', start: 1, end: 4 }])
    })

    it('searches an async source', async () => {
      async function* chunks() {
        yield 'ush'
        yield 'ers'
      }
      const found: Match<string>[] = []
      for await (const match of buildAutomaton(['he', 'she']).searchAsync(chunks())) {
        found.push(match)
      }

      expect(found).toEqual([
        { pattern: 'she', start: 1, end: 4 },
        { pattern: 'he', start: 2, end: 4 },
      ])
    })
  })

  describe('lifecycle', () => {
    it('rejects insertion after compilation', () => {
      const ac = buildAutomaton(['he'])

      expect(() => ac.insert('she')).toThrow(AlreadyBuiltError)
      expect(() => ac.insert('she')).toThrow('Cannot insert: automaton already built')
    })

    it('rejects a second compilation', () => {
      const ac = buildAutomaton(['he'])

      expect(() => ac.compile(true)).toThrow(AlreadyBuiltError)
      expect(ac.isDeterministic).toBe(false)
    })

    it('rejects searching before compilation', () => {
      const ac = createAutomaton()
      ac.insert('he')

      expect(() => ac.search('he')).toThrow(NotBuiltError)
      expect(() => ac.test('he')).toThrow(NotBuiltError)
      expect(() => ac.createScanner()).toThrow(NotBuiltError)
      expect(() => ac.searchAsync((async function* () {})())).toThrow(NotBuiltError)
    })

    it('rejects an empty pattern', () => {
      const ac = createAutomaton()

      try {
        ac.insert('')
        expect.fail('Should have thrown')
      } catch (e) {
        expect(e).toBeInstanceOf(EmptyPatternError)
        if (e instanceof EmptyPatternError) {
          expect(e.code).toBe('EMPTY_PATTERN')
          expect(e.message).toBe('Empty pattern not allowed')
        }
      }
    })

    it('stays unbuilt when the closure exceeds its budget', () => {
      const ac = createAutomaton()
      ac.insertAll(['ab', 'b'])

      expect(() => ac.compile({ deterministic: true, maxTransitions: 7 })).toThrow(AutomatonLimitError)
      expect(ac.isBuilt).toBe(false)

      ac.compile()
      expect(ac.isBuilt).toBe(true)
      expect(ac.isDeterministic).toBe(false)
      expect([...ac.search('ab')]).toEqual([
        { pattern: 'ab', start: 0, end: 2 },
        { pattern: 'b', start: 1, end: 2 },
      ])
    })

    it('closes a large dictionary under the default options', () => {
      const next = seeded(7)
      const words = Array.from({ length: 20_000 }, () =>
        Array.from({ length: 6 }, () => 'abcdefghijklmnopqrstuvwxyz'[Math.floor(next() * 26)]).join(''),
      )
      const ac = createAutomaton()
      ac.insertAll(words)

      expect(() => ac.compile(true)).not.toThrow()
      expect(ac.isDeterministic).toBe(true)
      expect(ac.stats().transitions).toBeGreaterThan(1_000_000)
      expect(ac.test(words[0])).toBe(true)
    }, 30_000)

    it('compiles after a pattern source fails mid-insertion', () => {
      const ac = createAutomaton<string, Iterable<string>>()
      ac.insert('ab')
      function* failing() {
        yield 'x'
        yield 'y'
        throw new Error('source failed')
      }

      expect(() => ac.insert(failing())).toThrow('source failed')
      ac.compile()

      expect([...ac.search('xyab')]).toEqual([{ pattern: 'ab', start: 2, end: 4 }])
    })

    it('validates compile options', () => {
      const ac = createAutomaton()
      ac.insert('he')

      expect(() => ac.compile({ maxTransitions: -1 })).toThrow(InvalidOptionsError)
      expect(ac.isBuilt).toBe(false)
    })
  })

  describe('stats', () => {
    it('describes the trie while building', () => {
      const ac = createAutomaton()
      ac.insertAll(['he', 'she'])

      expect(ac.stats()).toEqual({ states: 6, transitions: 5, patterns: 2, deterministic: false, built: false })
    })

    it('describes the closed table once compiled', () => {
      expect(buildAutomaton(['he', 'she'], true).stats()).toEqual({
        states: 6,
        transitions: 14,
        patterns: 2,
        deterministic: true,
        built: true,
      })
    })
  })

  describe('options', () => {
    it('logs lifecycle violations at warn level', () => {
      const lines: string[] = []
      const logger = createLogger({ level: 'warn', destination: { write: (line: string) => lines.push(line) } })
      const ac = buildAutomaton(['he'], false, { logger })

      expect(() => ac.insert('she')).toThrow(AlreadyBuiltError)
      expect(lines).toHaveLength(1)
      expect(JSON.parse(lines[0])).toMatchObject({
        level: 40,
        code: 'ALREADY_BUILT',
        msg: 'Cannot insert: automaton already built',
      })
    })

    it('rejects an unknown log level', () => {
      expect(() => new AhoCorasick<string, string>(JSON.parse('{"logLevel":"loud"}'))).toThrow(InvalidOptionsError)
    })
  })
})
