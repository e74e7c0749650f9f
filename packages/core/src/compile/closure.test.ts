import { describe, it, expect } from 'vitest'
import { closeState } from './closure'
import { propagateFailureLinks } from './failure-links'
import { createTrie, insertPattern } from '../trie'

describe('closeState', () => {
  it('copies missing transitions from the whole failure chain', () => {
    // a=1 ab=2 b=3
    const trie = createTrie<string, string>()
    insertPattern(trie, 'ab')
    insertPattern(trie, 'b')
    const tables = propagateFailureLinks(trie)

    expect(closeState(2, trie.table.rows, tables)).toBe(2)
    expect(tables.rows[2]).toEqual(
      new Map([
        ['a', 1],
        ['b', 3],
      ]),
    )
  })

  it('prefers the nearest suffix state', () => {
    // x=1 xa=2 xab=3 a=4 ab=5 abc=6
    const trie = createTrie<string, string>()
    insertPattern(trie, 'xab')
    insertPattern(trie, 'abc')
    const tables = propagateFailureLinks(trie)

    expect(tables.failure[3]).toBe(5)
    closeState(3, trie.table.rows, tables)

    // From "xab", c continues "abc" rather than restarting at the root
    expect(tables.rows[3].get('c')).toBe(6)
    expect(tables.rows[3].get('x')).toBe(1)
    expect(tables.rows[3].get('a')).toBe(4)
  })

  it('never overwrites a trie transition', () => {
    const trie = createTrie<string, string>()
    insertPattern(trie, 'aa')
    const tables = propagateFailureLinks(trie)

    expect(closeState(1, trie.table.rows, tables)).toBe(0)
    expect(tables.rows[1].get('a')).toBe(2)
  })
})
