import { describe, it, expect } from 'vitest'
import { resolveCompileOptions, DEFAULT_MAX_TRANSITIONS } from './options'
import { InvalidOptionsError } from '../types'

describe('resolveCompileOptions', () => {
  it('defaults to non-deterministic mode with no transition budget', () => {
    expect(resolveCompileOptions()).toEqual({ deterministic: false, maxTransitions: DEFAULT_MAX_TRANSITIONS })
    expect(DEFAULT_MAX_TRANSITIONS).toBe(Infinity)
  })

  it('accepts the bare deterministic flag', () => {
    expect(resolveCompileOptions(true)).toEqual({ deterministic: true, maxTransitions: Infinity })
    expect(resolveCompileOptions(false).deterministic).toBe(false)
  })

  it('accepts an options object', () => {
    expect(resolveCompileOptions({ deterministic: true, maxTransitions: 50 })).toEqual({
      deterministic: true,
      maxTransitions: 50,
    })
  })

  it('accepts an unlimited transition budget', () => {
    expect(resolveCompileOptions({ maxTransitions: Infinity }).maxTransitions).toBe(Infinity)
  })

  it('rejects a non-positive budget', () => {
    try {
      resolveCompileOptions({ maxTransitions: 0 })
      expect.fail('Should have thrown')
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidOptionsError)
      if (e instanceof InvalidOptionsError) {
        expect(e.code).toBe('INVALID_OPTIONS')
        expect(e.issues.map((issue) => issue.path)).toEqual(['maxTransitions'])
      }
    }
  })

  it('rejects a fractional budget', () => {
    expect(() => resolveCompileOptions({ maxTransitions: 2.5 })).toThrow(InvalidOptionsError)
  })

  it('rejects unknown keys', () => {
    const options = { deterministic: true, determinstic: true }

    expect(() => resolveCompileOptions(options)).toThrow(InvalidOptionsError)
  })
})
