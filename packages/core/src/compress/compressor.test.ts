import { describe, it, expect } from 'vitest'

import { PathListError } from '../types'
import { expandPattern } from '../expand'
import { compressPaths, tryCompressPaths } from './compressor'

const ANALOG_OUTPUTS = ['Dev1/ao1', 'Dev1/ao2', 'Dev1/ao3', 'Dev1/ao4', 'Dev1/ao5', 'Dev1/ao6', 'Dev1/ao7']

const MIXED_DEVICES = [
  ...ANALOG_OUTPUTS,
  'Dev0/ao1',
  'Dev0/ao0',
  'Dev1/ai1',
  'Dev1/ai2',
  'Dev1/ai3',
  'Dev2/port0/line0',
  'Dev2/port0/line1',
  'Dev2/port1/line0',
  'Dev2/port1/line1',
]

const MIXED_DEVICES_PATTERN = 'Dev0/ao0:1,Dev1/{ai1:3,ao1:7},Dev2/{port0/line0:1,port1/line0:1}'

describe('compressPaths', () => {
  describe('growing channel lists', () => {
    it('collapses a contiguous run', () => {
      expect(compressPaths(ANALOG_OUTPUTS)).toBe('Dev1/ao1:7')
    })

    it('keeps a lone channel of another device as a literal', () => {
      expect(compressPaths([...ANALOG_OUTPUTS, 'Dev0/ao1'])).toBe('Dev0/ao1,Dev1/ao1:7')
    })

    it('collapses runs on several devices', () => {
      expect(compressPaths([...ANALOG_OUTPUTS, 'Dev0/ao1', 'Dev0/ao0'])).toBe('Dev0/ao0:1,Dev1/ao1:7')
    })

    it('braces several channel kinds on one device', () => {
      const paths = [...ANALOG_OUTPUTS, 'Dev0/ao1', 'Dev0/ao0', 'Dev1/ai1', 'Dev1/ai2', 'Dev1/ai3']

      expect(compressPaths(paths)).toBe('Dev0/ao0:1,Dev1/{ai1:3,ao1:7}')
    })

    it('keeps a single deep path whole', () => {
      const paths = [...ANALOG_OUTPUTS, 'Dev0/ao1', 'Dev0/ao0', 'Dev1/ai1', 'Dev1/ai2', 'Dev1/ai3', 'Dev2/port0/line0']

      expect(compressPaths(paths)).toBe('Dev0/ao0:1,Dev1/{ai1:3,ao1:7},Dev2/port0/line0')
    })

    it('collapses lines of a port', () => {
      const paths = [
        ...ANALOG_OUTPUTS,
        'Dev0/ao1',
        'Dev0/ao0',
        'Dev1/ai1',
        'Dev1/ai2',
        'Dev1/ai3',
        'Dev2/port0/line0',
        'Dev2/port0/line1',
      ]

      expect(compressPaths(paths)).toBe('Dev0/ao0:1,Dev1/{ai1:3,ao1:7},Dev2/port0/line0:1')
    })

    it('braces several ports of one device', () => {
      expect(compressPaths(MIXED_DEVICES)).toBe(MIXED_DEVICES_PATTERN)
    })
  })

  describe('normalization', () => {
    it('strips a leading slash', () => {
      expect(compressPaths(['/Dev1/ao0', '/Dev1/ao1'])).toBe('Dev1/ao0:1')
    })

    it('ignores duplicate paths', () => {
      expect(compressPaths(['Dev1/ao0', 'Dev1/ao0', 'Dev1/ao1'])).toBe(compressPaths(['Dev1/ao0', 'Dev1/ao1']))
      expect(compressPaths([...MIXED_DEVICES, ...MIXED_DEVICES])).toBe(MIXED_DEVICES_PATTERN)
    })

    it('does not depend on input order', () => {
      expect(compressPaths([...MIXED_DEVICES].reverse())).toBe(MIXED_DEVICES_PATTERN)
      expect(compressPaths([...MIXED_DEVICES.slice(5), ...MIXED_DEVICES.slice(0, 5)])).toBe(MIXED_DEVICES_PATTERN)
    })

    it('orders prefixes by code unit', () => {
      expect(compressPaths(['Dev1/ao0', 'Dev1/AO0'])).toBe('Dev1/{AO0,ao0}')
      expect(compressPaths(['Dev10/ai0', 'Dev9/ai0', 'Dev1/ai0'])).toBe('Dev1/ai0,Dev10/ai0,Dev9/ai0')
    })

    it('drops leading zeros from ranges', () => {
      expect(compressPaths(['Dev1/ao01', 'Dev1/ao02'])).toBe('Dev1/ao1:2')
    })

    it('treats numerically equal suffixes as one channel', () => {
      expect(compressPaths(['Dev1/ao1', 'Dev1/ao01'])).toBe('Dev1/ao1')
    })
  })

  describe('single clauses', () => {
    it('returns a single path unchanged', () => {
      expect(compressPaths(['Dev1/ao0'])).toBe('Dev1/ao0')
    })

    it('drops the separator of an empty remainder', () => {
      expect(compressPaths(['Dev1/'])).toBe('Dev1')
    })

    it('handles multi-digit ranges', () => {
      expect(compressPaths(['Dev1/port9', 'Dev1/port10', 'Dev1/port11'])).toBe('Dev1/port9:11')
    })

    it('collapses deep paths', () => {
      const paths = ['Dev1/port0/line0', 'Dev1/port0/line1', 'Dev1/port0/line2']

      expect(compressPaths(paths)).toBe('Dev1/port0/line0:2')
    })

    it('strips the leading slash of nested levels', () => {
      expect(compressPaths(['Dev1//ao0', 'Dev1//ao1'])).toBe('Dev1/ao0:1')
      expect(compressPaths(['Dev1/port0//line0', 'Dev1/port0//line1'])).toBe('Dev1/port0/line0:1')
    })

    it('collapses runs beyond the safe-integer range', () => {
      expect(compressPaths(['ao9007199254740993', 'ao9007199254740994'])).toBe('ao9007199254740993:9007199254740994')
      expect(compressPaths(['ao9007199254740993', 'ao9007199254740995'])).toBe('ao9007199254740993,ao9007199254740995')
    })

    it('collapses numbers under an empty top-level prefix', () => {
      expect(compressPaths(['//3', '//4'])).toBe('3:4')
    })
  })

  describe('bare tokens', () => {
    it('splits tokens at their first digit', () => {
      expect(compressPaths(['ao0', 'ao1', 'ai3'])).toBe('ai3,ao0:1')
    })

    it('keeps tokens without digits whole', () => {
      expect(compressPaths(['RTSI', 'PFI'])).toBe('PFI,RTSI')
    })
  })

  describe('fallback', () => {
    it('enumerates the input when a range has a gap', () => {
      expect(compressPaths(['Dev1/ao0', 'Dev1/ao2'])).toBe('Dev1/ao0,Dev1/ao2')
    })

    it('enumerates the original strings in their original order', () => {
      expect(compressPaths(['/Dev1/ao2', 'Dev0/ao0', '/Dev1/ao0'])).toBe('/Dev1/ao2,Dev0/ao0,/Dev1/ao0')
    })

    it('enumerates the input when a suffix is not an integer', () => {
      expect(compressPaths(['Dev1/ao1a', 'Dev1/ao1b'])).toBe('Dev1/ao1a,Dev1/ao1b')
    })

    it('enumerates the input when a device mixes flat and nested channels', () => {
      expect(compressPaths(['Dev1/ai0', 'Dev1/port0/line0'])).toBe('Dev1/ai0,Dev1/port0/line0')
    })

    it('gives up on the whole list when one group fails', () => {
      const paths = ['Dev0/ao0', 'Dev0/ao1', 'Dev1/ao0', 'Dev1/ao5']

      expect(compressPaths(paths)).toBe('Dev0/ao0,Dev0/ao1,Dev1/ao0,Dev1/ao5')
    })
  })

  describe('invalid input', () => {
    it('rejects an empty list', () => {
      expect(() => compressPaths([])).toThrow(PathListError)
      expect(() => compressPaths([], { onMixedShapes: 'enumerate' })).toThrow('Cannot compress an empty path list')
    })

    it('rejects mixed shapes by default', () => {
      expect(() => compressPaths(['Dev1/ao0', 'ao1'])).toThrow(PathListError)
    })

    it('reports the code and index of a mixed shape', () => {
      let caught: unknown
      try {
        compressPaths(['Dev1/ao0', 'Dev1/ao1', 'ao2'])
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(PathListError)
      if (caught instanceof PathListError) {
        expect(caught.code).toBe('MIXED_PATH_SHAPES')
        expect(caught.index).toBe(2)
      }
    })

    it('enumerates mixed shapes when asked to', () => {
      expect(compressPaths(['Dev1/ao0', 'ao1'], { onMixedShapes: 'enumerate' })).toBe('Dev1/ao0,ao1')
    })
  })

  describe('round trip', () => {
    it('expands back to the deduplicated input', () => {
      const pattern = compressPaths([...MIXED_DEVICES, 'Dev1/ao3'])
      const expanded = expandPattern(pattern)

      expect(expanded.errors).toBeUndefined()
      expect([...expanded.paths].sort()).toEqual([...MIXED_DEVICES].sort())
    })

    it('expands negative runs back to their paths', () => {
      expect(compressPaths(['//-1', '//0'])).toBe('-1:0')
      expect(expandPattern(compressPaths(['//-1', '//0'])).paths).toEqual(['-1', '0'])
      expect(compressPaths(['Dev1///-2', 'Dev1///-1'])).toBe('Dev1/-2:-1')
      expect(expandPattern(compressPaths(['Dev1///-2', 'Dev1///-1'])).paths).toEqual(['Dev1/-2', 'Dev1/-1'])
    })

    it('expands signed tokens under a doubled slash back to their paths', () => {
      const expanded = expandPattern(compressPaths(['Dev1//-1', 'Dev1//0']))

      expect([...expanded.paths].sort()).toEqual(['Dev1/-1', 'Dev1/0'])
    })

    it('expands large runs back to their paths', () => {
      const paths = ['ao9007199254740993', 'ao9007199254740994']

      expect(expandPattern(compressPaths(paths)).paths).toEqual(paths)
    })

    it('emits one clause per path group without losing paths', () => {
      const paths = ['/Dev3/ctr0', '/Dev3/ctr1', '/Dev3/PFI0', 'Dev4/ai0']
      const expanded = expandPattern(compressPaths(paths))

      expect([...expanded.paths].sort()).toEqual(['Dev3/PFI0', 'Dev3/ctr0', 'Dev3/ctr1', 'Dev4/ai0'])
    })
  })
})

describe('tryCompressPaths', () => {
  it('returns the pattern when one exists', () => {
    expect(tryCompressPaths(ANALOG_OUTPUTS)).toEqual({ kind: 'compressed', pattern: 'Dev1/ao1:7' })
  })

  it('reports a missing compact form instead of enumerating', () => {
    expect(tryCompressPaths(['Dev1/ao0', 'Dev1/ao2'])).toEqual({ kind: 'no-compact-form' })
  })

  it('reports mixed shapes as a missing compact form when enumerating', () => {
    expect(tryCompressPaths(['ao0', 'Dev1/ao1'], { onMixedShapes: 'enumerate' })).toEqual({ kind: 'no-compact-form' })
  })
})
