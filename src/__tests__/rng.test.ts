import { createRng, fromSource } from '../rng'

describe('createRng', () => {
  it('repeats a sequence for the same seed', () => {
    const a = createRng('same'), b = createRng('same')
    const xs = Array.from({ length: 5 }, () => a.next())
    const ys = Array.from({ length: 5 }, () => b.next())
    expect(xs).toEqual(ys)
  })

  it('keeps integers inside the inclusive range', () => {
    const r = createRng('range')
    const seen = new Set<number>()
    for (let i = 0; i < 1000; i++) seen.add(r.int(1, 5))
    expect([...seen].sort()).toEqual([1, 2, 3, 4, 5])
  })

  it('works without a seed', () => {
    const v = createRng().next()
    expect(v).toBeGreaterThanOrEqual(0)
    expect(v).toBeLessThan(1)
  })
})

describe('fromSource', () => {
  it('maps the unit interval onto integers', () => {
    expect(fromSource(() => 0.5).int(0, 9)).toBe(5)
    expect(fromSource(() => 0.999).int(1, 5)).toBe(5)
    expect(fromSource(() => 0).int(3, 7)).toBe(3)
  })

  it('picks by index', () => {
    expect(fromSource(() => 0.4).pick(['a', 'b', 'c'])).toBe('b')
  })

  it('refuses to pick from nothing', () => {
    expect(() => fromSource(() => 0.4).pick([])).toThrow(RangeError)
  })
})
