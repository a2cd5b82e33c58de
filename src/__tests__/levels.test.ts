import { makeLevel, stepInterval } from '../levels'

describe('makeLevel', () => {
  it('has no adversaries on the first level', () => {
    const L = makeLevel(1)
    expect(L.adversaries).toBe(0)
    expect(L.exitBonus).toBe(1000)
  })

  it('adds one adversary per level', () => {
    expect(makeLevel(2).adversaries).toBe(1)
    expect(makeLevel(3).adversaries).toBe(2)
    expect(makeLevel(6).adversaries).toBe(5)
  })

  it('caps the adversary count', () => {
    expect(makeLevel(10).adversaries).toBe(5)
    expect(makeLevel(10, { maxAdversaries: 3 }).adversaries).toBe(3)
  })

  it('speeds adversaries up each level', () => {
    expect(makeLevel(2).speed).toBe(0.5)
    expect(makeLevel(2).moveInterval).toBe(120)
    expect(makeLevel(3).speed).toBeCloseTo(0.7)
    expect(makeLevel(3).moveInterval).toBe(85)
    expect(makeLevel(4).moveInterval).toBe(66)
  })

  it('scales the step interval with the frame rate', () => {
    expect(makeLevel(2, { fps: 30 }).moveInterval).toBe(60)
  })

  it('pays more for later exits', () => {
    expect(makeLevel(4).exitBonus).toBe(4000)
  })
})

describe('stepInterval', () => {
  it('never drops below one frame', () => {
    expect(stepInterval(100)).toBe(1)
  })
})
