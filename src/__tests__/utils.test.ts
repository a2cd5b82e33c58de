import { clamp, manhattan, quantize } from '../utils'

describe('quantize', () => {
  it('ignores small deflections', () => {
    expect(quantize(0.1, 0.1)).toBeNull()
  })

  it('snaps to the dominant axis', () => {
    expect(quantize(1, 0.5)).toBe('right')
    expect(quantize(-1, 0.2)).toBe('left')
    expect(quantize(0.3, -0.9)).toBe('up')
    expect(quantize(0, 0.8)).toBe('down')
  })

  it('prefers the vertical axis on a tie', () => {
    expect(quantize(0.5, 0.5)).toBe('down')
  })
})

describe('grid helpers', () => {
  it('measures Manhattan distance', () => {
    expect(manhattan({ x: 1, y: 1 }, { x: 4, y: -1 })).toBe(5)
  })

  it('clamps', () => {
    expect(clamp(12, 0, 10)).toBe(10)
    expect(clamp(-2, 0, 10)).toBe(0)
  })
})
