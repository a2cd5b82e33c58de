import { bfsStep, chaseStep, greedyStep } from '../pathfinding'
import { mazeFromRows } from '../maze'

// (3,3) sits in a pocket whose only way out is east, around the loop
const HOOK = mazeFromRows([
  '#######',
  '#.....#',
  '#.###.#',
  '#.#...#',
  '#######',
])

const OPEN = mazeFromRows([
  '#####',
  '#...#',
  '#...#',
  '#...#',
  '#####',
])

describe('greedyStep', () => {
  it('steps along the wider gap first', () => {
    expect(greedyStep({ x: 1, y: 1 }, { x: 3, y: 2 }, OPEN)).toEqual({ x: 2, y: 1 })
    expect(greedyStep({ x: 1, y: 1 }, { x: 2, y: 3 }, OPEN)).toEqual({ x: 1, y: 2 })
  })

  it('prefers the vertical axis on a tie', () => {
    expect(greedyStep({ x: 1, y: 1 }, { x: 3, y: 3 }, OPEN)).toEqual({ x: 1, y: 2 })
  })

  it('falls back to the other axis when blocked', () => {
    // east is wall at (2,3); a zero vertical gap counts as "up"
    expect(greedyStep({ x: 1, y: 3 }, { x: 3, y: 3 }, HOOK)).toEqual({ x: 1, y: 2 })
  })

  it('stalls in a dead end', () => {
    expect(greedyStep({ x: 3, y: 3 }, { x: 1, y: 3 }, HOOK)).toEqual({ x: 3, y: 3 })
  })
})

describe('bfsStep', () => {
  it('finds the way round a wall', () => {
    expect(bfsStep({ x: 3, y: 3 }, { x: 1, y: 3 }, HOOK)).toEqual({ x: 4, y: 3 })
  })

  it('takes the first step of a shortest path', () => {
    expect(bfsStep({ x: 1, y: 1 }, { x: 3, y: 3 }, OPEN)).toEqual({ x: 1, y: 2 })
    expect(bfsStep({ x: 1, y: 1 }, { x: 1, y: 3 }, HOOK)).toEqual({ x: 1, y: 2 })
  })

  it('stays put when already on the target', () => {
    expect(bfsStep({ x: 2, y: 2 }, { x: 2, y: 2 }, OPEN)).toEqual({ x: 2, y: 2 })
  })

  it('stays put when the target cannot be reached', () => {
    const split = mazeFromRows(['#####', '#.#.#', '#####'])
    expect(bfsStep({ x: 1, y: 1 }, { x: 3, y: 1 }, split)).toEqual({ x: 1, y: 1 })
    expect(bfsStep({ x: 1, y: 1 }, { x: 2, y: 1 }, split)).toEqual({ x: 1, y: 1 })
  })
})

describe('chaseStep', () => {
  it('dispatches on the strategy', () => {
    expect(chaseStep('greedy', { x: 3, y: 3 }, { x: 1, y: 3 }, HOOK)).toEqual({ x: 3, y: 3 })
    expect(chaseStep('bfs', { x: 3, y: 3 }, { x: 1, y: 3 }, HOOK)).toEqual({ x: 4, y: 3 })
  })
})
