import { createRng } from '../rng'
import { exitCell, findNearestOpen, generateMaze, isAtExit, isOpen, isWall, mazeFromRows } from '../maze'
import { PlacementError } from '../errors'
import type { Cell, Maze } from '../types'

function reachableFrom(m: Maze, start: Cell): number {
  const seen = new Set<string>([`${start.x},${start.y}`])
  const queue = [start]
  while (queue.length) {
    const c = queue.shift()
    if (!c) break
    for (const [dx, dy] of [[0, 1], [1, 0], [0, -1], [-1, 0]]) {
      const k = `${c.x + dx},${c.y + dy}`
      if (!seen.has(k) && isOpen(m, c.x + dx, c.y + dy)) {
        seen.add(k)
        queue.push({ x: c.x + dx, y: c.y + dy })
      }
    }
  }
  return seen.size
}

function openCount(m: Maze): number {
  return m.cells.reduce((n, v) => n + (v === 0 ? 1 : 0), 0)
}

describe('generateMaze', () => {
  const maze = generateMaze(35, 25, createRng('maze-test'))

  it('keeps the border solid', () => {
    for (let x = 0; x < 35; x++) {
      expect(isWall(maze, x, 0)).toBe(true)
      expect(isWall(maze, x, 24)).toBe(true)
    }
    for (let y = 0; y < 25; y++) {
      expect(isWall(maze, 0, y)).toBe(true)
      expect(isWall(maze, 34, y)).toBe(true)
    }
  })

  it('opens every odd-coordinate room', () => {
    for (let y = 1; y < 24; y += 2) {
      for (let x = 1; x < 34; x += 2) expect(isOpen(maze, x, y)).toBe(true)
    }
  })

  it('carves a spanning tree of the rooms plus the exit approach', () => {
    // 17 x 12 rooms joined by 203 corridors, plus (32,23) when the carve missed it
    expect([407, 408]).toContain(openCount(maze))
  })

  it('connects every open cell to the start', () => {
    expect(reachableFrom(maze, { x: 1, y: 1 })).toBe(openCount(maze))
  })

  it('opens the exit and the cell to its left', () => {
    expect(exitCell(maze)).toEqual({ x: 33, y: 23 })
    expect(isOpen(maze, 33, 23)).toBe(true)
    expect(isOpen(maze, 32, 23)).toBe(true)
  })

  it('is reproducible for a seed', () => {
    const again = generateMaze(35, 25, createRng('maze-test'))
    expect(Array.from(again.cells)).toEqual(Array.from(maze.cells))
  })

  it('differs between seeds', () => {
    const other = generateMaze(35, 25, createRng('another-seed'))
    expect(Array.from(other.cells)).not.toEqual(Array.from(maze.cells))
  })
})

describe('wall queries', () => {
  const m = mazeFromRows([
    '#####',
    '#...#',
    '#.#.#',
    '#...#',
    '#####',
  ])

  it('treats everything outside the grid as wall', () => {
    expect(isWall(m, -1, 1)).toBe(true)
    expect(isWall(m, 1, -1)).toBe(true)
    expect(isWall(m, 5, 1)).toBe(true)
    expect(isWall(m, 1, 5)).toBe(true)
  })

  it('reads cells row-major', () => {
    expect(isWall(m, 2, 2)).toBe(true)
    expect(isOpen(m, 3, 2)).toBe(true)
    expect(isOpen(m, 2, 1)).toBe(true)
  })

  it('flags the bottom-right corner region as the exit', () => {
    expect(isAtExit(m, { x: 3, y: 3 })).toBe(true)
    expect(isAtExit(m, { x: 2, y: 3 })).toBe(false)
    expect(isAtExit(m, { x: 3, y: 2 })).toBe(false)
  })

  it('rejects ragged rows', () => {
    expect(() => mazeFromRows(['###', '##'])).toThrow(RangeError)
  })
})

describe('findNearestOpen', () => {
  it('returns the cell itself when open', () => {
    const m = mazeFromRows(['#####', '#...#', '#####'])
    expect(findNearestOpen(m, 2, 1)).toEqual({ x: 2, y: 1 })
  })

  it('scans rings column by column from the top-left', () => {
    const m = mazeFromRows([
      '#####',
      '#...#',
      '#.#.#',
      '#...#',
      '#####',
    ])
    expect(findNearestOpen(m, 2, 2)).toEqual({ x: 1, y: 1 })
  })

  it('raises when nothing is open', () => {
    const m = mazeFromRows(['#####', '#####', '#####', '#####', '#####'])
    expect(() => findNearestOpen(m, 2, 2)).toThrow(PlacementError)
    expect(() => findNearestOpen(m, 2, 2)).toThrow('no open cell near (2, 2)')
  })
})
