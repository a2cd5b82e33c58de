import type { Cell, Maze } from './types'
import type { Rng } from './rng'
import { PlacementError } from './errors'

const WALL = 1
const OPEN = 0
/** two-cell hops used by the carver */
const HOPS: readonly Cell[] = [{x:0,y:2},{x:2,y:0},{x:0,y:-2},{x:-2,y:0}]

const at = (m:Maze, x:number, y:number) => y*m.width + x

/**
 * Depth-first backtracking carve from (1,1). Odd cells become rooms, the
 * cells between them become corridors; the border stays solid.
 */
export function generateMaze(width:number, height:number, rng:Rng): Maze {
  const m: Maze = { width, height, cells: new Uint8Array(width*height).fill(WALL) }
  const stack: Cell[] = [{x:1,y:1}]
  m.cells[at(m,1,1)] = OPEN

  while (stack.length) {
    const cur = stack[stack.length-1]
    const next: Cell[] = []
    for (const h of HOPS) {
      const nx = cur.x+h.x, ny = cur.y+h.y
      if (nx>0 && nx<width-1 && ny>0 && ny<height-1 && m.cells[at(m,nx,ny)]===WALL) next.push({x:nx,y:ny})
    }
    if (!next.length) { stack.pop(); continue }
    const n = rng.pick(next)
    m.cells[at(m, cur.x+(n.x-cur.x)/2, cur.y+(n.y-cur.y)/2)] = OPEN
    m.cells[at(m,n.x,n.y)] = OPEN
    stack.push(n)
  }

  // exit and its approach
  m.cells[at(m,width-2,height-2)] = OPEN
  m.cells[at(m,width-3,height-2)] = OPEN
  return m
}

export function isWall(m:Maze, x:number, y:number): boolean {
  if (x<0 || x>=m.width || y<0 || y>=m.height) return true
  return m.cells[at(m,x,y)]===WALL
}

export const isOpen = (m:Maze, x:number, y:number) => !isWall(m,x,y)

export const exitCell = (m:Maze): Cell => ({ x: m.width-2, y: m.height-2 })

export const isAtExit = (m:Maze, c:Cell) => c.x>=m.width-2 && c.y>=m.height-2

/** First open cell on growing square rings around (x, y). */
export function findNearestOpen(m:Maze, x:number, y:number): Cell {
  const maxR = Math.floor(Math.min(m.width,m.height)/2)
  for (let r=0; r<maxR; r++) {
    for (let dx=-r; dx<=r; dx++) {
      for (let dy=-r; dy<=r; dy++) {
        if (isOpen(m,x+dx,y+dy)) return {x:x+dx, y:y+dy}
      }
    }
  }
  throw new PlacementError(x,y)
}

/** Build a maze from rows of '#' (wall) and anything else (open). */
export function mazeFromRows(rows:readonly string[]): Maze {
  const height = rows.length, width = height ? rows[0].length : 0
  const m: Maze = { width, height, cells: new Uint8Array(width*height) }
  rows.forEach((row,y)=>{
    if (row.length!==width) throw new RangeError(`row ${y} has ${row.length} cells, expected ${width}`)
    for (let x=0; x<width; x++) m.cells[at(m,x,y)] = row[x]==='#' ? WALL : OPEN
  })
  return m
}
