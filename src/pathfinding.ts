import type { Cell, ChaseStrategy, Maze } from './types'
import { isOpen } from './maze'
import { DIRS } from './utils'

/**
 * Step along the axis with the larger gap first, then the other one.
 * No lookahead: dead ends stall the chaser.
 */
export function greedyStep(from:Cell, target:Cell, maze:Maze): Cell {
  const dx = target.x-from.x, dy = target.y-from.y
  const sx = dx>0 ? 1 : -1, sy = dy>0 ? 1 : -1
  const moves: Cell[] = Math.abs(dx)>Math.abs(dy)
    ? [{x:sx,y:0},{x:0,y:sy}]
    : [{x:0,y:sy},{x:sx,y:0}]
  for (const m of moves) {
    const nx = from.x+m.x, ny = from.y+m.y
    if (isOpen(maze,nx,ny)) return {x:nx,y:ny}
  }
  return {x:from.x,y:from.y}
}

const ORDER = [DIRS.up, DIRS.down, DIRS.left, DIRS.right]

/** First step of a shortest open path, or stay put when there is none. */
export function bfsStep(from:Cell, target:Cell, maze:Maze): Cell {
  const stay = {x:from.x,y:from.y}
  if (from.x===target.x && from.y===target.y) return stay
  if (!isOpen(maze,target.x,target.y)) return stay

  const key = (x:number,y:number) => y*maze.width+x
  const root = key(from.x,from.y)
  // parent[k] = key of the cell we came from; -1 marks the root
  const parent = new Map<number,number>([[root,-1]])
  const queue: Cell[] = [from]
  for (let head=0; head<queue.length; head++) {
    const cur = queue[head]
    for (const d of ORDER) {
      const nx = cur.x+d.x, ny = cur.y+d.y, k = key(nx,ny)
      if (parent.has(k) || !isOpen(maze,nx,ny)) continue
      parent.set(k, key(cur.x,cur.y))
      if (nx===target.x && ny===target.y) {
        // walk back to the cell adjacent to the start
        let step = k
        let prev = key(cur.x,cur.y)
        while (prev!==root && prev!==-1) {
          step = prev
          prev = parent.get(prev) ?? -1
        }
        return {x: step % maze.width, y: Math.floor(step/maze.width)}
      }
      queue.push({x:nx,y:ny})
    }
  }
  return stay
}

export function chaseStep(strategy:ChaseStrategy, from:Cell, target:Cell, maze:Maze): Cell {
  return strategy==='bfs' ? bfsStep(from,target,maze) : greedyStep(from,target,maze)
}
