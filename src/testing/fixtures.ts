import type { GameConfig } from '../config'
import type { Cell, Maze } from '../types'
import type { World } from '../engine'
import { DEFAULT_CONFIG } from '../config'
import { createRng } from '../rng'
import { createWorld, makePlayer } from '../engine'
import { mazeFromRows } from '../maze'

/** 9 x 5 loop; the exit is (7,3) */
export const LOOP = [
  '#########',
  '#.......#',
  '#.#####.#',
  '#.......#',
  '#########',
] as const

/** 11 x 7 open room; the exit is (9,5) */
export const ROOM = [
  '###########',
  '#.........#',
  '#.........#',
  '#.........#',
  '#.........#',
  '#.........#',
  '###########',
] as const

export function testConfig(overrides: Partial<GameConfig> = {}): GameConfig {
  return { ...DEFAULT_CONFIG, ...overrides }
}

/** A world already in play on a hand-drawn maze. */
export function worldOn(rows: readonly string[], player: Cell, cfg: GameConfig = testConfig()): World {
  const maze: Maze = mazeFromRows(rows)
  const world = createWorld(cfg, createRng('fixture'))
  world.maze = maze
  world.player = makePlayer(player, cfg)
  world.adversaries = []
  world.phase = 'playing'
  return world
}
