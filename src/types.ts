export type Direction = 'up'|'down'|'left'|'right'
export type Phase = 'menu'|'playing'|'gameOver'|'levelComplete'
export type ChaseStrategy = 'greedy'|'bfs'
export type Lang = 'he'|'en'

export type Cell = { x:number; y:number }

export type Maze = {
  width:number; height:number;
  /** row-major, 1 = wall, 0 = open */
  cells:Uint8Array
}

export type PlayerState = Cell & {
  gun:Direction; shootCooldown:number; moveCooldown:number; moveSpeed:number
}
export type Adversary = Cell & { id:number; speed:number; moveTimer:number }
export type Laser = {
  id:number; x:number; y:number; dx:number; dy:number;
  active:boolean; trail:Cell[]
}
export type Explosion = Cell & { id:number; timer:number }

/** Held controls sampled once per frame. */
export type FrameInput = {
  move:Direction|null
  aim:Direction|null
  fire:boolean
}
/** One-shot key presses; held state lives in FrameInput. */
export type PressKey = 'fire'|'restart'|'menu'|'pause'

export type GameEvent =
  | { type:'started'; level:number }
  | { type:'moved'; x:number; y:number }
  | { type:'fired' }
  | { type:'adversaryDestroyed'; x:number; y:number; score:number }
  | { type:'caught'; score:number }
  | { type:'levelComplete'; level:number; score:number }
  | { type:'restarted' }
  | { type:'menu' }
  | { type:'paused' }
  | { type:'resumed' }
