import type {
  Adversary, Cell, Explosion, FrameInput, GameEvent, Laser, Maze, Phase, PlayerState, PressKey,
} from './types'
import type { GameConfig } from './config'
import type { Rng } from './rng'
import { findNearestOpen, generateMaze, isAtExit, isOpen, isWall } from './maze'
import { chaseStep } from './pathfinding'
import { KILL_SCORE, makeLevel, stepInterval } from './levels'
import { DIRS, id, manhattan } from './utils'
import { getLogger } from './logger'

const log = getLogger('engine')

/** spawn exclusion radius around the player, in cells (Manhattan) */
const SPAWN_CLEARANCE = 5
const RESPAWN_CLEARANCE = 3
/** replacements appear in the top-left block, near the maze entrance */
const RESPAWN_SPAN = 5
const SPAWN_TRIES = 100
const RESPAWN_TRIES = 50

export type World = {
  cfg:GameConfig
  maze:Maze
  phase:Phase
  level:number
  score:number
  /** best score this session; nothing is persisted */
  best:number
  paused:boolean
  player:PlayerState
  adversaries:Adversary[]
  lasers:Laser[]
  explosions:Explosion[]
}

type LevelParts = Pick<World,'maze'|'player'|'adversaries'|'lasers'|'explosions'>

export const IDLE: FrameInput = { move:null, aim:null, fire:false }

/* ===== entities ===== */
export function makePlayer(at:Cell, cfg:GameConfig):PlayerState{
  return { x:at.x, y:at.y, gun:'right', shootCooldown:0, moveCooldown:0, moveSpeed:cfg.moveSpeed }
}
export function makeAdversary(at:Cell, speed:number):Adversary{
  return { id:id(), x:at.x, y:at.y, speed, moveTimer:0 }
}
export function makeLaser(p:PlayerState, cfg:GameConfig):Laser{
  const d = DIRS[p.gun]
  return { id:id(), x:p.x, y:p.y, dx:d.x*cfg.laserSpeed, dy:d.y*cfg.laserSpeed, active:true, trail:[] }
}
export function makeExplosion(at:Cell, cfg:GameConfig):Explosion{
  return { id:id(), x:at.x, y:at.y, timer:cfg.explosionFrames }
}

/** Grows for the first half of its life, then shrinks back to nothing. */
export function explosionRadius(e:Explosion, cfg:GameConfig):number{
  const progress = 1 - e.timer/cfg.explosionFrames
  return progress<0.5
    ? Math.trunc(progress*2*cfg.cellSize)
    : Math.trunc((2-progress*2)*cfg.cellSize)
}

export function advanceLaser(l:Laser, maze:Maze, trailMax:number){
  if(!l.active) return
  l.trail.push({ x:Math.trunc(l.x), y:Math.trunc(l.y) })
  if(l.trail.length>trailMax) l.trail.shift()
  l.x += l.dx; l.y += l.dy
  if(isWall(maze, Math.trunc(l.x), Math.trunc(l.y))) l.active = false
}

/* ===== level setup ===== */
function levelParts(cfg:GameConfig, level:number, rng:Rng):LevelParts{
  const maze = generateMaze(cfg.mazeWidth, cfg.mazeHeight, rng)
  const player = makePlayer(findNearestOpen(maze, Math.floor(maze.width/2), Math.floor(maze.height/2)), cfg)
  const L = makeLevel(level, cfg)
  const adversaries: Adversary[] = []
  for(let i=0; i<L.adversaries; i++){
    for(let t=0; t<SPAWN_TRIES; t++){
      const at = { x:rng.int(1, maze.width-2), y:rng.int(1, maze.height-2) }
      if(isOpen(maze, at.x, at.y) && manhattan(at, player)>SPAWN_CLEARANCE){
        adversaries.push(makeAdversary(at, L.speed))
        break
      }
    }
  }
  if(adversaries.length<L.adversaries) log.warn('could not place every adversary', { level, wanted:L.adversaries, placed:adversaries.length })
  return { maze, player, adversaries, lasers:[], explosions:[] }
}

export function createWorld(cfg:GameConfig, rng:Rng):World{
  return { cfg, phase:'menu', level:1, score:0, best:0, paused:false, ...levelParts(cfg, 1, rng) }
}

export function buildLevel(world:World, rng:Rng){
  Object.assign(world, levelParts(world.cfg, world.level, rng))
  world.paused = false
  log.debug('level built', { level:world.level, adversaries:world.adversaries.length, start:{ x:world.player.x, y:world.player.y } })
}

function newRun(world:World, rng:Rng){
  world.level = 1
  world.score = 0
  buildLevel(world, rng)
  world.phase = 'playing'
}

function spawnReplacement(world:World, rng:Rng){
  const { maze, player } = world
  const L = makeLevel(world.level, world.cfg)
  const maxX = Math.min(RESPAWN_SPAN, maze.width-2), maxY = Math.min(RESPAWN_SPAN, maze.height-2)
  for(let t=0; t<RESPAWN_TRIES; t++){
    const at = { x:rng.int(1, maxX), y:rng.int(1, maxY) }
    if(isOpen(maze, at.x, at.y) && manhattan(at, player)>RESPAWN_CLEARANCE){
      world.adversaries.push(makeAdversary(at, L.speed))
      return
    }
  }
}

/* ===== per-frame update ===== */
export function step(world:World, input:FrameInput, rng:Rng):GameEvent[]{
  if(world.phase!=='playing' || world.paused) return []
  const events: GameEvent[] = []
  const { maze, player, cfg } = world

  // movement: one cell per cooldown window
  if(player.moveCooldown<=0 && input.move){
    const d = DIRS[input.move]
    if(isOpen(maze, player.x+d.x, player.y+d.y)){
      player.x += d.x; player.y += d.y
      player.moveCooldown = player.moveSpeed
      events.push({ type:'moved', x:player.x, y:player.y })
    }
  }
  if(input.aim) player.gun = input.aim
  if(input.fire && player.shootCooldown<=0){
    player.shootCooldown = cfg.shootCooldown
    world.lasers.push(makeLaser(player, cfg))
    events.push({ type:'fired' })
  }
  if(player.shootCooldown>0) player.shootCooldown--
  if(player.moveCooldown>0) player.moveCooldown--

  for(const a of world.adversaries){
    a.moveTimer++
    if(a.moveTimer>=stepInterval(a.speed, cfg.fps)){
      a.moveTimer = 0
      const next = chaseStep(cfg.chase, a, player, maze)
      a.x = next.x; a.y = next.y
    }
  }

  for(const l of world.lasers) advanceLaser(l, maze, cfg.laserTrail)
  world.lasers = world.lasers.filter(l => l.active)

  for(const e of world.explosions) e.timer--
  world.explosions = world.explosions.filter(e => e.timer>0)

  // each laser takes out at most one adversary
  for(const l of [...world.lasers]){
    const hit = world.adversaries.find(a => Math.abs(l.x-a.x)<1 && Math.abs(l.y-a.y)<1)
    if(!hit) continue
    world.lasers = world.lasers.filter(o => o!==l)
    world.adversaries = world.adversaries.filter(a => a!==hit)
    world.explosions.push(makeExplosion(hit, cfg))
    world.score += KILL_SCORE
    events.push({ type:'adversaryDestroyed', x:hit.x, y:hit.y, score:world.score })
    if(world.level>1) spawnReplacement(world, rng)
  }

  if(world.adversaries.some(a => manhattan(a, player)<=1)){
    world.phase = 'gameOver'
    events.push({ type:'caught', score:world.score })
    log.info('player caught', { level:world.level, score:world.score })
  }
  // reaching the exit overrides a catch in the same frame
  if(isAtExit(maze, player)){
    world.phase = 'levelComplete'
    world.score += makeLevel(world.level, cfg).exitBonus
    events.push({ type:'levelComplete', level:world.level, score:world.score })
    log.info('level complete', { level:world.level, score:world.score })
  }

  world.best = Math.max(world.best, world.score)
  return events
}

/* ===== discrete key presses ===== */
export function pressKey(world:World, key:PressKey, rng:Rng):GameEvent[]{
  switch(world.phase){
    case 'menu':
      if(key!=='fire') return []
      newRun(world, rng)
      return [{ type:'started', level:world.level }]
    case 'gameOver':
      if(key==='restart'){
        newRun(world, rng)
        return [{ type:'restarted' }, { type:'started', level:world.level }]
      }
      if(key==='menu'){ world.phase = 'menu'; return [{ type:'menu' }] }
      return []
    case 'levelComplete':
      if(key==='fire'){
        world.level++
        buildLevel(world, rng)
        world.phase = 'playing'
        return [{ type:'started', level:world.level }]
      }
      if(key==='menu'){ world.phase = 'menu'; return [{ type:'menu' }] }
      return []
    case 'playing':
      if(key!=='pause') return []
      world.paused = !world.paused
      return world.paused ? [{ type:'paused' }] : [{ type:'resumed' }]
  }
}
