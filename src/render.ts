import type { GameConfig } from './config'
import type { World } from './engine'
import type { Strings } from './strings'
import { explosionRadius } from './engine'
import { exitCell, isWall } from './maze'
import { DIRS } from './utils'

/** The slice of the 2D context the renderer draws with. */
export type Painter = Pick<CanvasRenderingContext2D,
  'fillStyle'|'strokeStyle'|'lineWidth'|'globalAlpha'|'font'|'textAlign'|'textBaseline'|
  'fillRect'|'beginPath'|'arc'|'fill'|'moveTo'|'lineTo'|'stroke'|'fillText'|'save'|'restore'>

export const PALETTE = {
  bg:'#000000',
  wall:'#ffffff',
  floor:'#404040',
  exit:'#00ff00',
  player:'#ff0000',
  barrel:'#ffffff',
  adversary:'#ffa500',
  laser:'#ffff00',
  hud:'#ffffff',
} as const

const EXPLOSION_RINGS = [PALETTE.laser, PALETTE.adversary, PALETTE.player] as const
const MIN_W = 800, MIN_H = 600
/** room above the maze for the HUD */
export const HUD_H = 50

export type Layout = { width:number; height:number; offsetX:number; offsetY:number }

export function layout(cfg:GameConfig):Layout{
  const mw = cfg.mazeWidth*cfg.cellSize, mh = cfg.mazeHeight*cfg.cellSize
  const width = Math.max(MIN_W, mw), height = Math.max(MIN_H, HUD_H*2+mh)
  return { width, height, offsetX:Math.floor((width-mw)/2), offsetY:HUD_H }
}

export function drawWorld(ctx:Painter, world:World, t:Strings){
  const { cfg, maze, player } = world
  const L = layout(cfg), cs = cfg.cellSize, half = Math.floor(cs/2)
  const px = (x:number) => L.offsetX + x*cs
  const py = (y:number) => L.offsetY + y*cs

  ctx.fillStyle = PALETTE.bg
  ctx.fillRect(0, 0, L.width, L.height)

  for(let y=0; y<maze.height; y++){
    for(let x=0; x<maze.width; x++){
      ctx.fillStyle = isWall(maze, x, y) ? PALETTE.wall : PALETTE.floor
      ctx.fillRect(px(x), py(y), cs, cs)
    }
  }
  const exit = exitCell(maze)
  ctx.fillStyle = PALETTE.exit
  ctx.fillRect(px(exit.x), py(exit.y), cs, cs)

  // player + barrel
  ctx.fillStyle = PALETTE.player
  ctx.fillRect(px(player.x)+2, py(player.y)+2, cs-4, cs-4)
  const d = DIRS[player.gun]
  const gx = px(player.x)+half, gy = py(player.y)+half
  ctx.strokeStyle = PALETTE.barrel
  ctx.lineWidth = 3
  ctx.beginPath()
  ctx.moveTo(gx, gy)
  ctx.lineTo(gx+d.x*(half+4), gy+d.y*(half+4))
  ctx.stroke()

  ctx.fillStyle = PALETTE.adversary
  for(const a of world.adversaries) ctx.fillRect(px(a.x)+2, py(a.y)+2, cs-4, cs-4)

  // lasers fade in along their trail
  for(const l of world.lasers){
    ctx.save()
    ctx.fillStyle = PALETTE.laser
    l.trail.forEach((c, i) => {
      ctx.globalAlpha = (i+1)/l.trail.length
      ctx.fillRect(px(c.x)+half-1, py(c.y)+half-1, 2, 2)
    })
    ctx.globalAlpha = 1
    ctx.fillRect(px(Math.trunc(l.x))+half-2, py(Math.trunc(l.y))+half-2, 4, 4)
    ctx.restore()
  }

  for(const e of world.explosions){
    const r = explosionRadius(e, cfg)
    if(r<=0) continue
    EXPLOSION_RINGS.forEach((color, i) => {
      ctx.fillStyle = color
      ctx.beginPath()
      ctx.arc(px(e.x)+half, py(e.y)+half, Math.max(1, r-i*2), 0, Math.PI*2)
      ctx.fill()
    })
  }

  drawHud(ctx, world, t, L)
}

function drawHud(ctx:Painter, world:World, t:Strings, L:Layout){
  ctx.fillStyle = PALETTE.hud
  ctx.font = '20px monospace'
  ctx.textBaseline = 'top'
  ctx.textAlign = 'left'
  ctx.fillText(`${t.level}: ${world.level}`, 10, 10)
  ctx.fillText(`${t.score}: ${world.score}`, 10, 30)
  ctx.textAlign = 'right'
  ctx.fillText(`${t.enemies}: ${world.adversaries.length}`, L.width-10, 10)
  ctx.fillText(`${t.gun}: ${world.player.shootCooldown===0 ? t.ready : t.reloading}`, L.width-10, 30)
}
