import type { Cell, Direction } from './types'

export const clamp=(v:number,min:number,max:number)=>Math.max(min,Math.min(max,v))
export const manhattan=(a:Cell,b:Cell)=>Math.abs(a.x-b.x)+Math.abs(a.y-b.y)
let __id=1; export const id=()=>(__id++)

export const DIRS:Readonly<Record<Direction,Cell>>={
  up:{x:0,y:-1}, down:{x:0,y:1}, left:{x:-1,y:0}, right:{x:1,y:0},
}

/** Dominant-axis direction of a stick vector, or null inside the dead zone. */
export const quantize=(ax:number,ay:number,dead=0.25):Direction|null=>{
  if(Math.hypot(ax,ay)<dead) return null
  if(Math.abs(ax)>Math.abs(ay)) return ax>0?'right':'left'
  return ay>0?'down':'up'
}
