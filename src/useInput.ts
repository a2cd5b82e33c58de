import { useCallback, useEffect, useRef } from 'react'
import type { Direction, FrameInput, PressKey } from './types'

export type KeyAction = PressKey|'mute'

type Held = 'up'|'down'|'left'|'right'|'aimUp'|'aimDown'|'aimLeft'|'aimRight'|'fire'

// physical key codes, so non-Latin layouts play the same
const HELD: Readonly<Record<string,Held>> = {
  ArrowUp:'up', ArrowDown:'down', ArrowLeft:'left', ArrowRight:'right',
  KeyW:'aimUp', KeyS:'aimDown', KeyA:'aimLeft', KeyD:'aimRight',
  Space:'fire',
}
const PRESS: Readonly<Record<string,KeyAction>> = {
  Space:'fire', Enter:'fire', NumpadEnter:'fire',
  KeyR:'restart', Escape:'menu', KeyP:'pause', KeyM:'mute',
}

// first held key wins
const MOVE_ORDER: readonly [Held,Direction][] = [['up','up'],['down','down'],['left','left'],['right','right']]
const AIM_ORDER: readonly [Held,Direction][] = [['aimLeft','left'],['aimRight','right'],['aimUp','up'],['aimDown','down']]

const first=(keys:ReadonlySet<Held>, order:readonly [Held,Direction][])=>{
  for(const [k,d] of order) if(keys.has(k)) return d
  return null
}

/**
 * Keyboard controls. Held keys are sampled by the loop through `read()`;
 * discrete presses go to `onPress` once per physical keydown.
 */
export function useInput(onPress:(action:KeyAction)=>void){
  const keys = useRef(new Set<Held>())
  const pressRef = useRef(onPress)
  pressRef.current = onPress

  useEffect(()=>{
    const held = keys.current
    const onKey = (e:KeyboardEvent)=>{
      const h = HELD[e.code]
      // held keys include arrows and space, which would scroll the page
      if(h) { held.add(h); e.preventDefault() }
      const p = PRESS[e.code]
      if(p && !e.repeat) pressRef.current(p)
    }
    const onKeyUp = (e:KeyboardEvent)=>{
      const h = HELD[e.code]
      if(h) held.delete(h)
    }
    const onBlur = ()=>held.clear()
    window.addEventListener('keydown', onKey)
    window.addEventListener('keyup', onKeyUp)
    window.addEventListener('blur', onBlur)
    return ()=>{
      window.removeEventListener('keydown', onKey)
      window.removeEventListener('keyup', onKeyUp)
      window.removeEventListener('blur', onBlur)
      held.clear()
    }
  },[])

  const read = useCallback(():FrameInput=>({
    move: first(keys.current, MOVE_ORDER),
    aim: first(keys.current, AIM_ORDER),
    fire: keys.current.has('fire'),
  }),[])

  return { read } as const
}
