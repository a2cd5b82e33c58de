import { useEffect, useRef } from 'react'
import type { RefObject } from 'react'
import type { Direction } from './types'
import { clamp, quantize } from './utils'

type Pt = { x: number; y: number }

/**
 * Right-half stick: turns the gun and fires while deflected.
 * Touch/pen only. The gun keeps its last direction after release, since the
 * engine only turns it while `dirRef` is set.
 */
export function useAimstick(
  canvasRef: RefObject<HTMLCanvasElement | null>,
  enabled: boolean
) {
  const dirRef = useRef<Direction | null>(null)
  const firingRef = useRef(false)

  const idRef = useRef<number | null>(null)
  const originRef = useRef<Pt>({ x: 0, y: 0 })

  useEffect(() => {
    const c = canvasRef.current
    if (!c || !enabled) {
      dirRef.current = null
      firingRef.current = false
      return
    }

    const R = 100
    const FIRE_TH = 0.2   // deflection that counts as "aiming"

    c.style.touchAction = 'none'

    const local = (e: PointerEvent) => {
      const r = c.getBoundingClientRect()
      return { x: e.clientX - r.left, y: e.clientY - r.top }
    }

    const onDown = (e: PointerEvent) => {
      if (e.pointerType !== 'touch' && e.pointerType !== 'pen') return
      if (idRef.current !== null) return
      const p = local(e)
      if (p.x < c.clientWidth * 0.5) return
      idRef.current = e.pointerId
      c.setPointerCapture(e.pointerId)
      originRef.current = p
      firingRef.current = false
    }

    const onMove = (e: PointerEvent) => {
      if (idRef.current === null || e.pointerId !== idRef.current) return
      if (e.pointerType === 'touch') e.preventDefault()
      const p = local(e)
      const nx = clamp((p.x - originRef.current.x) / R, -1, 1)
      const ny = clamp((p.y - originRef.current.y) / R, -1, 1)
      const d = quantize(nx, ny, FIRE_TH)
      if (d) dirRef.current = d
      firingRef.current = d !== null
    }

    const onEnd = (e: PointerEvent) => {
      if (idRef.current === null || e.pointerId !== idRef.current) return
      if (c.hasPointerCapture(e.pointerId)) c.releasePointerCapture(e.pointerId)
      idRef.current = null
      dirRef.current = null
      firingRef.current = false
    }

    c.addEventListener('pointerdown', onDown, { passive: true })
    c.addEventListener('pointermove', onMove, { passive: false })
    c.addEventListener('pointerup', onEnd)
    c.addEventListener('pointercancel', onEnd)

    return () => {
      c.removeEventListener('pointerdown', onDown)
      c.removeEventListener('pointermove', onMove)
      c.removeEventListener('pointerup', onEnd)
      c.removeEventListener('pointercancel', onEnd)
      dirRef.current = null
      firingRef.current = false
      idRef.current = null
    }
  }, [canvasRef, enabled])

  return { dirRef, firingRef }
}
