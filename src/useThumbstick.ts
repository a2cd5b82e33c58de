// useThumbstick.ts
import { useEffect, useRef } from 'react'
import type { RefObject } from 'react'
import type { Direction } from './types'
import { quantize } from './utils'

type Pt = { x: number; y: number }

/**
 * Movement stick for the left half of the canvas.
 * The maze is walked cell by cell, so the vector is snapped to one of four
 * directions; `dirRef` stays null while the thumb rests in the dead zone.
 */
export function useThumbstick(
  canvasRef: RefObject<HTMLCanvasElement | null>,
  enabled: boolean
) {
  const dirRef = useRef<Direction | null>(null)

  const idRef = useRef<number | null>(null)
  const originRef = useRef<Pt>({ x: 0, y: 0 })

  useEffect(() => {
    const c = canvasRef.current
    if (!c || !enabled) {
      dirRef.current = null
      idRef.current = null
      return
    }

    const R = 90           // radius
    const DZ = 14          // deadzone, px
    const RECENTER = 0.28  // origin follows the thumb when it drifts far

    const local = (e: PointerEvent) => {
      const r = c.getBoundingClientRect()
      return { x: e.clientX - r.left, y: e.clientY - r.top }
    }

    const onDown = (e: PointerEvent) => {
      if (e.pointerType !== 'touch' && e.pointerType !== 'pen') return
      if (idRef.current !== null) return
      const p = local(e)
      if (p.x > c.clientWidth * 0.5) return
      idRef.current = e.pointerId
      c.setPointerCapture(e.pointerId)
      originRef.current = p
      dirRef.current = null
    }

    const onMove = (e: PointerEvent) => {
      if (idRef.current === null || e.pointerId !== idRef.current) return
      if (e.pointerType === 'touch') e.preventDefault()

      const p = local(e)
      const dx = p.x - originRef.current.x
      const dy = p.y - originRef.current.y
      const len = Math.hypot(dx, dy)
      dirRef.current = len > DZ ? quantize(dx / R, dy / R, 0) : null

      if (len > R * 0.6) {
        originRef.current.x += dx * RECENTER * 0.06
        originRef.current.y += dy * RECENTER * 0.06
      }
    }

    const endGesture = (pointerId: number) => {
      if (idRef.current === null || pointerId !== idRef.current) return
      if (c.hasPointerCapture(pointerId)) c.releasePointerCapture(pointerId)
      idRef.current = null
      dirRef.current = null
    }

    const onUp = (e: PointerEvent) => endGesture(e.pointerId)
    const onLost = () => {
      idRef.current = null
      dirRef.current = null
    }

    c.addEventListener('pointerdown', onDown, { passive: true })
    c.addEventListener('pointermove', onMove, { passive: false })
    c.addEventListener('pointerup', onUp)
    c.addEventListener('pointercancel', onUp)
    c.addEventListener('lostpointercapture', onLost)
    window.addEventListener('blur', onLost)

    return () => {
      c.removeEventListener('pointerdown', onDown)
      c.removeEventListener('pointermove', onMove)
      c.removeEventListener('pointerup', onUp)
      c.removeEventListener('pointercancel', onUp)
      c.removeEventListener('lostpointercapture', onLost)
      window.removeEventListener('blur', onLost)
      dirRef.current = null
      idRef.current = null
    }
  }, [canvasRef, enabled])

  return { dirRef }
}
