// audio.ts — tiny synth with user-gesture unlock; sound never breaks the game
import { getLogger } from './logger'

type OscType = OscillatorType

const log = getLogger('audio')

// Safari still ships the prefixed constructor
type AudioScope = typeof globalThis & { webkitAudioContext?: typeof AudioContext }
const scope: AudioScope = globalThis
const AC: typeof AudioContext | undefined = scope.AudioContext ?? scope.webkitAudioContext

let ctx: AudioContext | null = null
let out: GainNode | null = null
let muted = false

function ensureCtx(): AudioContext | null {
  if (!AC) return null
  if (!ctx) {
    try {
      ctx = new AC()
      out = ctx.createGain()
      out.gain.value = 0.9
      out.connect(ctx.destination)
    } catch (err) {
      log.warn('audio unavailable', { err })
      ctx = null
      out = null
    }
  }
  return ctx
}

async function resume() {
  const c = ensureCtx()
  try {
    if (c && c.state !== 'running') await c.resume()
  } catch (err) {
    log.debug('audio resume refused', { err })
  }
}

function beep(freq = 440, dur = 0.08, type: OscType = 'square', gain = 0.12) {
  const c = ctx ?? ensureCtx()
  if (!c || c.state !== 'running' || !out || muted) return
  const dest = out

  try {
    const t0 = c.currentTime
    const osc = c.createOscillator()
    const g = c.createGain()

    osc.type = type
    osc.frequency.setValueAtTime(freq, t0)

    // fast attack, quick decay
    g.gain.setValueAtTime(0, t0)
    g.gain.linearRampToValueAtTime(gain, t0 + 0.005)
    g.gain.exponentialRampToValueAtTime(Math.max(0.0001, gain * 0.0008), t0 + Math.max(0.01, dur))

    osc.connect(g)
    g.connect(dest)

    osc.start(t0)
    osc.stop(t0 + Math.max(0.02, dur + 0.02))

    osc.onended = () => {
      g.disconnect()
      osc.disconnect()
    }
  } catch (err) {
    log.debug('beep failed', { err, freq })
  }
}

export const synth = {
  resume,
  mute(v: boolean) { muted = v },
  get muted() { return muted },

  fire()   { beep(880, 0.06, 'square',   0.10) },
  step()   { beep(180, 0.02, 'triangle', 0.04) },
  hit()    { beep(220, 0.12, 'sawtooth', 0.16) },
  caught() { beep(110, 0.40, 'square',   0.20) },
  exit()   { beep(1200,0.15, 'triangle', 0.16) },
  start()  { beep(660, 0.08, 'sine',     0.12) },
}
