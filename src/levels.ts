export type LevelCfg = {
  adversaries:number
  speed:number
  /** frames between adversary steps */
  moveInterval:number
  exitBonus:number
}

export const KILL_SCORE = 100

/** Frames between steps for a chaser moving `speed` cells per second. */
export const stepInterval=(speed:number, fps=60)=>Math.max(1, Math.floor(fps/speed))

export function makeLevel(level:number, opts:{ maxAdversaries?:number; fps?:number }={}):LevelCfg{
  const maxAdversaries = opts.maxAdversaries ?? 5
  const fps = opts.fps ?? 60
  const speed = 0.5 + (level-2)*0.2
  return {
    adversaries: level>1 ? Math.min(level-1, maxAdversaries) : 0,
    speed,
    moveInterval: stepInterval(speed, fps),
    exitBonus: 1000*level,
  }
}
