import { z } from 'zod'
import { ConfigError } from './errors'

const oddSize = (min:number, max:number) =>
  z.coerce.number().int().min(min).max(max)
    .refine(n => n % 2 === 1, { message: 'must be odd' })

export const configSchema = z.object({
  cellSize: z.coerce.number().int().min(4).max(64).default(20),
  mazeWidth: oddSize(5, 101).default(35),
  mazeHeight: oddSize(5, 101).default(25),
  fps: z.coerce.number().int().min(10).max(240).default(60),
  /** frames between player steps while a move key is held */
  moveSpeed: z.coerce.number().int().min(1).max(60).default(6),
  shootCooldown: z.coerce.number().int().min(1).max(240).default(15),
  laserSpeed: z.coerce.number().positive().max(1).default(0.5),
  laserTrail: z.coerce.number().int().min(0).max(32).default(8),
  explosionFrames: z.coerce.number().int().min(2).max(240).default(20),
  maxAdversaries: z.coerce.number().int().min(0).max(50).default(5),
  chase: z.enum(['greedy', 'bfs']).default('greedy'),
  seed: z.string().min(1).optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  lang: z.enum(['en', 'he']).default('en'),
})

export type GameConfig = z.infer<typeof configSchema>

export const DEFAULT_CONFIG: GameConfig = configSchema.parse({})

/** Overrides from a page query string, e.g. `?seed=abc&chase=bfs`. */
export function loadConfig(query: string | URLSearchParams = ''): GameConfig {
  const params = typeof query === 'string' ? new URLSearchParams(query) : query
  const raw: Record<string, string> = {}
  for (const key of Object.keys(configSchema.shape)) {
    const v = params.get(key)
    if (v !== null && v !== '') raw[key] = v
  }
  const parsed = configSchema.safeParse(raw)
  if (!parsed.success) throw new ConfigError(parsed.error.issues)
  return parsed.data
}
