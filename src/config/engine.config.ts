import { z } from 'zod'
import { PHASE_ORDER, type TrainingPhase } from '../types/training.types'

export const ENGINE_CONFIG = Symbol('ENGINE_CONFIG')

const intFromEnv = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback)

const phaseSplitSchema = z
  .string()
  .default('0.25,0.5,0.125,0.125')
  .transform((raw, ctx) => {
    const parts = raw.split(',').map((p) => Number(p.trim()))
    if (parts.length !== PHASE_ORDER.length || parts.some((p) => !Number.isFinite(p) || p < 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'PHASE_SPLIT must be four non-negative numbers (BASE,BUILD,PEAK,TAPER)',
      })
      return z.NEVER
    }
    const total = parts.reduce((sum, p) => sum + p, 0)
    if (total <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'PHASE_SPLIT must not be all zeros' })
      return z.NEVER
    }
    const split: Record<TrainingPhase, number> = { BASE: 0, BUILD: 0, PEAK: 0, TAPER: 0 }
    PHASE_ORDER.forEach((phase, i) => {
      split[phase] = (parts[i] ?? 0) / total
    })
    return split
  })

const engineEnvSchema = z.object({
  PORT: intFromEnv(3000, 1),
  TRAINING_STORE: z.enum(['memory', 'postgres']).default('memory'),
  DATABASE_URL: z.string().url().optional(),
  STORE_TIMEOUT_MS: intFromEnv(5000, 1),
  STORE_RETRY_BACKOFF_MS: intFromEnv(200, 0),
  SWEEP_CONCURRENCY: intFromEnv(4, 1),
  DEFAULT_PLAN_WEEKS: intFromEnv(12, 1),
  PHASE_SPLIT: phaseSplitSchema,
  TEMPLATE_LIBRARY_PATH: z.string().min(1).optional(),
})

export type EngineConfig = {
  port: number
  store: { kind: 'memory' } | { kind: 'postgres'; databaseUrl: string }
  storeTimeoutMs: number
  storeRetryBackoffMs: number
  sweepConcurrency: number
  defaultPlanWeeks: number
  phaseSplit: Record<TrainingPhase, number>
  templateLibraryPath?: string
}

export function loadEngineConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const parsed = engineEnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new Error(`Invalid engine configuration: ${JSON.stringify(parsed.error.format())}`)
  }
  const e = parsed.data

  if (e.TRAINING_STORE === 'postgres' && !e.DATABASE_URL) {
    throw new Error('Invalid engine configuration: DATABASE_URL is required when TRAINING_STORE=postgres')
  }

  return {
    port: e.PORT,
    store:
      e.TRAINING_STORE === 'postgres' && e.DATABASE_URL
        ? { kind: 'postgres', databaseUrl: e.DATABASE_URL }
        : { kind: 'memory' },
    storeTimeoutMs: e.STORE_TIMEOUT_MS,
    storeRetryBackoffMs: e.STORE_RETRY_BACKOFF_MS,
    sweepConcurrency: e.SWEEP_CONCURRENCY,
    defaultPlanWeeks: e.DEFAULT_PLAN_WEEKS,
    phaseSplit: e.PHASE_SPLIT,
    templateLibraryPath: e.TEMPLATE_LIBRARY_PATH,
  }
}
