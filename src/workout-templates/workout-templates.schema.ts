import { z } from 'zod'

const zoneNumberSchema = z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4), z.literal(5)])

const pct = z.number().positive().max(3)

const stepTargetSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('ftp'), pct }),
  z.object({ kind: z.literal('css'), pct }),
  z.object({ kind: z.literal('thresholdPace'), pct }),
  z.object({ kind: z.literal('zone'), zone: zoneNumberSchema }),
])

const templateStepSchema = z.object({
  kind: z.enum(['warmup', 'main', 'interval', 'rest', 'cooldown']),
  durationSeconds: z.number().int().positive(),
  target: stepTargetSchema,
  targetRpe: z.number().min(1).max(10).optional(),
  description: z.string().optional(),
})

export const workoutTemplateSchema = z
  .object({
    id: z.string().min(1),
    version: z.number().int().positive(),
    name: z.string().min(1),
    discipline: z.enum(['swim', 'bike', 'run']),
    category: z.enum(['recovery', 'endurance', 'tempo', 'intervals', 'long', 'calibration']),
    difficultyTier: z.number().int().min(1).max(5),
    description: z.string(),
    steps: z.array(templateStepSchema).min(1),
  })
  .refine(
    (t) =>
      t.steps.every(
        (s) =>
          (s.target.kind !== 'ftp' || t.discipline === 'bike') &&
          (s.target.kind !== 'css' || t.discipline === 'swim') &&
          (s.target.kind !== 'thresholdPace' || t.discipline === 'run'),
      ),
    { message: 'Percentage targets must reference the scalar of the template discipline' },
  )

export const templateLibraryFileSchema = z
  .object({
    libraryVersion: z.number().int().positive(),
    templates: z.array(workoutTemplateSchema).min(1),
  })
  .refine(
    (lib) => new Set(lib.templates.map((t) => `${t.id}@${t.version}`)).size === lib.templates.length,
    { message: 'Template (id, version) pairs must be unique' },
  )

export type TemplateLibraryFile = z.infer<typeof templateLibraryFileSchema>
