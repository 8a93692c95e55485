import { readFileSync } from 'fs'
import { join } from 'path'
import { NotFoundError } from '../common/errors'
import type { Discipline, TemplateCategory, WorkoutTemplate } from '../types/training.types'
import { templateLibraryFileSchema } from './workout-templates.schema'

export const DEFAULT_TEMPLATE_LIBRARY_PATH = join(__dirname, '..', '..', 'data', 'workout-templates.json')

export type TemplateFilter = {
  discipline?: Discipline
  categories?: readonly TemplateCategory[]
}

/**
 * Read-only, versioned template catalogue. Workouts pin `(templateId,
 * templateVersion)`, so every version ever shipped stays addressable.
 */
export class TemplateLibrary {
  private readonly byKey = new Map<string, WorkoutTemplate>()
  private readonly latest = new Map<string, WorkoutTemplate>()

  constructor(templates: readonly WorkoutTemplate[]) {
    for (const t of templates) {
      this.byKey.set(`${t.id}@${t.version}`, t)
      const current = this.latest.get(t.id)
      if (!current || current.version < t.version) this.latest.set(t.id, t)
    }
  }

  static fromFile(path: string = DEFAULT_TEMPLATE_LIBRARY_PATH): TemplateLibrary {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf8'))
    const parsed = templateLibraryFileSchema.safeParse(raw)
    if (!parsed.success) {
      throw new Error(`Invalid template library ${path}: ${parsed.error.message}`)
    }
    return new TemplateLibrary(parsed.data.templates)
  }

  /** Exact version when given, otherwise the newest one. */
  get(id: string, version?: number): WorkoutTemplate {
    const template = version === undefined ? this.latest.get(id) : this.byKey.get(`${id}@${version}`)
    if (!template) {
      throw new NotFoundError(`Workout template not found: ${id}${version === undefined ? '' : `@${version}`}`)
    }
    return template
  }

  /** Latest version of every template matching the filter, ordered by id. */
  list(filter: TemplateFilter = {}): WorkoutTemplate[] {
    return [...this.latest.values()]
      .filter((t) => !filter.discipline || t.discipline === filter.discipline)
      .filter((t) => !filter.categories || filter.categories.includes(t.category))
      .sort((a, b) => a.id.localeCompare(b.id))
  }
}
