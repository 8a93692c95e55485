import type {
  Discipline,
  PriorityLevel,
  TrainingPhase,
  VolumeTier,
  WorkoutTemplate,
} from '../types/training.types'

export type VolumeTierConfig = {
  tier: VolumeTier
  weeklyHours: { min: number; max: number }
  sessionsPerWeek: Record<Discipline, number>
}

export type TrainingPhaseConfig = {
  phase: TrainingPhase
  intensityModifier: number
  volumeModifier: number
  zoneFocus: string
}

/** What a session is for within its discipline's week. */
export type SlotRole = 'long' | 'quality' | 'easy'

export type SessionRequest = {
  discipline: Discipline
  role: SlotRole
  priority: PriorityLevel
  template: WorkoutTemplate
}

export type PlacedSession = SessionRequest & {
  /** 0 = Monday */
  dayIndex: number
}

export type CreatePlanInput = {
  raceId?: string
  totalWeeks?: number
  startDate?: string
}
