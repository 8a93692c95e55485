import type {
  AdaptationLog,
  AdaptationTriggerReason,
  FeedbackRating,
  UserTrainingState,
} from '../types/training.types'

/** Which kind of evidence produced a strike. */
export type StrikeSignal = 'SUBJECTIVE' | 'OBJECTIVE' | 'COMPLIANCE'

export type FeedbackInput = {
  rating: FeedbackRating
  rpeScore?: number | null
}

export type StrikeOutcome = {
  signal: StrikeSignal | null
  state: UserTrainingState
  adaptation: AdaptationLog | null
}

export type FatigueStatus = {
  currentFatigueStrikes: number
  strikesToAdapt: number
  lastStrikeDate: string | null
  lastAdaptationDate: string | null
  totalAdaptations: number
  consecutiveCompletes: number
  acuteTrainingLoad: number
  chronicTrainingLoad: number
  /** chronic minus acute; negative means recent load is above the usual */
  trainingStressBalance: number
  recentAdaptations: AdaptationLog[]
}

export type TriggerReasonBySignal = Record<StrikeSignal, AdaptationTriggerReason>
