import type { SkipReason, UserTrainingState, ZoneNumber } from '../types/training.types'
import type { FeedbackInput, StrikeSignal, TriggerReasonBySignal } from './adaptation.types'

export const STRIKES_TO_ADAPT = 2
export const COMPLETES_TO_FORGIVE_STRIKE = 5
export const RPE_TOLERANCE = 2

export const INTENSITY_CUT = 0.85
export const INTENSITY_CUT_COUNT = 2
export const VOLUME_CUT = 0.5
export const VOLUME_CUT_COUNT = 1
export const RECOVERY_ZONE_CAP: ZoneNumber = 2
export const RECOVERY_TARGET_RPE = 3

// EWMA decay for 7- and 42-day windows: 2 / (N + 1)
const ACUTE_LAMBDA = 2 / 8
const CHRONIC_LAMBDA = 2 / 43
const DEFAULT_SESSION_RPE = 5

export const TRIGGER_REASON: TriggerReasonBySignal = {
  SUBJECTIVE: 'FATIGUE_STRIKES',
  OBJECTIVE: 'RPE_EXCEEDED',
  COMPLIANCE: 'COMPLIANCE',
}

/**
 * At most one signal per submission: a "harder" rating wins over an RPE
 * overshoot when both are present.
 */
export function evaluateFeedback(feedback: FeedbackInput, targetRpe: number | null): StrikeSignal | null {
  if (feedback.rating === 'harder') return 'SUBJECTIVE'
  if (feedback.rpeScore != null && targetRpe != null && feedback.rpeScore > targetRpe + RPE_TOLERANCE) {
    return 'OBJECTIVE'
  }
  return null
}

export function evaluateSkip(reason: SkipReason): StrikeSignal | null {
  return reason === 'too_tired' || reason === 'sick' ? 'COMPLIANCE' : null
}

export function initialTrainingState(userId: string, nowIso: string): UserTrainingState {
  return {
    userId,
    currentFatigueStrikes: 0,
    lastStrikeDate: null,
    lastAdaptationDate: null,
    totalAdaptations: 0,
    consecutiveCompletes: 0,
    acuteTrainingLoad: 0,
    chronicTrainingLoad: 0,
    version: 0,
    updatedAt: nowIso,
  }
}

/** minutes x session RPE */
export function sessionLoad(durationSeconds: number, rpe: number | null | undefined): number {
  return (durationSeconds / 60) * (rpe ?? DEFAULT_SESSION_RPE)
}

const round2 = (n: number) => Math.round(n * 100) / 100

export function applyLoad(state: UserTrainingState, load: number): UserTrainingState {
  return {
    ...state,
    acuteTrainingLoad: round2(state.acuteTrainingLoad + ACUTE_LAMBDA * (load - state.acuteTrainingLoad)),
    chronicTrainingLoad: round2(state.chronicTrainingLoad + CHRONIC_LAMBDA * (load - state.chronicTrainingLoad)),
  }
}

/** A clean completion; the fifth in a row forgives one pending strike. */
export function applyCleanCompletion(state: UserTrainingState): UserTrainingState {
  const run = state.consecutiveCompletes + 1
  if (run < COMPLETES_TO_FORGIVE_STRIKE) {
    return { ...state, consecutiveCompletes: run }
  }
  return {
    ...state,
    consecutiveCompletes: 0,
    currentFatigueStrikes: Math.max(0, state.currentFatigueStrikes - 1),
  }
}

export function applyStrike(state: UserTrainingState, today: string): UserTrainingState {
  return {
    ...state,
    currentFatigueStrikes: Math.min(STRIKES_TO_ADAPT, state.currentFatigueStrikes + 1),
    lastStrikeDate: today,
    consecutiveCompletes: 0,
  }
}

export function roundScalar(value: number): number {
  return Math.round(value * 10000) / 10000
}
