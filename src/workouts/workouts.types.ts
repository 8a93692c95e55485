import type { StrikeSignal } from '../adaptation/adaptation.types'
import type {
  ActivitySource,
  ActivityLog,
  AdaptationLog,
  FeedbackLog,
  FeedbackRating,
  Workout,
} from '../types/training.types'

export type ActivityInput = {
  durationSeconds: number
  distanceMeters?: number | null
  averageHeartRate?: number | null
  completedAt?: string
  source: ActivitySource
}

export type FeedbackSubmission = {
  rating: FeedbackRating
  rpeScore?: number | null
}

export type WorkoutEventResult = {
  workout: Workout
  strike: StrikeSignal | null
  currentFatigueStrikes: number
  adaptation: AdaptationLog | null
}

export type CompleteWorkoutResult = WorkoutEventResult & {
  activityLog: ActivityLog
  feedbackLog: FeedbackLog | null
}
