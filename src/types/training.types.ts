export type Discipline = 'swim' | 'bike' | 'run'

export const DISCIPLINES: readonly Discipline[] = ['swim', 'bike', 'run']

export type ZoneNumber = 1 | 2 | 3 | 4 | 5

export type TrainingPhase = 'BASE' | 'BUILD' | 'PEAK' | 'TAPER'

export const PHASE_ORDER: readonly TrainingPhase[] = ['BASE', 'BUILD', 'PEAK', 'TAPER']

export type VolumeTier = 1 | 2 | 3

export type PriorityLevel = 1 | 2 | 3

export type CalibrationMethod = 'manual' | 'calibration_week'

export type OnboardingStatus = 'STARTED' | 'BIOMETRICS_PENDING' | 'COMPLETED'

export type ExperienceLevel = 'finisher' | 'competitor'

export type Gender = 'male' | 'female' | 'other'

export type RaceDistance = 'sprint' | 'olympic' | '70.3' | '140.6'

export type User = {
  id: string
  calibrationMethod: CalibrationMethod
  trainingVolumeTier: VolumeTier | null
  experienceLevel: ExperienceLevel | null
  onboardingStatus: OnboardingStatus
  dateOfBirth: string | null // YYYY-MM-DD
  gender: Gender | null
  primaryRaceId: string | null
}

export type Race = {
  id: string
  name: string
  date: string // YYYY-MM-DD
  distance: RaceDistance
}

export type Biometrics = {
  userId: string
  criticalSwimSpeed: number | null // sec / 100m
  functionalThresholdPower: number | null // watts
  thresholdRunPace: number | null // sec / mile
  maxHeartRate: number | null
  restingHeartRate: number | null
  recordedAt: string
}

export type HeartRateZoneMethod = 'STANDARD' | 'KARVONEN'

export type HeartRateZone = {
  zoneNumber: ZoneNumber
  minHr: number
  maxHr: number
  method: HeartRateZoneMethod
}

export type PlanStatus = 'active' | 'completed' | 'archived'

/** `maintenance` plans have no race and grow a couple of weeks at a time. */
export type PlanType = 'race' | 'maintenance'

export type PhaseBlock = {
  phase: TrainingPhase
  weeks: number
}

export type TrainingPlan = {
  id: string
  userId: string
  name: string
  planType: PlanType
  raceId: string | null
  raceDate: string | null
  startDate: string // Monday, YYYY-MM-DD
  currentPhase: TrainingPhase
  currentWeek: number
  totalWeeks: number
  volumeTier: VolumeTier
  phases: PhaseBlock[]
  hasCalibrationWeek: boolean
  status: PlanStatus
  createdAt: string
}

/**
 * Template intensity coefficient. Exactly one case per step: a fraction of
 * one of the user's scalars, or a bare training zone.
 */
export type StepTarget =
  | { kind: 'ftp'; pct: number }
  | { kind: 'css'; pct: number }
  | { kind: 'thresholdPace'; pct: number }
  | { kind: 'zone'; zone: ZoneNumber }

export type StepKind = 'warmup' | 'main' | 'interval' | 'rest' | 'cooldown'

export type TemplateStep = {
  kind: StepKind
  durationSeconds: number
  target: StepTarget
  targetRpe?: number
  description?: string
}

export type TemplateCategory = 'recovery' | 'endurance' | 'tempo' | 'intervals' | 'long' | 'calibration'

export type WorkoutTemplate = {
  id: string
  version: number
  name: string
  discipline: Discipline
  category: TemplateCategory
  difficultyTier: number
  description: string
  steps: TemplateStep[]
}

export type TargetRange = { low: number; high: number }

export type MaterializedTarget =
  | { kind: 'power'; watts: number; range?: TargetRange }
  | { kind: 'swimPace'; secondsPer100m: number; range?: TargetRange }
  | { kind: 'runPace'; secondsPerMile: number; range?: TargetRange }
  | { kind: 'heartRate'; bpm: number; range?: TargetRange }
  | { kind: 'zoneOnly' }

export type MaterializedStep = {
  kind: StepKind
  durationSeconds: number
  targetZone: ZoneNumber
  targetRpe?: number
  description: string
  target: MaterializedTarget
}

export type CalculatedStructure = {
  title: string
  description: string
  totalDurationSeconds: number
  steps: MaterializedStep[]
}

export type WorkoutStatus = 'planned' | 'completed' | 'missed' | 'skipped'

export type SkipReason = 'too_tired' | 'sick' | 'schedule_conflict' | 'other'

export type CalibrationTestType = 'swim_400m' | 'bike_20min' | 'run_1mile'

export type Workout = {
  id: string
  planId: string
  templateId: string
  templateVersion: number
  discipline: Discipline
  weekNumber: number
  phase: TrainingPhase
  scheduledDate: string
  priorityLevel: PriorityLevel
  status: WorkoutStatus
  intensityScalar: number
  durationScale: number
  zoneCap: ZoneNumber | null
  targetRpe: number | null
  wasAdapted: boolean
  isCalibrationTest: boolean
  calibrationTest: CalibrationTestType | null
  skipReason: SkipReason | null
  calculatedStructure: CalculatedStructure
  version: number
}

export type ActivitySource = 'manual_input' | 'apple_health' | 'active_mode_recording'

export type ActivityLog = {
  id: string
  workoutId: string
  userId: string
  completedAt: string
  durationSeconds: number
  distanceMeters: number | null
  averageHeartRate: number | null
  source: ActivitySource
}

export type FeedbackRating = 'easier' | 'same' | 'harder'

export type FeedbackLog = {
  id: string
  activityLogId: string
  rating: FeedbackRating
  rpeScore: number | null
  targetRpe: number | null
  triggeredStrike: boolean
  createdAt: string
}

export type UserTrainingState = {
  userId: string
  currentFatigueStrikes: number
  lastStrikeDate: string | null
  lastAdaptationDate: string | null
  totalAdaptations: number
  consecutiveCompletes: number
  acuteTrainingLoad: number
  chronicTrainingLoad: number
  version: number
  updatedAt: string
}

export type AdaptationTriggerReason = 'FATIGUE_STRIKES' | 'RPE_EXCEEDED' | 'COMPLIANCE'

export type AdaptationLog = {
  id: string
  userId: string
  triggeredAt: string
  triggerReason: AdaptationTriggerReason
  fatigueStrikesAtTrigger: number
  workoutsAffected: number
  actionsTaken: {
    intensityCuts: string[]
    volumeConversions: string[]
    shortfall: { intensityCuts: number; volumeConversions: number }
    notificationRequested: boolean
  }
}
