import type { ScalarPatch } from '../biometrics/biometrics.types'
import type { PlanView } from '../training-plan/training-plan.service'
import type {
  Biometrics,
  CalibrationMethod,
  ExperienceLevel,
  Gender,
  HeartRateZone,
  User,
  VolumeTier,
} from '../types/training.types'

export type CompleteOnboardingInput = {
  calibrationMethod: CalibrationMethod
  manualBiometrics?: ScalarPatch
  trainingVolumeTier?: VolumeTier
  experienceLevel?: ExperienceLevel
  dateOfBirth?: string
  gender?: Gender
  raceId?: string
  totalWeeks?: number
}

export type OnboardingResult = {
  user: User
  biometrics: Biometrics | null
  heartRateZones: HeartRateZone[]
  plan: PlanView
}
