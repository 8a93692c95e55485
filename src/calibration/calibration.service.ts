import { Injectable, Logger } from '@nestjs/common'
import { calculateCss, calculateFtp, calculateThresholdPace } from '../biometrics/biometrics-calculator'
import { BiometricsService } from '../biometrics/biometrics.service'
import type { ScalarPatch } from '../biometrics/biometrics.types'
import { NotFoundError } from '../common/errors'
import { NotificationsService } from '../notifications/notifications.service'
import { UnitOfWork } from '../training-store/unit-of-work'
import type { Biometrics, CalibrationTestType, OnboardingStatus } from '../types/training.types'

export type CalibrationResult = {
  testType: CalibrationTestType
  biometrics: Biometrics
  onboardingStatus: OnboardingStatus
  rematerializedWorkoutIds: string[]
}

/** Raw test value -> the one scalar it determines. */
export function scalarPatchForTest(testType: CalibrationTestType, rawValue: number): ScalarPatch {
  switch (testType) {
    case 'swim_400m':
      return { criticalSwimSpeed: calculateCss(rawValue) }
    case 'bike_20min':
      return { functionalThresholdPower: calculateFtp(rawValue) }
    case 'run_1mile':
      return { thresholdRunPace: calculateThresholdPace(rawValue) }
  }
}

function hasAllScalars(b: Biometrics): boolean {
  return b.criticalSwimSpeed != null && b.functionalThresholdPower != null && b.thresholdRunPace != null
}

// calibration workouts live in week 1; from week 2 on everything is scalar-driven
const FIRST_SCALAR_WEEK = 2

@Injectable()
export class CalibrationService {
  private readonly logger = new Logger(CalibrationService.name)

  constructor(
    private readonly uow: UnitOfWork,
    private readonly biometricsService: BiometricsService,
    private readonly notifications: NotificationsService,
  ) {}

  async submitResult(userId: string, testType: CalibrationTestType, rawValue: number): Promise<CalibrationResult> {
    const patch = scalarPatchForTest(testType, rawValue)

    const { result, justCompleted } = await this.uow.run(userId, async (tx) => {
      const user = await tx.getUser(userId)
      if (!user) throw new NotFoundError(`User not found: ${userId}`)

      const applied = await this.biometricsService.applyScalars(tx, user, patch, { fromWeek: FIRST_SCALAR_WEEK })

      let onboardingStatus = user.onboardingStatus
      const completesOnboarding = hasAllScalars(applied.biometrics) && onboardingStatus !== 'COMPLETED'
      if (completesOnboarding) {
        onboardingStatus = 'COMPLETED'
        await tx.saveUser({ ...user, onboardingStatus })
      }

      return {
        result: {
          testType,
          biometrics: applied.biometrics,
          onboardingStatus,
          rematerializedWorkoutIds: applied.rematerializedWorkoutIds,
        },
        justCompleted: completesOnboarding,
      }
    })

    this.logger.log(
      `calibration ${testType} for user ${userId}: ${result.rematerializedWorkoutIds.length} workouts updated`,
    )
    if (justCompleted) {
      this.logger.log(`user ${userId} finished calibration`)
      this.notifications.calibrationComplete(userId)
    }
    return result
  }
}
