import { Inject, Injectable, Logger } from '@nestjs/common'
import { initialTrainingState } from '../adaptation/strike-rules'
import { BiometricsService } from '../biometrics/biometrics.service'
import { CLOCK, type Clock } from '../clock/clock'
import { isDateKey, toDateKey } from '../common/dates'
import { ConflictError, ValidationError } from '../common/errors'
import { ENGINE_CONFIG, type EngineConfig } from '../config/engine.config'
import { TrainingPlanService } from '../training-plan/training-plan.service'
import { UnitOfWork } from '../training-store/unit-of-work'
import type { User } from '../types/training.types'
import type { CompleteOnboardingInput, OnboardingResult } from './onboarding.types'

function newUser(id: string): User {
  return {
    id,
    calibrationMethod: 'manual',
    trainingVolumeTier: null,
    experienceLevel: null,
    onboardingStatus: 'STARTED',
    dateOfBirth: null,
    gender: null,
    primaryRaceId: null,
  }
}

function validate(input: CompleteOnboardingInput, today: string): void {
  if (input.dateOfBirth !== undefined && (!isDateKey(input.dateOfBirth) || input.dateOfBirth >= today)) {
    throw new ValidationError(`Invalid date of birth: ${input.dateOfBirth}`)
  }
  if (input.calibrationMethod === 'manual') {
    const b = input.manualBiometrics
    if (!b || b.criticalSwimSpeed == null || b.functionalThresholdPower == null || b.thresholdRunPace == null) {
      throw new ValidationError(
        'Manual onboarding needs criticalSwimSpeed, functionalThresholdPower and thresholdRunPace',
      )
    }
  }
}

@Injectable()
export class OnboardingService {
  private readonly logger = new Logger(OnboardingService.name)

  constructor(
    private readonly uow: UnitOfWork,
    private readonly biometricsService: BiometricsService,
    private readonly trainingPlanService: TrainingPlanService,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(ENGINE_CONFIG) private readonly config: EngineConfig,
  ) {}

  /**
   * Manual athletes are done once their scalars are stored; calibration-week
   * athletes wait on their test results. Either way they leave with a plan.
   */
  async completeOnboarding(userId: string, input: CompleteOnboardingInput): Promise<OnboardingResult> {
    validate(input, toDateKey(this.clock.now()))

    const result = await this.trainingPlanService.exclusive(userId, () =>
      this.uow.run(userId, async (tx) => {
        const existing = await tx.getUser(userId)
        if (existing?.onboardingStatus === 'COMPLETED') {
          throw new ConflictError(`User ${userId} has already completed onboarding`)
        }
        const base = existing ?? newUser(userId)

        const user: User = {
          ...base,
          calibrationMethod: input.calibrationMethod,
          trainingVolumeTier: input.trainingVolumeTier ?? base.trainingVolumeTier,
          experienceLevel: input.experienceLevel ?? base.experienceLevel,
          dateOfBirth: input.dateOfBirth ?? base.dateOfBirth,
          gender: input.gender ?? base.gender,
          primaryRaceId: input.raceId ?? base.primaryRaceId,
          onboardingStatus: input.calibrationMethod === 'manual' ? 'COMPLETED' : 'BIOMETRICS_PENDING',
        }
        await tx.saveUser(user)

        const applied = input.manualBiometrics
          ? await this.biometricsService.applyScalars(tx, user, input.manualBiometrics, { fromWeek: 1 })
          : null
        const heartRateZones = await this.biometricsService.refreshHeartRateZones(tx, user)

        if (!(await tx.getTrainingState(userId))) {
          await tx.saveTrainingState(initialTrainingState(userId, this.clock.now().toISOString()))
        }

        const plan = await this.trainingPlanService.createPlanInTx(
          tx,
          user,
          { raceId: input.raceId, totalWeeks: input.totalWeeks },
          { defaultWeeks: this.config.defaultPlanWeeks },
        )

        return { user, biometrics: applied?.biometrics ?? null, heartRateZones, plan }
      }),
    )

    this.logger.log(`user ${userId} onboarded (${input.calibrationMethod}) -> ${result.user.onboardingStatus}`)
    return result
  }
}
