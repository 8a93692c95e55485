import { Logger } from '@nestjs/common'
import { BiometricsService } from '../src/biometrics/biometrics.service'
import { CalibrationService } from '../src/calibration/calibration.service'
import { NotFoundError, ValidationError } from '../src/common/errors'
import { OnboardingService } from '../src/onboarding/onboarding.service'
import type { Workout } from '../src/types/training.types'
import { createEngine, flushPromises, readPlanWorkouts, type Engine } from './helpers/engine.fixture'

describe('CalibrationService', () => {
  let engine: Engine
  let service: CalibrationService
  let planId: string
  let initial: Workout[]

  beforeEach(async () => {
    engine = await createEngine('2026-10-21T09:00:00Z')
    service = engine.moduleRef.get(CalibrationService)
    const onboarded = await engine.moduleRef.get(OnboardingService).completeOnboarding('athlete-1', {
      calibrationMethod: 'calibration_week',
      trainingVolumeTier: 2,
      totalWeeks: 4,
    })
    planId = onboarded.plan.plan.id
    initial = onboarded.plan.workouts
  })

  afterEach(async () => {
    await engine.moduleRef.close()
  })

  it('updates only CSS from a swim test and re-targets swim sessions from week two', async () => {
    const result = await service.submitResult('athlete-1', 'swim_400m', 400)

    expect(result.biometrics).toMatchObject({
      criticalSwimSpeed: 103,
      functionalThresholdPower: null,
      thresholdRunPace: null,
    })
    expect(result.onboardingStatus).toBe('BIOMETRICS_PENDING')

    const swimFromWeekTwo = initial.filter((w) => w.discipline === 'swim' && w.weekNumber >= 2)
    expect([...result.rematerializedWorkoutIds].sort()).toEqual(swimFromWeekTwo.map((w) => w.id).sort())

    const stored = await readPlanWorkouts(engine.store, 'athlete-1', planId)
    const weekTwoSwim = stored.find((w) => w.scheduledDate === '2026-11-02')
    expect(weekTwoSwim?.templateId).toBe('swim_intervals_threshold')
    expect(weekTwoSwim?.calculatedStructure.steps[1]?.target).toEqual({ kind: 'swimPace', secondsPer100m: 103 })

    const tests = stored.filter((w) => w.isCalibrationTest)
    expect(tests.flatMap((w) => w.calculatedStructure.steps).every((s) => s.target.kind === 'zoneOnly')).toBe(true)
    expect(tests.every((w) => w.status === 'planned' && w.version === 0)).toBe(true)

    const bikeFromWeekTwo = stored.find((w) => w.discipline === 'bike' && w.weekNumber === 2)
    expect(bikeFromWeekTwo?.version).toBe(0)
  })

  it('completes onboarding once all three scalars are known', async () => {
    const swim = await service.submitResult('athlete-1', 'swim_400m', 400)
    const bike = await service.submitResult('athlete-1', 'bike_20min', 263)
    expect(swim.onboardingStatus).toBe('BIOMETRICS_PENDING')
    expect(bike.onboardingStatus).toBe('BIOMETRICS_PENDING')
    expect(bike.biometrics.functionalThresholdPower).toBe(250)

    await flushPromises()
    expect(engine.notifier.notifyCalibrationComplete).not.toHaveBeenCalled()

    const run = await service.submitResult('athlete-1', 'run_1mile', 420)
    expect(run.onboardingStatus).toBe('COMPLETED')
    expect(run.biometrics).toMatchObject({
      criticalSwimSpeed: 103,
      functionalThresholdPower: 250,
      thresholdRunPace: 483,
    })

    await flushPromises()
    expect(engine.notifier.notifyCalibrationComplete).toHaveBeenCalledWith('athlete-1')

    // a later retest does not complete onboarding again
    await service.submitResult('athlete-1', 'run_1mile', 410)
    await flushPromises()
    expect(engine.notifier.notifyCalibrationComplete).toHaveBeenCalledTimes(1)
  })

  it('completes onboarding even when the notification cannot be delivered', async () => {
    const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined)
    engine.notifier.notifyCalibrationComplete.mockRejectedValue(new Error('push down'))
    try {
      await service.submitResult('athlete-1', 'swim_400m', 400)
      await service.submitResult('athlete-1', 'bike_20min', 263)
      const run = await service.submitResult('athlete-1', 'run_1mile', 420)
      expect(run.onboardingStatus).toBe('COMPLETED')

      await flushPromises()
      expect(warn).toHaveBeenCalledWith('calibration notification for user athlete-1 failed: push down')
      const user = await engine.store.withUserTransaction('athlete-1', (tx) => tx.getUser('athlete-1'), {
        timeoutMs: 1000,
      })
      expect(user?.onboardingStatus).toBe('COMPLETED')
    } finally {
      warn.mockRestore()
    }
  })

  it('rejects an invalid result without writing anything', async () => {
    await expect(service.submitResult('athlete-1', 'bike_20min', 0)).rejects.toBeInstanceOf(ValidationError)
    await expect(engine.moduleRef.get(BiometricsService).getBiometrics('athlete-1')).rejects.toBeInstanceOf(
      NotFoundError,
    )
  })

  it('rejects results for unknown users', async () => {
    await expect(service.submitResult('stranger', 'swim_400m', 400)).rejects.toBeInstanceOf(NotFoundError)
  })
})
