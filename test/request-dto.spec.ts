import 'reflect-metadata'
import { plainToInstance } from 'class-transformer'
import { validate } from 'class-validator'
import { SubmitCalibrationResultDto } from '../src/calibration/dto/submit-calibration-result.dto'
import { CompleteOnboardingDto } from '../src/onboarding/dto/complete-onboarding.dto'
import { CompleteWorkoutDto } from '../src/workouts/dto/complete-workout.dto'

async function failingFields<T extends object>(cls: new () => T, body: object): Promise<string[]> {
  const errors = await validate(plainToInstance(cls, body))
  return errors.map((e) => e.property)
}

describe('request DTOs', () => {
  it('accepts a complete workout body with nested feedback', async () => {
    expect(
      await failingFields(CompleteWorkoutDto, {
        activity: { durationSeconds: 3600, source: 'manual_input' },
        feedback: { rating: 'harder', rpeScore: 8 },
      }),
    ).toEqual([])
  })

  it('validates nested activity and feedback', async () => {
    expect(
      await failingFields(CompleteWorkoutDto, {
        activity: { durationSeconds: -5, source: 'garmin' },
        feedback: { rating: 'brutal' },
      }),
    ).toEqual(['activity', 'feedback'])
  })

  it('restricts calibration test types', async () => {
    expect(await failingFields(SubmitCalibrationResultDto, { testType: 'bike_20min', rawValue: 263 })).toEqual([])
    expect(await failingFields(SubmitCalibrationResultDto, { testType: 'row_2k', rawValue: 0 })).toEqual([
      'testType',
      'rawValue',
    ])
  })

  it('checks onboarding choices', async () => {
    expect(
      await failingFields(CompleteOnboardingDto, {
        calibrationMethod: 'manual',
        manualBiometrics: { criticalSwimSpeed: 100, functionalThresholdPower: 250, thresholdRunPace: 480 },
        trainingVolumeTier: 2,
      }),
    ).toEqual([])
    expect(
      await failingFields(CompleteOnboardingDto, {
        calibrationMethod: 'guess',
        trainingVolumeTier: 4,
        dateOfBirth: '15.06.1990',
        totalWeeks: 0,
      }),
    ).toEqual(['calibrationMethod', 'trainingVolumeTier', 'dateOfBirth', 'totalWeeks'])
  })
})
