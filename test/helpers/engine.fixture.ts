import 'reflect-metadata'
import { Test, type TestingModule } from '@nestjs/testing'
import { AppModule } from '../../src/app.module'
import { CLOCK, FixedClock } from '../../src/clock/clock'
import { ENGINE_CONFIG, type EngineConfig } from '../../src/config/engine.config'
import { NOTIFICATION_PORT } from '../../src/notifications/notification.port'
import { InMemoryTrainingStore } from '../../src/training-store/in-memory-training-store'
import { TRAINING_STORE } from '../../src/training-store/training-store.types'
import type { Biometrics, Race, TrainingPlan, User, Workout } from '../../src/types/training.types'

export const TEST_CONFIG: EngineConfig = {
  port: 3000,
  store: { kind: 'memory' },
  storeTimeoutMs: 1000,
  storeRetryBackoffMs: 0,
  sweepConcurrency: 2,
  defaultPlanWeeks: 12,
  phaseSplit: { BASE: 0.25, BUILD: 0.5, PEAK: 0.125, TAPER: 0.125 },
}

export type TestNotifier = {
  notifyAdaptationTriggered: jest.Mock<Promise<void>, [string]>
  notifyCalibrationComplete: jest.Mock<Promise<void>, [string]>
}

export type Engine = {
  moduleRef: TestingModule
  clock: FixedClock
  store: InMemoryTrainingStore
  notifier: TestNotifier
}

export type EngineOptions = {
  config?: Partial<EngineConfig>
  store?: InMemoryTrainingStore
}

export async function createEngine(now: string, options: EngineOptions = {}): Promise<Engine> {
  const clock = new FixedClock(new Date(now))
  const store = options.store ?? new InMemoryTrainingStore()
  const notifier: TestNotifier = {
    notifyAdaptationTriggered: jest.fn<Promise<void>, [string]>().mockResolvedValue(undefined),
    notifyCalibrationComplete: jest.fn<Promise<void>, [string]>().mockResolvedValue(undefined),
  }

  const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
    .overrideProvider(ENGINE_CONFIG)
    .useValue({ ...TEST_CONFIG, ...options.config })
    .overrideProvider(CLOCK)
    .useValue(clock)
    .overrideProvider(TRAINING_STORE)
    .useValue(store)
    .overrideProvider(NOTIFICATION_PORT)
    .useValue(notifier)
    .compile()

  return { moduleRef, clock, store, notifier }
}

/** Lets fire-and-forget promises settle. */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

export function makeUser(overrides: Partial<User> = {}): User {
  return {
    id: 'athlete-1',
    calibrationMethod: 'manual',
    trainingVolumeTier: 2,
    experienceLevel: null,
    onboardingStatus: 'COMPLETED',
    dateOfBirth: null,
    gender: null,
    primaryRaceId: null,
    ...overrides,
  }
}

export function makeRace(overrides: Partial<Race> = {}): Race {
  return { id: 'race-1', name: 'Autumn Sprint', date: '2026-12-20', distance: 'sprint', ...overrides }
}

export function makePlan(overrides: Partial<TrainingPlan> = {}): TrainingPlan {
  return {
    id: 'plan-1',
    userId: 'athlete-1',
    name: '4-Week Plan',
    planType: 'race',
    raceId: null,
    raceDate: null,
    startDate: '2026-10-19',
    currentPhase: 'BASE',
    currentWeek: 1,
    totalWeeks: 4,
    volumeTier: 2,
    phases: [
      { phase: 'BASE', weeks: 1 },
      { phase: 'BUILD', weeks: 2 },
      { phase: 'PEAK', weeks: 1 },
    ],
    hasCalibrationWeek: false,
    status: 'active',
    createdAt: '2026-10-18T08:00:00.000Z',
    ...overrides,
  }
}

export function makeWorkout(overrides: Partial<Workout> & Pick<Workout, 'id' | 'scheduledDate'>): Workout {
  return {
    planId: 'plan-1',
    templateId: 'run_endurance_easy',
    templateVersion: 1,
    discipline: 'run',
    weekNumber: 1,
    phase: 'BASE',
    priorityLevel: 3,
    status: 'planned',
    intensityScalar: 1,
    durationScale: 1,
    zoneCap: null,
    targetRpe: 4,
    wasAdapted: false,
    isCalibrationTest: false,
    calibrationTest: null,
    skipReason: null,
    calculatedStructure: { title: 'Workout', description: '', totalDurationSeconds: 0, steps: [] },
    version: 0,
    ...overrides,
  }
}

/** Writes a user, an active plan and its workouts in one transaction. */
export async function seedPlan(
  store: InMemoryTrainingStore,
  plan: TrainingPlan,
  workouts: readonly Workout[],
  user: User = makeUser({ id: plan.userId }),
): Promise<void> {
  await store.withUserTransaction(
    plan.userId,
    async (tx) => {
      await tx.saveUser(user)
      await tx.insertPlan(plan)
      await tx.insertWorkouts(workouts)
    },
    { timeoutMs: 1000 },
  )
}

export async function readPlanWorkouts(store: InMemoryTrainingStore, userId: string, planId: string): Promise<Workout[]> {
  return store.withUserTransaction(userId, (tx) => tx.listWorkouts(planId), { timeoutMs: 1000 })
}

export function makeBiometrics(overrides: Partial<Biometrics> = {}): Biometrics {
  return {
    userId: 'athlete-1',
    criticalSwimSpeed: 100,
    functionalThresholdPower: 250,
    thresholdRunPace: 480,
    maxHeartRate: null,
    restingHeartRate: null,
    recordedAt: '2026-10-01T08:00:00.000Z',
    ...overrides,
  }
}

export async function seedBiometrics(store: InMemoryTrainingStore, biometrics: Biometrics): Promise<void> {
  await store.withUserTransaction(biometrics.userId, (tx) => tx.saveBiometrics(biometrics), { timeoutMs: 1000 })
}
