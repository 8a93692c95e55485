import { ConflictError, NotFoundError, ValidationError } from '../src/common/errors'
import { TrainingPlanService } from '../src/training-plan/training-plan.service'
import {
  createEngine,
  makeBiometrics,
  makeRace,
  makeUser,
  seedBiometrics,
  type Engine,
} from './helpers/engine.fixture'

describe('TrainingPlanService', () => {
  let engine: Engine
  let service: TrainingPlanService

  beforeEach(async () => {
    engine = await createEngine('2026-10-21T09:00:00Z')
    service = engine.moduleRef.get(TrainingPlanService)
    engine.store.seedUser(makeUser())
    engine.store.seedRace(makeRace())
    await seedBiometrics(engine.store, makeBiometrics())
  })

  afterEach(async () => {
    await engine.moduleRef.close()
  })

  it('builds a twelve-week plan starting next Monday', async () => {
    const { plan, workouts } = await service.createPlan('athlete-1', { totalWeeks: 12 })

    expect(plan).toMatchObject({
      name: '12-Week Plan',
      startDate: '2026-10-26',
      totalWeeks: 12,
      currentWeek: 1,
      currentPhase: 'BASE',
      volumeTier: 2,
      hasCalibrationWeek: false,
      status: 'active',
      raceId: null,
    })
    expect(plan.phases.map((p) => p.weeks)).toEqual([3, 6, 2, 1])
    expect(workouts).toHaveLength(72)

    const weekOne = workouts.filter((w) => w.weekNumber === 1)
    expect(weekOne.map((w) => `${w.scheduledDate}:${w.discipline}:${w.priorityLevel}`)).toEqual([
      '2026-10-26:swim:2',
      '2026-10-28:bike:2',
      '2026-10-30:swim:1',
      '2026-10-30:run:2',
      '2026-10-31:bike:1',
      '2026-11-01:run:1',
    ])
    expect(weekOne.every((w) => w.status === 'planned' && w.version === 0)).toBe(true)
  })

  it('applies phase modifiers and the athlete scalars', async () => {
    const { workouts } = await service.createPlan('athlete-1', { totalWeeks: 12 })

    const baseBike = workouts.find((w) => w.scheduledDate === '2026-10-28')
    expect(baseBike).toMatchObject({
      templateId: 'bike_tempo_blocks',
      phase: 'BASE',
      intensityScalar: 0.85,
      durationScale: 1,
      targetRpe: 6,
    })
    expect(baseBike?.calculatedStructure.steps[1]?.target).toEqual({ kind: 'power', watts: 181 })

    const buildBike = workouts.find((w) => w.weekNumber === 4 && w.discipline === 'bike' && w.priorityLevel === 2)
    expect(buildBike).toMatchObject({
      templateId: 'bike_intervals_threshold',
      scheduledDate: '2026-11-18',
      intensityScalar: 1,
      durationScale: 0.9,
    })
    expect(buildBike?.calculatedStructure.steps[1]).toMatchObject({
      durationSeconds: 432,
      target: { kind: 'power', watts: 250 },
    })

    const taper = workouts.filter((w) => w.weekNumber === 12)
    expect(taper.every((w) => w.phase === 'TAPER' && w.durationScale === 0.5)).toBe(true)
  })

  it('sizes the plan to the primary race', async () => {
    engine.store.seedUser(makeUser({ primaryRaceId: 'race-1', trainingVolumeTier: null, experienceLevel: 'competitor' }))

    const { plan, workouts } = await service.createPlan('athlete-1', {})

    expect(plan).toMatchObject({
      name: 'Autumn Sprint Plan',
      raceId: 'race-1',
      raceDate: '2026-12-20',
      totalWeeks: 8,
      volumeTier: 3,
    })
    expect(plan.phases.map((p) => p.weeks)).toEqual([2, 4, 1, 1])
    expect(workouts).toHaveLength(8 * 9)
  })

  it('archives the previous active plan', async () => {
    const first = await service.createPlan('athlete-1', { totalWeeks: 4 })
    const second = await service.createPlan('athlete-1', { totalWeeks: 6 })

    const active = await service.getActivePlan('athlete-1')
    expect(active.plan.id).toBe(second.plan.id)
    expect(active.workouts).toHaveLength(36)

    const archived = await engine.store.withUserTransaction('athlete-1', (tx) => tx.getPlan(first.plan.id), {
      timeoutMs: 1000,
    })
    expect(archived?.status).toBe('archived')
  })

  it('rejects a second creation while one is running', async () => {
    const first = service.createPlan('athlete-1', { totalWeeks: 4 })
    await expect(service.createPlan('athlete-1', { totalWeeks: 4 })).rejects.toBeInstanceOf(ConflictError)
    await expect(first).resolves.toMatchObject({ plan: { totalWeeks: 4 } })
  })

  it('validates the requested start and length', async () => {
    await expect(service.createPlan('athlete-1', {})).rejects.toBeInstanceOf(ValidationError)
    await expect(service.createPlan('athlete-1', { totalWeeks: 4, startDate: '2026-10-27' })).rejects.toBeInstanceOf(
      ValidationError,
    )
    await expect(service.createPlan('athlete-1', { totalWeeks: 4, startDate: '2026-10-19' })).rejects.toBeInstanceOf(
      ValidationError,
    )
    await expect(service.createPlan('athlete-1', { raceId: 'race-9' })).rejects.toBeInstanceOf(NotFoundError)
    await expect(service.createPlan('nobody', { totalWeeks: 4 })).rejects.toBeInstanceOf(NotFoundError)

    const { plan } = await service.createPlan('athlete-1', { totalWeeks: 4, startDate: '2026-11-02' })
    expect(plan.startDate).toBe('2026-11-02')
  })

  it('reports a missing active plan', async () => {
    await expect(service.getActivePlan('athlete-1')).rejects.toBeInstanceOf(NotFoundError)
  })

  it('opens with a calibration week for athletes still testing', async () => {
    engine.store.seedUser(
      makeUser({ id: 'tester', calibrationMethod: 'calibration_week', onboardingStatus: 'BIOMETRICS_PENDING' }),
    )

    const { plan, workouts } = await service.createPlan('tester', { totalWeeks: 4 })

    expect(plan.hasCalibrationWeek).toBe(true)
    expect(workouts).toHaveLength(5 + 3 * 6)
    const weekOne = workouts.filter((w) => w.weekNumber === 1)
    expect(
      weekOne.map((w) => [w.scheduledDate, w.templateId, w.calibrationTest, w.priorityLevel, w.targetRpe]),
    ).toEqual([
      ['2026-10-26', 'swim_calibration_400m', 'swim_400m', 2, 9],
      ['2026-10-28', 'bike_calibration_20min', 'bike_20min', 2, 9],
      ['2026-10-30', 'run_calibration_1mile', 'run_1mile', 2, 9],
      ['2026-10-31', 'bike_recovery_spin', null, 3, 3],
      ['2026-11-01', 'run_recovery_jog', null, 3, 3],
    ])
    const tests = weekOne.filter((w) => w.isCalibrationTest)
    expect(tests.every((w) => w.intensityScalar === 1 && w.durationScale === 1)).toBe(true)
    expect(tests.flatMap((w) => w.calculatedStructure.steps).every((s) => s.target.kind === 'zoneOnly')).toBe(true)
  })
})
