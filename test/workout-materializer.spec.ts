import { calculateHeartRateZones } from '../src/biometrics/biometrics-calculator'
import type { WorkoutTemplate } from '../src/types/training.types'
import {
  materializeWorkout,
  templateMaxZone,
  templateUsesScalar,
} from '../src/workout-materializer/workout-materializer'

const bikeThreshold: WorkoutTemplate = {
  id: 'bike_test',
  version: 1,
  name: 'Threshold Test Ride',
  discipline: 'bike',
  category: 'intervals',
  difficultyTier: 4,
  description: 'Warm up, then hold threshold.',
  steps: [
    { kind: 'warmup', durationSeconds: 600, target: { kind: 'zone', zone: 2 } },
    { kind: 'main', durationSeconds: 600, target: { kind: 'ftp', pct: 1.0 }, targetRpe: 8 },
    { kind: 'cooldown', durationSeconds: 301, target: { kind: 'ftp', pct: 0.5 } },
  ],
}

const runThreshold: WorkoutTemplate = {
  id: 'run_test',
  version: 1,
  name: 'Threshold Test Run',
  discipline: 'run',
  category: 'intervals',
  difficultyTier: 4,
  description: 'Steady threshold running.',
  steps: [
    { kind: 'main', durationSeconds: 1200, target: { kind: 'thresholdPace', pct: 1.0 } },
    { kind: 'interval', durationSeconds: 300, target: { kind: 'zone', zone: 4 } },
  ],
}

const swimCss: WorkoutTemplate = {
  id: 'swim_test',
  version: 1,
  name: 'CSS Test Swim',
  discipline: 'swim',
  category: 'tempo',
  difficultyTier: 3,
  description: 'Aerobic repeats.',
  steps: [{ kind: 'main', durationSeconds: 900, target: { kind: 'css', pct: 1.1 } }],
}

describe('materializeWorkout', () => {
  it('injects FTP into percentage steps', () => {
    const out = materializeWorkout(bikeThreshold, { ftp: 250 })
    expect(out.steps[1]?.target).toEqual({ kind: 'power', watts: 250 })
    expect(out.steps[1]?.targetZone).toBe(4)
    expect(out.steps[1]?.targetRpe).toBe(8)
    expect(out.steps[1]?.description).toBe('Main set · Zone 4 Threshold')
    expect(out.title).toBe('Threshold Test Ride')
    expect(out.totalDurationSeconds).toBe(1501)
  })

  it('scales power by the intensity scalar', () => {
    const out = materializeWorkout(bikeThreshold, { ftp: 250 }, { intensityScalar: 0.85 })
    expect(out.steps[1]?.target).toEqual({ kind: 'power', watts: 213 })
  })

  it('turns a zone step into the middle of the power band', () => {
    const out = materializeWorkout(bikeThreshold, { ftp: 200 })
    expect(out.steps[0]?.target).toEqual({ kind: 'power', watts: 131, range: { low: 112, high: 150 } })
  })

  it('divides pace targets by intensity so easier means slower', () => {
    expect(materializeWorkout(swimCss, { css: 100 }).steps[0]?.target).toEqual({
      kind: 'swimPace',
      secondsPer100m: 110,
    })
    expect(materializeWorkout(swimCss, { css: 100 }, { intensityScalar: 0.85 }).steps[0]?.target).toEqual({
      kind: 'swimPace',
      secondsPer100m: 129,
    })
  })

  it('maps a run zone onto its threshold-pace band', () => {
    const out = materializeWorkout(runThreshold, { thresholdPace: 480 })
    expect(out.steps[0]?.target).toEqual({ kind: 'runPace', secondsPerMile: 480 })
    expect(out.steps[1]?.target).toEqual({ kind: 'runPace', secondsPerMile: 468, range: { low: 456, high: 480 } })
  })

  it('degrades a step to heart rate when its scalar is missing', () => {
    const heartRateZones = calculateHeartRateZones(200)
    const out = materializeWorkout(bikeThreshold, { heartRateZones })
    // ftp 0.5 falls in zone 1
    expect(out.steps[2]?.targetZone).toBe(1)
    expect(out.steps[2]?.target).toEqual({ kind: 'heartRate', bpm: 110, range: { low: 100, high: 120 } })
    expect(out.steps[0]?.target).toEqual({ kind: 'heartRate', bpm: 135, range: { low: 120, high: 150 } })
  })

  it('falls back to zone-only guidance with no scalars at all', () => {
    const out = materializeWorkout(runThreshold, {})
    expect(out.steps.map((s) => s.target)).toEqual([{ kind: 'zoneOnly' }, { kind: 'zoneOnly' }])
    expect(out.steps.map((s) => s.targetZone)).toEqual([4, 4])
  })

  it('caps every step at the given zone', () => {
    const out = materializeWorkout(bikeThreshold, { ftp: 250 }, { zoneCap: 2 })
    expect(out.steps.map((s) => s.targetZone)).toEqual([2, 2, 1])
    expect(out.steps[1]?.target).toEqual({ kind: 'power', watts: 164, range: { low: 140, high: 188 } })
  })

  it('scales durations and keeps them at least one second', () => {
    const out = materializeWorkout(bikeThreshold, { ftp: 250 }, { durationScale: 0.5 })
    expect(out.steps.map((s) => s.durationSeconds)).toEqual([300, 300, 151])
    expect(out.totalDurationSeconds).toBe(751)
    const tiny = materializeWorkout(bikeThreshold, { ftp: 250 }, { durationScale: 0.0001 })
    expect(tiny.steps.map((s) => s.durationSeconds)).toEqual([1, 1, 1])
  })

  it('is deterministic and returns a frozen structure', () => {
    const a = materializeWorkout(bikeThreshold, { ftp: 250 }, { intensityScalar: 1.1 })
    const b = materializeWorkout(bikeThreshold, { ftp: 250 }, { intensityScalar: 1.1 })
    expect(a).toEqual(b)
    expect(Object.isFrozen(a)).toBe(true)
    expect(Object.isFrozen(a.steps)).toBe(true)
    expect(Object.isFrozen(a.steps[0]?.target)).toBe(true)
  })
})

describe('template helpers', () => {
  it('reports which scalars a template depends on', () => {
    expect(templateUsesScalar(bikeThreshold, 'ftp')).toBe(true)
    expect(templateUsesScalar(bikeThreshold, 'css')).toBe(false)
    expect(templateUsesScalar(runThreshold, 'thresholdPace')).toBe(true)
  })

  it('finds the highest zone a template reaches', () => {
    expect(templateMaxZone(bikeThreshold)).toBe(4)
    expect(templateMaxZone(swimCss)).toBe(2)
  })
})
