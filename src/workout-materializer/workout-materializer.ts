import { deepFreeze } from '../common/freeze'
import {
  BIKE_POWER_BANDS,
  RUN_PACE_BANDS,
  SCALAR_FOR_DISCIPLINE,
  SWIM_PACE_BANDS,
  ZONE_NAMES,
  resolvePaceBound,
  zoneForPercentage,
} from '../biometrics/zone-bands'
import type {
  Biometrics,
  CalculatedStructure,
  Discipline,
  HeartRateZone,
  MaterializedStep,
  MaterializedTarget,
  StepKind,
  StepTarget,
  TargetRange,
  TemplateStep,
  WorkoutTemplate,
  ZoneNumber,
} from '../types/training.types'
import type { MaterializeOptions, ScalarKind, ScalarSet } from './workout-materializer.types'

const STEP_LABELS: Record<StepKind, string> = {
  warmup: 'Warm-up',
  main: 'Main set',
  interval: 'Interval',
  rest: 'Recovery',
  cooldown: 'Cool-down',
}

export function scalarsFromBiometrics(
  biometrics: Biometrics | null,
  heartRateZones: readonly HeartRateZone[] = [],
): ScalarSet {
  return {
    ftp: biometrics?.functionalThresholdPower ?? null,
    css: biometrics?.criticalSwimSpeed ?? null,
    thresholdPace: biometrics?.thresholdRunPace ?? null,
    heartRateZones,
  }
}

function scalarValue(scalars: ScalarSet, kind: ScalarKind): number | null {
  const value = scalars[kind]
  return value != null && value > 0 ? value : null
}

function range(a: number, b: number): TargetRange {
  return { low: Math.min(a, b), high: Math.max(a, b) }
}

function lowerZone(a: ZoneNumber, b: ZoneNumber): ZoneNumber {
  return a < b ? a : b
}

function zoneOf(target: StepTarget): ZoneNumber {
  return target.kind === 'zone' ? target.zone : zoneForPercentage(target.kind, target.pct)
}

function materializeZone(
  discipline: Discipline,
  zone: ZoneNumber,
  scalars: ScalarSet,
  intensity: number,
): MaterializedTarget {
  const scalar = scalarValue(scalars, SCALAR_FOR_DISCIPLINE[discipline])

  if (scalar !== null) {
    if (discipline === 'bike') {
      const [lo, hi] = BIKE_POWER_BANDS[zone]
      return {
        kind: 'power',
        watts: Math.round(((lo + hi) / 2) * scalar * intensity),
        range: range(Math.round(lo * scalar * intensity), Math.round(hi * scalar * intensity)),
      }
    }
    if (discipline === 'swim') {
      const [slow, fast] = SWIM_PACE_BANDS[zone]
      return {
        kind: 'swimPace',
        secondsPer100m: Math.round((((slow + fast) / 2) * scalar) / intensity),
        range: range(Math.round((slow * scalar) / intensity), Math.round((fast * scalar) / intensity)),
      }
    }
    const [slow, fast] = RUN_PACE_BANDS[zone]
    const slowSec = resolvePaceBound(scalar, slow) / intensity
    const fastSec = resolvePaceBound(scalar, fast) / intensity
    return {
      kind: 'runPace',
      secondsPerMile: Math.round((slowSec + fastSec) / 2),
      range: range(Math.round(slowSec), Math.round(fastSec)),
    }
  }

  const hrZone = scalars.heartRateZones?.find((z) => z.zoneNumber === zone)
  if (hrZone) {
    return {
      kind: 'heartRate',
      bpm: Math.round(((hrZone.minHr + hrZone.maxHr) / 2) * intensity),
      range: range(Math.round(hrZone.minHr * intensity), Math.round(hrZone.maxHr * intensity)),
    }
  }

  return { kind: 'zoneOnly' }
}

function materializeTarget(
  discipline: Discipline,
  target: StepTarget,
  scalars: ScalarSet,
  intensity: number,
): MaterializedTarget {
  if (target.kind === 'zone') {
    return materializeZone(discipline, target.zone, scalars, intensity)
  }

  const scalar = scalarValue(scalars, target.kind)
  if (scalar === null) {
    return materializeZone(discipline, zoneOf(target), scalars, intensity)
  }

  switch (target.kind) {
    case 'ftp':
      return { kind: 'power', watts: Math.round(target.pct * scalar * intensity) }
    case 'css':
      return { kind: 'swimPace', secondsPer100m: Math.round((target.pct * scalar) / intensity) }
    case 'thresholdPace':
      return { kind: 'runPace', secondsPerMile: Math.round((target.pct * scalar) / intensity) }
  }
}

function materializeStep(
  discipline: Discipline,
  step: TemplateStep,
  scalars: ScalarSet,
  intensity: number,
  durationScale: number,
  zoneCap: ZoneNumber | null,
): MaterializedStep {
  const naturalZone = zoneOf(step.target)
  const target: StepTarget =
    zoneCap !== null ? { kind: 'zone', zone: lowerZone(naturalZone, zoneCap) } : step.target
  const targetZone = zoneOf(target)

  const out: MaterializedStep = {
    kind: step.kind,
    durationSeconds: Math.max(1, Math.round(step.durationSeconds * durationScale)),
    targetZone,
    description: step.description ?? `${STEP_LABELS[step.kind]} · Zone ${targetZone} ${ZONE_NAMES[targetZone]}`,
    target: materializeTarget(discipline, target, scalars, intensity),
  }
  if (step.targetRpe !== undefined) out.targetRpe = step.targetRpe
  return out
}

/**
 * Injects the user's scalars into a template. Pure: the same inputs always
 * give an equal, frozen structure, and a missing scalar only degrades the
 * affected steps.
 */
export function materializeWorkout(
  template: WorkoutTemplate,
  scalars: ScalarSet,
  options: MaterializeOptions = {},
): CalculatedStructure {
  const intensity = options.intensityScalar ?? 1
  const durationScale = options.durationScale ?? 1
  const zoneCap = options.zoneCap ?? null

  const steps = template.steps.map((step) =>
    materializeStep(template.discipline, step, scalars, intensity, durationScale, zoneCap),
  )

  return deepFreeze({
    title: template.name,
    description: template.description,
    totalDurationSeconds: steps.reduce((sum, s) => sum + s.durationSeconds, 0),
    steps,
  })
}

/** True when re-materializing with a new value of `scalar` could change the output. */
export function templateUsesScalar(template: WorkoutTemplate, scalar: ScalarKind): boolean {
  return template.steps.some((step) =>
    step.target.kind === 'zone'
      ? SCALAR_FOR_DISCIPLINE[template.discipline] === scalar
      : step.target.kind === scalar,
  )
}

/** Highest zone any step of the template reaches. */
export function templateMaxZone(template: WorkoutTemplate): ZoneNumber {
  return template.steps.reduce<ZoneNumber>((max, step) => {
    const zone = zoneOf(step.target)
    return zone > max ? zone : max
  }, 1)
}
