import { ComputationError, ValidationError } from '../common/errors'
import type { HeartRateZone, HeartRateZoneMethod, VolumeTier, ExperienceLevel } from '../types/training.types'
import { HEART_RATE_BANDS, ZONES } from './zone-bands'

function requirePositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive number`)
  }
}

/** CSS (sec/100m) from a 400 m time trial: time/4 + 3 s fade allowance. */
export function calculateCss(time400mSeconds: number): number {
  requirePositive('time400m', time400mSeconds)
  return time400mSeconds / 4 + 3.0
}

/** FTP (W) from a 20-minute test: 95 % of average power. */
export function calculateFtp(avgPower20min: number): number {
  requirePositive('avgPower20min', avgPower20min)
  return Math.round(avgPower20min * 0.95)
}

/** Threshold run pace (sec/mile) from a 1-mile time trial. */
export function calculateThresholdPace(time1MileSeconds: number): number {
  requirePositive('time1Mile', time1MileSeconds)
  return Math.round(time1MileSeconds * 1.15)
}

export function calculateAge(dateOfBirth: string, asOf: Date): number {
  const birth = new Date(`${dateOfBirth}T00:00:00.000Z`)
  if (Number.isNaN(birth.getTime())) {
    throw new ValidationError(`Invalid date of birth: ${dateOfBirth}`)
  }
  let age = asOf.getUTCFullYear() - birth.getUTCFullYear()
  const monthDiff = asOf.getUTCMonth() - birth.getUTCMonth()
  if (monthDiff < 0 || (monthDiff === 0 && asOf.getUTCDate() < birth.getUTCDate())) {
    age--
  }
  return age
}

/** User-provided max HR wins; otherwise 220 - age. */
export function resolveMaxHeartRate(
  maxHeartRate: number | null | undefined,
  dateOfBirth: string | null | undefined,
  asOf: Date,
): number {
  if (maxHeartRate != null && maxHeartRate > 0) {
    return maxHeartRate
  }
  if (!dateOfBirth) {
    throw new ComputationError('Max heart rate needs either a measured value or a date of birth')
  }
  return 220 - calculateAge(dateOfBirth, asOf)
}

/**
 * Five heart-rate zones. Karvonen (heart-rate reserve) is used when a
 * resting HR is known, otherwise straight percentages of max HR.
 */
export function calculateHeartRateZones(maxHr: number, restingHr?: number | null): HeartRateZone[] {
  requirePositive('maxHeartRate', maxHr)
  const method: HeartRateZoneMethod = restingHr != null && restingHr > 0 ? 'KARVONEN' : 'STANDARD'
  const toBpm = (pct: number): number =>
    method === 'KARVONEN' && restingHr != null
      ? Math.round((maxHr - restingHr) * pct + restingHr)
      : Math.round(maxHr * pct)

  return ZONES.map((zoneNumber) => {
    const [low, high] = HEART_RATE_BANDS[zoneNumber]
    return {
      zoneNumber,
      minHr: toBpm(low),
      maxHr: zoneNumber === 5 ? maxHr : toBpm(high),
      method,
    }
  })
}

export function mapExperienceToVolumeTier(experience: ExperienceLevel | null | undefined): VolumeTier {
  switch (experience) {
    case 'finisher':
      return 1
    case 'competitor':
      return 3
    default:
      return 2
  }
}

/** 483 -> "8:03/mi" */
export function formatPace(seconds: number, unit = 'mi'): string {
  const whole = Math.round(seconds)
  const minutes = Math.floor(whole / 60)
  const rest = whole % 60
  return `${minutes}:${String(rest).padStart(2, '0')}/${unit}`
}
