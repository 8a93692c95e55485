import {
  calculateAge,
  calculateCss,
  calculateFtp,
  calculateHeartRateZones,
  calculateThresholdPace,
  formatPace,
  mapExperienceToVolumeTier,
  resolveMaxHeartRate,
} from '../src/biometrics/biometrics-calculator'
import { ComputationError, ValidationError } from '../src/common/errors'

describe('biometrics calculator', () => {
  it('derives CSS from a 400 m time trial', () => {
    expect(calculateCss(400)).toBe(103)
    expect(calculateCss(390)).toBe(100.5)
  })

  it('derives FTP as 95% of 20-minute power', () => {
    expect(calculateFtp(263)).toBe(250)
    expect(calculateFtp(200)).toBe(190)
  })

  it('derives threshold pace from a mile time trial', () => {
    expect(calculateThresholdPace(420)).toBe(483)
    expect(formatPace(calculateThresholdPace(420))).toBe('8:03/mi')
  })

  it('rejects non-positive and non-finite inputs', () => {
    expect(() => calculateCss(0)).toThrow(ValidationError)
    expect(() => calculateFtp(Number.NaN)).toThrow(ValidationError)
    expect(() => calculateThresholdPace(-5)).toThrow(ValidationError)
    expect(() => calculateFtp(Number.POSITIVE_INFINITY)).toThrow(ValidationError)
  })

  it('computes age on the UTC calendar', () => {
    expect(calculateAge('1990-06-15', new Date('2026-06-14T12:00:00Z'))).toBe(35)
    expect(calculateAge('1990-06-15', new Date('2026-06-15T00:00:00Z'))).toBe(36)
  })

  describe('resolveMaxHeartRate', () => {
    const asOf = new Date('2026-06-15T00:00:00Z')

    it('prefers a measured value', () => {
      expect(resolveMaxHeartRate(190, '1990-06-15', asOf)).toBe(190)
    })

    it('falls back to 220 minus age', () => {
      expect(resolveMaxHeartRate(null, '1990-06-15', asOf)).toBe(184)
    })

    it('fails without max HR or date of birth', () => {
      expect(() => resolveMaxHeartRate(null, null, asOf)).toThrow(ComputationError)
    })
  })

  describe('calculateHeartRateZones', () => {
    it('uses percentages of max HR without a resting value', () => {
      const zones = calculateHeartRateZones(200)
      expect(zones.map((z) => [z.zoneNumber, z.minHr, z.maxHr])).toEqual([
        [1, 100, 120],
        [2, 120, 150],
        [3, 150, 170],
        [4, 170, 190],
        [5, 190, 200],
      ])
      expect(zones.every((z) => z.method === 'STANDARD')).toBe(true)
    })

    it('uses heart-rate reserve when resting HR is known', () => {
      const zones = calculateHeartRateZones(190, 50)
      expect(zones.map((z) => [z.minHr, z.maxHr])).toEqual([
        [120, 134],
        [134, 155],
        [155, 169],
        [169, 183],
        [183, 190],
      ])
      expect(zones[0]?.method).toBe('KARVONEN')
    })

    it('produces contiguous, non-decreasing zones', () => {
      const zones = calculateHeartRateZones(187, 48)
      zones.forEach((zone, i) => {
        expect(zone.minHr).toBeLessThanOrEqual(zone.maxHr)
        const next = zones[i + 1]
        if (next) expect(next.minHr).toBe(zone.maxHr)
      })
    })
  })

  it('maps experience to a volume tier', () => {
    expect(mapExperienceToVolumeTier('finisher')).toBe(1)
    expect(mapExperienceToVolumeTier('competitor')).toBe(3)
    expect(mapExperienceToVolumeTier(null)).toBe(2)
  })
})
