const DAY_MS = 24 * 60 * 60 * 1000

const DATE_KEY_RE = /^\d{4}-\d{2}-\d{2}$/

/** YYYY-MM-DD of the UTC calendar day containing `d`. */
export function toDateKey(d: Date): string {
  const yyyy = d.getUTCFullYear()
  const mm = String(d.getUTCMonth() + 1).padStart(2, '0')
  const dd = String(d.getUTCDate()).padStart(2, '0')
  return `${yyyy}-${mm}-${dd}`
}

export function isDateKey(value: string): boolean {
  if (!DATE_KEY_RE.test(value)) return false
  const parsed = parseDateKey(value)
  return toDateKey(parsed) === value
}

export function parseDateKey(key: string): Date {
  const [y, m, d] = key.split('-').map(Number)
  return new Date(Date.UTC(y ?? NaN, (m ?? NaN) - 1, d ?? NaN))
}

export function addDays(key: string, days: number): string {
  const base = parseDateKey(key)
  return toDateKey(new Date(base.getTime() + days * DAY_MS))
}

export function daysBetween(fromKey: string, toKey: string): number {
  return Math.round((parseDateKey(toKey).getTime() - parseDateKey(fromKey).getTime()) / DAY_MS)
}

/** 0 = Monday ... 6 = Sunday */
export function isoWeekday(key: string): number {
  const day = parseDateKey(key).getUTCDay()
  return day === 0 ? 6 : day - 1
}

/** The first Monday strictly after `key`. */
export function nextMonday(key: string): string {
  return addDays(key, 7 - isoWeekday(key))
}

export function mondayOnOrAfter(key: string): string {
  return isoWeekday(key) === 0 ? key : nextMonday(key)
}
