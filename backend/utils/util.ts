// backend/utils/util.ts
import { DateTime } from 'luxon'
import { RetryPolicy } from '../services/types'

export const MARKET_ZONE = 'Asia/Kolkata'
export const PROVIDER_DATETIME_FORMAT = 'yyyy-MM-dd HH:mm'

// Rounds toward negative infinity
export function roundDownToMultiple(price: number, multiple: number): number {
  return Math.floor(price / multiple) * multiple
}

// Rounds toward positive infinity
export function roundUpToMultiple(price: number, multiple: number): number {
  return Math.ceil(price / multiple) * multiple
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve()
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * delay = attempt × unit, attempt counted from 1
 */
export function linearBackoff(maxAttempts: number, unitMs: number): RetryPolicy {
  return {
    maxAttempts,
    delayMs: (attempt) => attempt * unitMs,
  }
}

export function marketNow(): DateTime {
  return DateTime.now().setZone(MARKET_ZONE)
}

export function formatProviderDateTime(dt: DateTime): string {
  return dt.setZone(MARKET_ZONE).toFormat(PROVIDER_DATETIME_FORMAT)
}

/**
 * Drops the offset from a provider timestamp and keeps the wall-clock time,
 * e.g. "2025-01-29T09:15:00+05:30" → 2025-01-29T09:15:00Z.
 */
export function toNaiveDate(timestamp: string): Date | null {
  const parsed = DateTime.fromISO(timestamp, { setZone: true })
  if (!parsed.isValid) return null
  return parsed.setZone('UTC', { keepLocalTime: true }).toJSDate()
}

// "29-JAN-2025" → "2025-01-29"
export function parseListedExpiry(value: string): string | null {
  const parsed = DateTime.fromFormat(value.trim(), 'dd-LLL-yyyy', { zone: MARKET_ZONE, locale: 'en-US' })
  return parsed.isValid ? parsed.toISODate() : null
}
