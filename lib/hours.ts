/**
 * Open/closed evaluation for listings.
 *
 * Opening hours are wall-clock times in the directory's configured time
 * zone. A holiday override wins over hours while it is active, and clears
 * itself once `holiday_until` has passed.
 */

import type { Listing, ListingPatch } from '@/types'

export type ListingHours = Pick<
  Listing,
  'open_time' | 'close_time' | 'is_on_holiday' | 'holiday_until' | 'holiday_note'
>

export interface AvailabilityEvaluation {
  open: boolean
  /** Holiday-clearing write for the caller to persist, or null. */
  patch: ListingPatch | null
}

const SECONDS_PER_DAY = 24 * 60 * 60

/** Parse "HH:MM" or "HH:MM:SS" to seconds since midnight. */
export function parseTimeOfDay(value: string | null | undefined): number | null {
  if (!value) return null
  const m = value.trim().match(/^(\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?$/)
  if (!m) return null
  const h = Number(m[1])
  const min = Number(m[2])
  const s = m[3] ? Number(m[3]) : 0
  if (h > 23 || min > 59 || s > 59) return null
  return h * 3600 + min * 60 + s
}

/** Seconds since midnight of `now` on the wall clock of `timeZone`. */
export function secondsOfDayIn(now: Date, timeZone: string): number {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(now)

  const get = (type: Intl.DateTimeFormatPartTypes) =>
    Number(parts.find((p) => p.type === type)?.value ?? '0')

  return (get('hour') * 3600 + get('minute') * 60 + get('second')) % SECONDS_PER_DAY
}

/**
 * Inclusive containment. Same-day windows use [open, close]; overnight
 * windows (open > close) use [open, 24:00) ∪ [00:00, close].
 */
export function isWithinHours(open: number | null, close: number | null, clock: number): boolean {
  if (open === null || close === null) return false
  if (open <= close) return open <= clock && clock <= close
  return clock >= open || clock <= close
}

export function holidayHasEnded(hours: ListingHours, now: Date): boolean {
  if (!hours.is_on_holiday || !hours.holiday_until) return false
  return new Date(hours.holiday_until).getTime() <= now.getTime()
}

/**
 * Evaluate whether a listing is open at `now`, returning the holiday
 * clean-up write instead of performing it.
 */
export function evaluateAvailability(
  hours: ListingHours,
  now: Date,
  timeZone: string,
): AvailabilityEvaluation {
  let onHoliday = hours.is_on_holiday
  let patch: ListingPatch | null = null

  if (holidayHasEnded(hours, now)) {
    onHoliday = false
    patch = { is_on_holiday: false, holiday_until: null, holiday_note: null }
  }

  if (onHoliday) return { open: false, patch }

  const open = isWithinHours(
    parseTimeOfDay(hours.open_time),
    parseTimeOfDay(hours.close_time),
    secondsOfDayIn(now, timeZone),
  )
  return { open, patch }
}

/**
 * Convenience form over the raw fields. `onHolidayCleared` receives the
 * clean-up write when an expired holiday was dropped during evaluation.
 */
export function isOpenNow(
  openTime: string | null,
  closeTime: string | null,
  holidayFlag: boolean,
  holidayUntil: string | null,
  now: Date,
  timeZone: string,
  onHolidayCleared?: (patch: ListingPatch) => void,
): boolean {
  const result = evaluateAvailability(
    {
      open_time: openTime,
      close_time: closeTime,
      is_on_holiday: holidayFlag,
      holiday_until: holidayUntil,
      holiday_note: null,
    },
    now,
    timeZone,
  )
  if (result.patch && onHolidayCleared) onHolidayCleared(result.patch)
  return result.open
}
