/**
 * Natural-language date/time resolution for confirmed bookings.
 * Uses chrono-node as the engine.
 */
import * as chrono from 'chrono-node';
import type { ReservationRecord } from '../models/reservation.js';

export interface ParsedDateTime {
  /** Full date in ISO 8601 (e.g. "2026-02-16T19:00:00.000Z") */
  iso: string;
  /** true when chrono was certain about the hour */
  hasTime: boolean;
}

/**
 * Parses "tomorrow at 7pm", "on friday 12 7:30 p.m." and the like.
 * Returns null when chrono finds nothing.
 */
export function parseDateTimeFromText(text: string, refDate?: Date): ParsedDateTime | null {
  const ref = refDate ?? new Date();
  const results = chrono.en.parse(text, ref, { forwardDate: true });
  const best = results[0];
  if (!best) return null;

  return {
    iso: best.start.date().toISOString(),
    hasTime: best.start.isCertain('hour'),
  };
}

/**
 * Combines the spoken date and time of a reservation into one instant.
 * The extractor keeps them as raw phrases, so "on" is dropped to help chrono.
 */
export function resolveReservationStart(record: ReservationRecord, refDate?: Date): string | null {
  const phrase = [record.dateText?.replace(/^on\s+/i, ''), record.timeText]
    .filter((part): part is string => Boolean(part))
    .join(' at ');
  if (!phrase) return null;

  return parseDateTimeFromText(phrase, refDate)?.iso ?? null;
}
