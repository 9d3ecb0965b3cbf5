import type { CallHoursWindow } from './restaurantConfig';

export function parseHhmm(value: string): number {
  const [hours, minutes] = value.split(':').map((part) => Number.parseInt(part, 10));
  if (!Number.isFinite(hours) || !Number.isFinite(minutes)) {
    throw new Error(`invalid HH:MM value: ${value}`);
  }
  return hours * 60 + minutes;
}

export function localMinuteOfDay(at: Date, timeZone: string): number {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(at);

  let hours = 0;
  let minutes = 0;
  for (const part of parts) {
    if (part.type === 'hour') hours = Number.parseInt(part.value, 10) % 24;
    if (part.type === 'minute') minutes = Number.parseInt(part.value, 10);
  }
  return hours * 60 + minutes;
}

/**
 * Start is inclusive and end exclusive. A window whose start is after its end
 * wraps past midnight; identical start and end means open all day.
 */
export function isWithinCallHours(window: CallHoursWindow, timeZone: string, at: Date): boolean {
  const start = parseHhmm(window.start);
  const end = parseHhmm(window.end);
  const now = localMinuteOfDay(at, timeZone);

  if (start === end) {
    return true;
  }
  if (start < end) {
    return now >= start && now < end;
  }
  return now >= start || now < end;
}

export type TimeOfDay = 'morning' | 'afternoon' | 'evening';

export function timeOfDay(at: Date, timeZone: string): TimeOfDay {
  const hour = Math.floor(localMinuteOfDay(at, timeZone) / 60);
  if (hour >= 5 && hour < 12) return 'morning';
  if (hour >= 12 && hour < 18) return 'afternoon';
  return 'evening';
}
