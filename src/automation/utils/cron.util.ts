import { CronJob } from '../types/automation.types';

export const CRON_MARKER = '# newsletter-engine';

const FIELD_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0, 59], // minute
  [0, 23], // hour
  [1, 31], // day of month
  [1, 12], // month
  [0, 6], // day of week
];

function inRange(value: string, min: number, max: number): boolean {
  if (!/^\d+$/.test(value)) {
    return false;
  }
  const parsed = Number(value);
  return parsed >= min && parsed <= max;
}

function validSpan(value: string, min: number, max: number): boolean {
  if (value === '*') {
    return true;
  }
  const bounds = value.split('-');
  if (bounds.length === 1) {
    return inRange(value, min, max);
  }
  if (bounds.length !== 2) {
    return false;
  }
  const [start, end] = bounds;
  return inRange(start, min, max) && inRange(end, min, max) && Number(
    start,
  ) <= Number(end);
}

function validField(field: string, min: number, max: number): boolean {
  return field.split(',').every((item) => {
    const [base, step, ...rest] = item.split('/');
    if (rest.length) {
      return false;
    }
    if (step !== undefined && !(/^\d+$/.test(step) && Number(step) > 0)) {
      return false;
    }
    return validSpan(base, min, max);
  });
}

/** Five fields: numbers, `*`, ranges, lists and steps; no names or macros. */
export function validateCronSyntax(schedule: string): boolean {
  const fields = schedule.trim().split(/\s+/);
  if (fields.length !== FIELD_RANGES.length) {
    return false;
  }
  return fields.every((field, index) =>
    validField(field, ...FIELD_RANGES[index]),
  );
}

export function formatCronLine(
  schedule: string,
  command: string,
  comment?: string,
): string {
  return [schedule, command, CRON_MARKER, comment].filter(Boolean).join(' ');
}

/** Null for lines this tool did not write. */
export function parseCronLine(line: string): CronJob | null {
  const markerAt = line.indexOf(CRON_MARKER);
  if (markerAt < 0) {
    return null;
  }
  const fields = line.slice(0, markerAt).trim().split(/\s+/);
  if (fields.length < 6) {
    return null;
  }
  return {
    schedule: fields.slice(0, 5).join(' '),
    command: fields.slice(5).join(' '),
    comment: line.slice(markerAt + CRON_MARKER.length).trim(),
  };
}
