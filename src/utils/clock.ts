export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date()
};

const pad = (value: number): string => String(value).padStart(2, '0');

/** Local time as `YYYYMMDD_HHMMSS`, used in file names. */
export function formatFileStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatDateTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    ` ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function secondsBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / 1000;
}
