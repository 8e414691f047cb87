// src/utils/format.ts

/** Bytes → GB, rounded to `precision` decimals. */
export const bytesToGb = (bytes: number, precision: number = 2): number =>
  round(bytes / 1024 ** 3, precision);

/** Bytes → MB, rounded to `precision` decimals. */
export const bytesToMb = (bytes: number, precision: number = 2): number =>
  round(bytes / 1024 ** 2, precision);

export const round = (value: number, precision: number = 2): number => {
  const f = 10 ** precision;
  return Math.round(value * f) / f;
};

const plural = (n: number, unit: string) =>
  `${n} ${unit}${n !== 1 ? 's' : ''}`;

/**
 * Formats seconds as "1 day, 2 hrs, 3 mins, 4 secs", omitting zero parts.
 * Returns "N/A" for non-finite or negative input.
 */
export const formatUptime = (totalSeconds: number): string => {
  if (!Number.isFinite(totalSeconds) || totalSeconds < 0) return 'N/A';
  const days = Math.floor(totalSeconds / 86400);
  const hours = Math.floor((totalSeconds % 86400) / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = Math.floor(totalSeconds % 60);

  return [
    days ? plural(days, 'day') : '',
    hours ? plural(hours, 'hr') : '',
    minutes ? plural(minutes, 'min') : '',
    seconds ? plural(seconds, 'sec') : '',
  ]
    .filter(Boolean)
    .join(', ');
};
