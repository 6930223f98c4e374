import { DateTime } from 'luxon';

/** Takeout sidecars carry epoch seconds as strings; formatted values are ignored. */
export const fromEpochSeconds = (raw: unknown): string | undefined => {
  const seconds = typeof raw === 'number' ? raw : typeof raw === 'string' ? Number(raw) : Number.NaN;
  if (!Number.isFinite(seconds) || seconds <= 0) {
    return undefined;
  }
  return DateTime.fromSeconds(seconds, { zone: 'utc' }).toISO() ?? undefined;
};

export const toExifTimestamp = (iso: string): string | undefined => {
  const dt = DateTime.fromISO(iso, { zone: 'utc' });
  if (!dt.isValid) {
    return undefined;
  }
  return dt.toUTC().toFormat('yyyy:MM:dd HH:mm:ss');
};
