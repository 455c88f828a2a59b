/**
 * Data for "new" and "edit" requests
 *
 * Each requested key resolves to:
 * - [] when the key is absent from the query string
 * - the full list when the key is present but empty
 * - the full list when the key holds a timestamp other than the latest
 *   modification of that model, [] when it matches
 */

export interface DataGetter<T> {
  all: () => Promise<T[]>;
  latestModification: () => Promise<Date | null>;
}

export function isUpToDate(param: string, latest: Date | null): boolean {
  if (!latest) return false;
  const parsed = new Date(param);
  return !Number.isNaN(parsed.getTime()) && parsed.getTime() === latest.getTime();
}

export async function resolveData<T>(
  param: string | undefined,
  getter: DataGetter<T>
): Promise<T[]> {
  if (param === undefined) return [];
  if (param === '') return getter.all();
  const latest = await getter.latestModification();
  return isUpToDate(param, latest) ? [] : getter.all();
}
