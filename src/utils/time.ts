export type LocalParts = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
};

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function getLocalParts(date: Date, timeZone: string): LocalParts {
  // Use Intl to avoid adding a heavy timezone dependency.
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);

  const pick = (type: Intl.DateTimeFormatPartTypes): number => Number(parts.find(p => p.type === type)?.value ?? NaN);
  const out: LocalParts = {
    year: pick('year'),
    month: pick('month'),
    day: pick('day'),
    hour: pick('hour'),
    minute: pick('minute'),
    second: pick('second'),
  };
  if (Object.values(out).some(v => !Number.isFinite(v))) {
    throw new Error(`Failed to resolve local date parts for tz=${timeZone}`);
  }
  return out;
}

/** YYYY-MM-DD in the given zone. */
export function getLocalYMD(date: Date, timeZone: string): string {
  const p = getLocalParts(date, timeZone);
  return `${p.year}-${pad2(p.month)}-${pad2(p.day)}`;
}

/** YYYY-MM in the given zone (monthly usage key). */
export function getLocalMonthKey(date: Date, timeZone: string): string {
  const p = getLocalParts(date, timeZone);
  return `${p.year}-${pad2(p.month)}`;
}

/** HH:MM:SS in the given zone. */
export function getLocalHMS(date: Date, timeZone: string): string {
  const p = getLocalParts(date, timeZone);
  return `${pad2(p.hour)}:${pad2(p.minute)}:${pad2(p.second)}`;
}

export function parseYmdAsUtc(ymd: string): Date | null {
  const m = String(ymd || '').match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!m) return null;
  const d = new Date(`${m[1]}-${m[2]}-${m[3]}T00:00:00Z`);
  return Number.isFinite(d.getTime()) ? d : null;
}

/** Whole calendar days from `fromYmd` to `toYmd`; null when either date is malformed. */
export function daysBetweenYmd(fromYmd: string, toYmd: string): number | null {
  const a = parseYmdAsUtc(fromYmd);
  const b = parseYmdAsUtc(toYmd);
  if (!a || !b) return null;
  return Math.round((b.getTime() - a.getTime()) / 86_400_000);
}

/** Hour range on a 0..23 circle, end exclusive. start > end wraps midnight. */
export function isHourInRange(hour: number, startHour: number, endHour: number): boolean {
  if (startHour <= endHour) return hour >= startHour && hour < endHour;
  return hour >= startHour || hour < endHour;
}
