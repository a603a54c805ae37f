export interface DateParseOptions {
  /** Offset applied to values without a zone, in minutes east of UTC. */
  offsetMinutes?: number;
  now?: Date;
}

const ZONED_ISO_REGEX =
  /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?\s*(Z|[+-]\d{2}:?\d{2})$/i;
const COMPACT_STAMP_REGEX = /^(\d{4})(\d{2})(\d{2})(?:T(\d{2})(\d{2})(\d{2})Z?)?$/i;
const SEPARATED_DATE_REGEX =
  /(\d{4})\s*[-./]\s*(\d{1,2})\s*[-./]\s*(\d{1,2})\.?(?:[\sT]+(\d{1,2}):(\d{2})(?::(\d{2}))?)?/;
const KOREAN_DATE_REGEX =
  /(\d{4})\s*년\s*(\d{1,2})\s*월\s*(\d{1,2})\s*일(?:\s*(오전|오후)?\s*(\d{1,2}):(\d{2})(?::(\d{2}))?)?/;
const SHORT_YEAR_REGEX = /^(\d{2})[./-](\d{2})[./-](\d{2})$/;
const TIME_ONLY_REGEX = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;
const DIGITS_ONLY_REGEX = /\D+/g;

const MIN_YEAR = 1990;
const MAX_YEAR = 2100;

function toNumber(value: string | undefined): number {
  return value ? Number.parseInt(value, 10) : 0;
}

/**
 * Wall-clock parts in a fixed offset → ISO-8601 UTC, or null when any part
 * is out of range.
 */
export function buildIsoDate(
  parts: {
    year: number;
    month: number;
    day: number;
    hour?: number;
    minute?: number;
    second?: number;
  },
  offsetMinutes = 0
): string | null {
  const { year, month, day, hour = 0, minute = 0, second = 0 } = parts;
  if (year < MIN_YEAR || year > MAX_YEAR || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const calendar = new Date(Date.UTC(year, month - 1, day));
  if (calendar.getUTCMonth() !== month - 1 || calendar.getUTCDate() !== day) {
    return null;
  }
  const utcMs =
    Date.UTC(year, month - 1, day, hour, minute, second) - offsetMinutes * 60_000;
  return new Date(utcMs).toISOString();
}

function fromSeparated(match: RegExpMatchArray, offsetMinutes: number): string | null {
  return buildIsoDate(
    {
      year: toNumber(match[1]),
      month: toNumber(match[2]),
      day: toNumber(match[3]),
      hour: toNumber(match[4]),
      minute: toNumber(match[5]),
      second: toNumber(match[6]),
    },
    offsetMinutes
  );
}

function fromKorean(match: RegExpMatchArray, offsetMinutes: number): string | null {
  let hour = toNumber(match[5]);
  if (match[4] === "오후" && hour < 12) {
    hour += 12;
  } else if (match[4] === "오전" && hour === 12) {
    hour = 0;
  }
  return buildIsoDate(
    {
      year: toNumber(match[1]),
      month: toNumber(match[2]),
      day: toNumber(match[3]),
      hour,
      minute: toNumber(match[6]),
      second: toNumber(match[7]),
    },
    offsetMinutes
  );
}

function fromDigits(digits: string, offsetMinutes: number): string | null {
  if (![8, 12, 14].includes(digits.length)) {
    return null;
  }
  return buildIsoDate(
    {
      year: toNumber(digits.slice(0, 4)),
      month: toNumber(digits.slice(4, 6)),
      day: toNumber(digits.slice(6, 8)),
      hour: toNumber(digits.slice(8, 10)),
      minute: toNumber(digits.slice(10, 12)),
      second: toNumber(digits.slice(12, 14)),
    },
    offsetMinutes
  );
}

/**
 * Parse a date as found in metadata, API fields or listing cells.
 * Returns ISO-8601 UTC or null.
 */
export function parseDateValue(
  raw: string | null | undefined,
  options: DateParseOptions = {}
): string | null {
  const value = raw?.trim();
  if (!value) {
    return null;
  }
  const offsetMinutes = options.offsetMinutes ?? 0;

  if (ZONED_ISO_REGEX.test(value)) {
    const time = Date.parse(value.replace(" ", "T"));
    return Number.isNaN(time) ? null : new Date(time).toISOString();
  }

  const compact = value.match(COMPACT_STAMP_REGEX);
  if (compact) {
    // Compact API stamps (YYYYMMDDTHHMMSSZ) are always UTC.
    return fromDigits(
      `${compact[1]}${compact[2]}${compact[3]}${compact[4] ?? ""}${compact[5] ?? ""}${compact[6] ?? ""}`,
      compact[4] ? 0 : offsetMinutes
    );
  }

  const separated = value.match(SEPARATED_DATE_REGEX);
  if (separated && separated.index === 0) {
    return fromSeparated(separated, offsetMinutes);
  }

  const korean = value.match(KOREAN_DATE_REGEX);
  if (korean && korean.index === 0) {
    return fromKorean(korean, offsetMinutes);
  }

  const shortYear = value.match(SHORT_YEAR_REGEX);
  if (shortYear) {
    return buildIsoDate(
      {
        year: 2000 + toNumber(shortYear[1]),
        month: toNumber(shortYear[2]),
        day: toNumber(shortYear[3]),
      },
      offsetMinutes
    );
  }

  const timeOnly = value.match(TIME_ONLY_REGEX);
  if (timeOnly) {
    // Listing pages show only the time for posts from today.
    const now = options.now ?? new Date();
    const local = new Date(now.getTime() + offsetMinutes * 60_000);
    return buildIsoDate(
      {
        year: local.getUTCFullYear(),
        month: local.getUTCMonth() + 1,
        day: local.getUTCDate(),
        hour: toNumber(timeOnly[1]),
        minute: toNumber(timeOnly[2]),
        second: toNumber(timeOnly[3]),
      },
      offsetMinutes
    );
  }

  if (/[a-z]/i.test(value)) {
    const time = Date.parse(value);
    if (!Number.isNaN(time)) {
      return new Date(time).toISOString();
    }
  }

  return fromDigits(value.replace(DIGITS_ONLY_REGEX, ""), offsetMinutes);
}

/**
 * First date-looking pattern anywhere in free text.
 */
export function findDateInText(
  text: string,
  options: DateParseOptions = {}
): string | null {
  const offsetMinutes = options.offsetMinutes ?? 0;
  const separated = text.match(SEPARATED_DATE_REGEX);
  const korean = text.match(KOREAN_DATE_REGEX);

  const candidates: Array<{ index: number; iso: string | null }> = [];
  if (separated && separated.index !== undefined) {
    candidates.push({ index: separated.index, iso: fromSeparated(separated, offsetMinutes) });
  }
  if (korean && korean.index !== undefined) {
    candidates.push({ index: korean.index, iso: fromKorean(korean, offsetMinutes) });
  }
  candidates.sort((a, b) => a.index - b.index);
  return candidates.find((candidate) => candidate.iso !== null)?.iso ?? null;
}
