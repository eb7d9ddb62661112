// ── Cron Expression Parser ──────────────────────────────────────────────────
//
// 5-field crontab parser used to project upcoming jobs.
// Fields: minute(0-59) hour(0-23) day-of-month(1-31) month(1-12) day-of-week(0-7)
// Supports: *, literals, ranges (1-5), steps (*/15, 1-5/2), lists (1,3,5),
// month/day names (jan, mon) and the @hourly..@yearly macros.
// Day-of-week: 0 and 7 both mean Sunday.

// ── Types ───────────────────────────────────────────────────────────────────

export interface CronFields {
  readonly minute: readonly number[];
  readonly hour: readonly number[];
  readonly dayOfMonth: readonly number[];
  readonly month: readonly number[];
  readonly dayOfWeek: readonly number[];
  /** False when the day-of-month field was `*`. */
  readonly dayOfMonthRestricted: boolean;
  /** False when the day-of-week field was `*`. */
  readonly dayOfWeekRestricted: boolean;
}

// ── Error ───────────────────────────────────────────────────────────────────

export class CronParseError extends Error {
  constructor(
    message: string,
    public readonly expression: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = "CronParseError";
  }
}

// ── Field Definitions ───────────────────────────────────────────────────────

interface FieldDef {
  readonly name: string;
  readonly min: number;
  readonly max: number;
  readonly names?: readonly string[];
}

const MONTH_NAMES = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];
const DAY_NAMES = ["sun", "mon", "tue", "wed", "thu", "fri", "sat"];

const FIELD_DEFS: readonly FieldDef[] = [
  { name: "minute", min: 0, max: 59 },
  { name: "hour", min: 0, max: 23 },
  { name: "dayOfMonth", min: 1, max: 31 },
  { name: "month", min: 1, max: 12, names: MONTH_NAMES },
  { name: "dayOfWeek", min: 0, max: 7, names: DAY_NAMES },
];

export const CRON_MACROS: Readonly<Record<string, string>> = {
  "@yearly": "0 0 1 1 *",
  "@annually": "0 0 1 1 *",
  "@monthly": "0 0 1 * *",
  "@weekly": "0 0 * * 0",
  "@daily": "0 0 * * *",
  "@midnight": "0 0 * * *",
  "@hourly": "0 * * * *",
};

// ── Parse ───────────────────────────────────────────────────────────────────

/**
 * Parse a 5-field cron expression (or a supported macro).
 * Throws CronParseError for invalid expressions, including `@reboot`, which
 * has no calendar schedule.
 */
export function parseCron(expression: string): CronFields {
  const trimmed = expression.trim();
  if (!trimmed) {
    throw new CronParseError("Empty cron expression", expression);
  }

  if (trimmed.startsWith("@")) {
    const expanded = CRON_MACROS[trimmed.toLowerCase()];
    if (expanded === undefined) {
      throw new CronParseError(`Unsupported macro "${trimmed}"`, expression);
    }
    return parseCron(expanded);
  }

  const parts = trimmed.split(/\s+/);
  if (parts.length !== 5) {
    throw new CronParseError(
      `Expected 5 fields, got ${parts.length}`,
      expression,
    );
  }

  const parsed = FIELD_DEFS.map((def, i) => parseField(parts[i] ?? "", def, expression));
  const [minute = [], hour = [], dayOfMonth = [], month = [], rawDow = []] = parsed;

  // 7 and 0 both mean Sunday
  const dayOfWeek = [...new Set(rawDow.map((v) => (v === 7 ? 0 : v)))].sort(
    (a, b) => a - b,
  );

  return {
    minute,
    hour,
    dayOfMonth,
    month,
    dayOfWeek,
    dayOfMonthRestricted: !parts[2]?.startsWith("*"),
    dayOfWeekRestricted: !parts[4]?.startsWith("*"),
  };
}

function parseField(
  field: string,
  def: FieldDef,
  expression: string,
): readonly number[] {
  const values = new Set<number>();

  for (const part of field.split(",")) {
    if (!part) {
      throw new CronParseError(
        `Empty value in field "${def.name}"`,
        expression,
        def.name,
      );
    }
    parseFieldPart(part, def, expression, values);
  }

  return [...values].sort((a, b) => a - b);
}

function parseFieldPart(
  part: string,
  def: FieldDef,
  expression: string,
  values: Set<number>,
): void {
  const [base = "", stepRaw, ...extra] = part.split("/");
  if (extra.length > 0) {
    throw new CronParseError(
      `Invalid step expression "${part}" in field "${def.name}"`,
      expression,
      def.name,
    );
  }

  const step = stepRaw === undefined ? 1 : parseNumber(stepRaw, def, expression);
  if (step <= 0) {
    throw new CronParseError(
      `Step value must be positive in field "${def.name}", got ${step}`,
      expression,
      def.name,
    );
  }

  let start: number;
  let end: number;

  if (base === "*") {
    start = def.min;
    end = def.max;
  } else if (base.includes("-")) {
    const [startRaw = "", endRaw = "", ...rest] = base.split("-");
    if (rest.length > 0) {
      throw new CronParseError(
        `Invalid range "${base}" in field "${def.name}"`,
        expression,
        def.name,
      );
    }
    start = parseValue(startRaw, def, expression);
    end = parseValue(endRaw, def, expression);
    if (start > end) {
      throw new CronParseError(
        `Range start ${start} > end ${end} in field "${def.name}"`,
        expression,
        def.name,
      );
    }
  } else {
    start = parseValue(base, def, expression);
    // "10/5" steps from the value to the field maximum
    end = stepRaw === undefined ? start : def.max;
  }

  for (let v = start; v <= end; v += step) {
    values.add(v);
  }
}

function parseValue(raw: string, def: FieldDef, expression: string): number {
  const nameIndex = def.names?.indexOf(raw.toLowerCase()) ?? -1;
  const value =
    nameIndex >= 0 ? nameIndex + (def.name === "month" ? 1 : 0) : parseNumber(raw, def, expression);

  if (value < def.min || value > def.max) {
    throw new CronParseError(
      `Value ${value} out of range [${def.min}-${def.max}] in field "${def.name}"`,
      expression,
      def.name,
    );
  }
  return value;
}

function parseNumber(raw: string, def: FieldDef, expression: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new CronParseError(
      `Non-numeric value "${raw}" in field "${def.name}"`,
      expression,
      def.name,
    );
  }
  return Number.parseInt(raw, 10);
}

// ── Match ───────────────────────────────────────────────────────────────────

/**
 * Day matching follows crontab: when both day fields are restricted, either
 * one matching is enough.
 */
function dayMatches(fields: CronFields, date: Date): boolean {
  const domHit = fields.dayOfMonth.includes(date.getDate());
  const dowHit = fields.dayOfWeek.includes(date.getDay());

  if (fields.dayOfMonthRestricted && fields.dayOfWeekRestricted) {
    return domHit || dowHit;
  }
  return domHit && dowHit;
}

/**
 * Check whether a given Date (local time) matches a parsed cron schedule.
 */
export function cronMatches(fields: CronFields, date: Date): boolean {
  return (
    fields.minute.includes(date.getMinutes()) &&
    fields.hour.includes(date.getHours()) &&
    fields.month.includes(date.getMonth() + 1) &&
    dayMatches(fields, date)
  );
}

// ── Next Match ──────────────────────────────────────────────────────────────

/**
 * Find the earliest Date strictly after `after` that matches the cron,
 * or null if none falls within `withinMs`.
 *
 * Walks forward day by day, then picks the earliest hour:minute on a
 * matching day.
 */
export function nextCronMatch(
  fields: CronFields,
  after: Date,
  withinMs: number,
): Date | null {
  const limit = after.getTime() + withinMs;

  const lowerBound = new Date(after);
  lowerBound.setSeconds(0, 0);
  lowerBound.setMinutes(lowerBound.getMinutes() + 1);

  const day = new Date(lowerBound);
  day.setHours(0, 0, 0, 0);

  while (day.getTime() <= limit) {
    if (fields.month.includes(day.getMonth() + 1) && dayMatches(fields, day)) {
      const match = findEarliestTimeOnDay(fields, day, lowerBound);
      if (match) {
        return match.getTime() <= limit ? match : null;
      }
    }
    day.setDate(day.getDate() + 1);
  }

  return null;
}

function findEarliestTimeOnDay(
  fields: CronFields,
  day: Date,
  lowerBound: Date,
): Date | null {
  for (const hour of fields.hour) {
    for (const minute of fields.minute) {
      const candidate = new Date(day);
      candidate.setHours(hour, minute, 0, 0);

      if (candidate >= lowerBound) {
        return candidate;
      }
    }
  }

  return null;
}
