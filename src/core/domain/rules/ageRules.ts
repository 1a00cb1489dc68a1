import type { AgeThresholds } from '../race';
import type { CalendarDate } from '../user';

const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/u;

/** Full years elapsed between `birthDate` and `now`, evaluated on UTC calendar days. */
export const ageOn = (birthDate: CalendarDate, now: Date): number => {
  const match = CALENDAR_DATE_PATTERN.exec(birthDate);
  if (!match) {
    throw new RangeError(`Invalid calendar date: ${birthDate}`);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  const nowMonth = now.getUTCMonth() + 1;
  const nowDay = now.getUTCDate();
  const beforeBirthday = nowMonth < month || (nowMonth === month && nowDay < day);

  return now.getUTCFullYear() - year - (beforeBirthday ? 1 : 0);
};

export type AgeThresholdsCheck = { ok: true } | { ok: false; reason: 'thresholds-not-increasing' };

export const checkAgeThresholds = (thresholds: AgeThresholds): AgeThresholdsCheck => {
  const { minimum, autonomous, supervisor } = thresholds;
  if (minimum >= 0 && minimum < autonomous && autonomous < supervisor) {
    return { ok: true };
  }

  return { ok: false, reason: 'thresholds-not-increasing' };
};

export type TeamCompositionFailure =
  | 'empty-roster'
  | 'member-below-minimum-age'
  | 'missing-supervising-adult';

export type TeamCompositionCheck =
  | { ok: true; rule: 'all-autonomous' | 'supervised' }
  | { ok: false; reason: TeamCompositionFailure; message: string };

/**
 * A team is valid when every member is at least `autonomous`, or when at least one
 * member is in `[minimum, autonomous)` and at least one member is `supervisor` or older.
 */
export const checkTeamComposition = (
  thresholds: AgeThresholds,
  ages: readonly number[],
): TeamCompositionCheck => {
  if (ages.length === 0) {
    return { ok: false, reason: 'empty-roster', message: 'The team has no members.' };
  }

  const sorted = [...ages].sort((left, right) => left - right);
  if (sorted.every((age) => age >= thresholds.autonomous)) {
    return { ok: true, rule: 'all-autonomous' };
  }

  const hasSupervisedMember = sorted.some(
    (age) => age >= thresholds.minimum && age < thresholds.autonomous,
  );
  const hasSupervisor = sorted.some((age) => age >= thresholds.supervisor);

  if (hasSupervisedMember && hasSupervisor) {
    return { ok: true, rule: 'supervised' };
  }

  if (!hasSupervisedMember) {
    return {
      ok: false,
      reason: 'member-below-minimum-age',
      message: `Members under ${thresholds.autonomous} must be at least ${thresholds.minimum}.`,
    };
  }

  return {
    ok: false,
    reason: 'missing-supervising-adult',
    message: `Members under ${thresholds.autonomous} need a teammate aged ${thresholds.supervisor} or more.`,
  };
};
