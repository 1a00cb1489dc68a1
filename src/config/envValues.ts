export type EnvIssue = {
  key: string;
  message: string;
};

const TRUE_FLAG_VALUES = new Set(['1', 'true', 'yes', 'y', 'on']);
const FALSE_FLAG_VALUES = new Set(['0', 'false', 'no', 'n', 'off']);

export function isAbsoluteUrl(value: string): boolean {
  if (!value) {
    return false;
  }

  try {
    new URL(value);
    return /^(http|https):/i.test(value);
  } catch {
    return false;
  }
}

export function isPositiveInteger(value: string): boolean {
  return /^\d+$/.test(value) && Number(value) > 0;
}

export function parseBooleanFlagValue(value: string): boolean | null {
  const normalised = value.trim().toLowerCase();

  if (normalised.length === 0) {
    return null;
  }

  if (TRUE_FLAG_VALUES.has(normalised)) {
    return true;
  }

  if (FALSE_FLAG_VALUES.has(normalised)) {
    return false;
  }

  return null;
}

/** Trimmed value, or undefined when unset or blank. */
export function readEnvValue(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : undefined;
}
