import type { CategoryPriceSet } from '../category';

export type PriceOrderingFailure = 'invalid-price' | 'licensed-above-minor' | 'minor-above-adult';

export type PriceOrderingCheck =
  | { ok: true }
  | { ok: false; reason: PriceOrderingFailure; message: string };

export const checkPriceOrdering = (prices: CategoryPriceSet): PriceOrderingCheck => {
  const values = [prices.minor, prices.adult, prices.licensed];
  if (values.some((value) => !Number.isFinite(value) || value < 0)) {
    return {
      ok: false,
      reason: 'invalid-price',
      message: 'Category prices must be non-negative numbers.',
    };
  }

  if (prices.licensed > prices.minor) {
    return {
      ok: false,
      reason: 'licensed-above-minor',
      message: 'The licensed price cannot exceed the minor price.',
    };
  }

  if (prices.minor > prices.adult) {
    return {
      ok: false,
      reason: 'minor-above-adult',
      message: 'The minor price cannot exceed the non-licensed adult price.',
    };
  }

  return { ok: true };
};
