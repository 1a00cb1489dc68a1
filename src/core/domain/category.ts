export type CategoryCode = 'minor' | 'adult' | 'licensed';

export type Category = {
  id: number;
  code: CategoryCode;
  label: string;
};

export const CATEGORIES: readonly Category[] = [
  { id: 1, code: 'minor', label: 'Mineur' },
  { id: 2, code: 'adult', label: 'Majeur non licencié' },
  { id: 3, code: 'licensed', label: 'Licencié' },
];

export const findCategoryById = (id: number): Category | null =>
  CATEGORIES.find((category) => category.id === id) ?? null;

export const categoryIdOf = (code: CategoryCode): number => {
  const category = CATEGORIES.find((candidate) => candidate.code === code);
  if (!category) {
    throw new Error(`Unknown category ${code}`);
  }

  return category.id;
};

export type CategoryPrice = {
  raceId: number;
  category: CategoryCode;
  price: number;
};

export type CategoryPriceSet = Record<CategoryCode, number>;

export const toCategoryPrices = (raceId: number, prices: CategoryPriceSet): CategoryPrice[] =>
  CATEGORIES.map((category) => ({ raceId, category: category.code, price: prices[category.code] }));
