import { CATEGORIES, categoryIdOf, findCategoryById, type CategoryPrice } from '../../domain/category';
import { MappingError } from '../errors/syncErrors';
import type { CategoryPriceRow } from '../ports/localStore';
import type { JsonValue } from '../ports/remoteClient';
import { readNumber, requireId, requireObject } from './wireValues';

const ENTITY = 'categoryPrice';

export type CategoryPriceWire = {
  CAT_ID: number;
  CAR_PRICE: number;
};

const requireCategory = (id: number) => {
  const category = findCategoryById(id);
  if (!category) {
    throw new MappingError(ENTITY, 'CAT_ID', `Unknown category id ${id}.`);
  }

  return category;
};

export const categoryPriceMapper = {
  /** Price lists are served per race, so the race id comes from the request scope. */
  fromWireJson(json: JsonValue, raceId: number): CategoryPrice {
    const source = requireObject(json, ENTITY);
    const category = requireCategory(requireId(source, 'CAT_ID', ENTITY));
    return { raceId, category: category.code, price: readNumber(source, 'CAR_PRICE') ?? 0 };
  },

  fromLocalRow(row: CategoryPriceRow): CategoryPrice {
    return { raceId: row.race_id, category: requireCategory(row.category_id).code, price: row.price };
  },

  toWireJson(price: CategoryPrice): CategoryPriceWire {
    return { CAT_ID: categoryIdOf(price.category), CAR_PRICE: price.price };
  },

  toLocalRow(price: CategoryPrice): CategoryPriceRow {
    return { race_id: price.raceId, category_id: categoryIdOf(price.category), price: price.price };
  },

  /** Orders prices like the fixed category list. */
  sort(prices: readonly CategoryPrice[]): CategoryPrice[] {
    const order = CATEGORIES.map((category) => category.code);
    return [...prices].sort(
      (left, right) => order.indexOf(left.category) - order.indexOf(right.category),
    );
  },
};
