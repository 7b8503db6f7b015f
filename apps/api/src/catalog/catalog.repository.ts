import { Injectable } from '@nestjs/common';
import type {
  CatalogIngredient,
  CatalogIngredientSizePrice,
  CatalogMenuItem,
  CatalogSize,
  CatalogSizeAssignment,
} from '@shared/pricing';
import { DatabaseService } from '../database/database.service';

/** pg returns numeric columns as strings */
type Numeric = string | number;

const toNumber = (value: Numeric): number => Number(value);
const toNullableNumber = (value: Numeric | null): number | null =>
  value === null ? null : Number(value);

/**
 * Catalog reads. Every query carries the tenant predicate, so an id owned
 * by another tenant simply yields no row.
 */
@Injectable()
export class CatalogRepository {
  constructor(private readonly db: DatabaseService) {}

  async findMenuItems(
    tenantId: string,
    ids: readonly string[],
  ): Promise<CatalogMenuItem[]> {
    if (ids.length === 0) return [];
    const { rows } = await this.db.query<{
      id: string;
      base_price: Numeric;
      discounted_price: Numeric | null;
    }>(
      `SELECT id, base_price, discounted_price FROM menu_items
        WHERE tenant_id = $1 AND id = ANY($2::uuid[])`,
      [tenantId, ids],
    );
    return rows.map((row) => ({
      id: row.id,
      basePrice: toNumber(row.base_price),
      discountedPrice: toNullableNumber(row.discounted_price),
    }));
  }

  async findSizes(
    tenantId: string,
    ids: readonly string[],
  ): Promise<CatalogSize[]> {
    if (ids.length === 0) return [];
    const { rows } = await this.db.query<{
      id: string;
      price_multiplier: Numeric;
    }>(
      `SELECT id, price_multiplier FROM size_variants
        WHERE tenant_id = $1 AND id = ANY($2::uuid[])`,
      [tenantId, ids],
    );
    return rows.map((row) => ({
      id: row.id,
      multiplier: toNumber(row.price_multiplier),
    }));
  }

  async findSizeAssignments(
    tenantId: string,
    menuItemIds: readonly string[],
    sizeIds: readonly string[],
  ): Promise<CatalogSizeAssignment[]> {
    if (menuItemIds.length === 0 || sizeIds.length === 0) return [];
    const { rows } = await this.db.query<{
      menu_item_id: string;
      size_id: string;
      price_override: Numeric | null;
    }>(
      `SELECT menu_item_id, size_id, price_override FROM menu_item_sizes
        WHERE tenant_id = $1
          AND menu_item_id = ANY($2::uuid[])
          AND size_id = ANY($3::uuid[])`,
      [tenantId, menuItemIds, sizeIds],
    );
    return rows.map((row) => ({
      menuItemId: row.menu_item_id,
      sizeId: row.size_id,
      priceOverride: toNullableNumber(row.price_override),
    }));
  }

  async findIngredients(
    tenantId: string,
    ids: readonly string[],
  ): Promise<CatalogIngredient[]> {
    if (ids.length === 0) return [];
    const { rows } = await this.db.query<{ id: string; base_price: Numeric }>(
      `SELECT id, base_price FROM ingredients
        WHERE tenant_id = $1 AND id = ANY($2::uuid[])`,
      [tenantId, ids],
    );
    return rows.map((row) => ({
      id: row.id,
      basePrice: toNumber(row.base_price),
    }));
  }

  async findIngredientSizePrices(
    tenantId: string,
    ingredientIds: readonly string[],
    sizeIds: readonly string[],
  ): Promise<CatalogIngredientSizePrice[]> {
    if (ingredientIds.length === 0 || sizeIds.length === 0) return [];
    const { rows } = await this.db.query<{
      ingredient_id: string;
      size_id: string;
      price: Numeric;
    }>(
      `SELECT ingredient_id, size_id, price FROM ingredient_size_prices
        WHERE tenant_id = $1
          AND ingredient_id = ANY($2::uuid[])
          AND size_id = ANY($3::uuid[])`,
      [tenantId, ingredientIds, sizeIds],
    );
    return rows.map((row) => ({
      ingredientId: row.ingredient_id,
      sizeId: row.size_id,
      price: toNumber(row.price),
    }));
  }
}
