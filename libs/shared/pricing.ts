// libs/shared/pricing.ts
//
// Server-side price reconciliation. Pure: the caller loads the catalog
// snapshot, this module only computes.

import type {
  AddedIngredientInput,
  ProposedLineItemInput,
} from './order';
import { roundMoney } from './utils';

export type CatalogMenuItem = {
  id: string;
  basePrice: number;
  discountedPrice: number | null;
};

export type CatalogSize = {
  id: string;
  multiplier: number;
};

export type CatalogSizeAssignment = {
  menuItemId: string;
  sizeId: string;
  priceOverride: number | null;
};

export type CatalogIngredient = {
  id: string;
  basePrice: number;
};

export type CatalogIngredientSizePrice = {
  ingredientId: string;
  sizeId: string;
  price: number;
};

export type CatalogSnapshot = {
  menuItems: CatalogMenuItem[];
  sizes: CatalogSize[];
  sizeAssignments: CatalogSizeAssignment[];
  ingredients: CatalogIngredient[];
  ingredientSizePrices: CatalogIngredientSizePrice[];
};

export type IngredientSelection = {
  ingredientId: string;
  quantity: number;
};

export type LinePrice = {
  unitPrice: number;
  subtotal: number;
};

export type ReconciledLineItem = Omit<
  ProposedLineItemInput,
  'unitPrice' | 'subtotal'
> &
  LinePrice & {
    corrected: boolean;
    /** A referenced menu item, size or added ingredient is not in the tenant's catalog. */
    catalogMiss: boolean;
  };

/** Referenced ids the tenant's catalog does not contain, in first-seen order. */
export type CatalogMisses = {
  menuItemIds: string[];
  sizeIds: string[];
  ingredientIds: string[];
};

export type PriceCorrection = {
  index: number;
  menuItemId: string;
  name: string;
  client: LinePrice;
  server: LinePrice;
};

export type ReconciliationResult = {
  items: ReconciledLineItem[];
  corrected: boolean;
  catalogMiss: boolean;
  missing: CatalogMisses;
  corrections: PriceCorrection[];
};

/** Client and server figures further apart than this are a mismatch. */
export const PRICE_TOLERANCE = 0.01;

/** Rounds up to the next half currency unit. */
export function roundUpToHalf(amount: number): number {
  return Math.ceil(amount * 2) / 2;
}

export function splitIngredientSuffix(secondProductName: string): string {
  return `: ${secondProductName}`;
}

/**
 * Attributes each added ingredient of a split item to one half.
 * An explicit `half` tag wins; untagged ingredients fall back to the
 * name-suffix convention (`"<ingredient>: <second product name>"`).
 */
export function partitionSplitIngredients(
  ingredients: readonly AddedIngredientInput[],
  secondProductName: string,
): { first: IngredientSelection[]; second: IngredientSelection[] } {
  const suffix = splitIngredientSuffix(secondProductName);
  const first: IngredientSelection[] = [];
  const second: IngredientSelection[] = [];

  for (const ingredient of ingredients) {
    const selection = {
      ingredientId: ingredient.id,
      quantity: ingredient.quantity,
    };
    const belongsToSecond =
      ingredient.half !== undefined
        ? ingredient.half === 'second'
        : (ingredient.name ?? '').includes(suffix);

    if (belongsToSecond) second.push(selection);
    else first.push(selection);
  }

  return { first, second };
}

export class PriceCalculator {
  private readonly menuItems: Map<string, CatalogMenuItem>;
  private readonly sizeMultipliers: Map<string, number>;
  private readonly sizeOverrides: Map<string, number>;
  private readonly ingredientPrices: Map<string, number>;
  private readonly ingredientSizePrices: Map<string, number>;

  constructor(snapshot: CatalogSnapshot) {
    this.menuItems = new Map(snapshot.menuItems.map((m) => [m.id, m]));
    this.sizeMultipliers = new Map(
      snapshot.sizes.map((s) => [s.id, s.multiplier]),
    );
    this.sizeOverrides = new Map();
    for (const assignment of snapshot.sizeAssignments) {
      if (assignment.priceOverride === null) continue;
      this.sizeOverrides.set(
        pairKey(assignment.menuItemId, assignment.sizeId),
        assignment.priceOverride,
      );
    }
    this.ingredientPrices = new Map(
      snapshot.ingredients.map((i) => [i.id, i.basePrice]),
    );
    this.ingredientSizePrices = new Map(
      snapshot.ingredientSizePrices.map((p) => [
        pairKey(p.ingredientId, p.sizeId),
        p.price,
      ]),
    );
  }

  hasMenuItem(menuItemId: string): boolean {
    return this.menuItems.has(menuItemId);
  }

  hasSize(sizeId: string): boolean {
    return this.sizeMultipliers.has(sizeId);
  }

  hasIngredient(ingredientId: string): boolean {
    return this.ingredientPrices.has(ingredientId);
  }

  basePrice(menuItemId: string, sizeId: string | null): number {
    const menuItem = this.menuItems.get(menuItemId);
    if (!menuItem) return 0;

    const effectivePrice = menuItem.discountedPrice ?? menuItem.basePrice;
    if (!sizeId) return effectivePrice;

    // a per-product override replaces the multiplier outright
    const override = this.sizeOverrides.get(pairKey(menuItemId, sizeId));
    if (override !== undefined) return override;

    const multiplier = this.sizeMultipliers.get(sizeId);
    if (multiplier !== undefined) return effectivePrice * multiplier;

    return effectivePrice;
  }

  ingredientsCost(
    selections: readonly IngredientSelection[],
    sizeId: string | null,
  ): number {
    let total = 0;
    for (const selection of selections) {
      const basePrice = this.ingredientPrices.get(selection.ingredientId);
      if (basePrice === undefined) continue;

      const sizePrice = sizeId
        ? this.ingredientSizePrices.get(pairKey(selection.ingredientId, sizeId))
        : undefined;
      total += (sizePrice ?? basePrice) * selection.quantity;
    }
    return total;
  }

  regularItemPrice(
    menuItemId: string,
    sizeId: string | null,
    added: readonly IngredientSelection[],
    quantity: number,
  ): LinePrice {
    if (!this.menuItems.has(menuItemId)) return { unitPrice: 0, subtotal: 0 };

    const unitPrice = roundMoney(
      this.basePrice(menuItemId, sizeId) + this.ingredientsCost(added, sizeId),
    );
    return { unitPrice, subtotal: roundMoney(unitPrice * quantity) };
  }

  splitItemPrice(params: {
    firstMenuItemId: string;
    secondMenuItemId: string;
    sizeId: string | null;
    firstAdded: readonly IngredientSelection[];
    secondAdded: readonly IngredientSelection[];
    quantity: number;
  }): LinePrice {
    const { firstMenuItemId, secondMenuItemId, sizeId, quantity } = params;
    if (
      !this.menuItems.has(firstMenuItemId) ||
      !this.menuItems.has(secondMenuItemId)
    ) {
      return { unitPrice: 0, subtotal: 0 };
    }

    const firstTotal =
      this.basePrice(firstMenuItemId, sizeId) +
      this.ingredientsCost(params.firstAdded, sizeId);
    const secondTotal =
      this.basePrice(secondMenuItemId, sizeId) +
      this.ingredientsCost(params.secondAdded, sizeId);

    const unitPrice = roundUpToHalf((firstTotal + secondTotal) / 2);
    return { unitPrice, subtotal: roundMoney(unitPrice * quantity) };
  }
}

class MissTracker {
  private readonly menuItemIds = new Set<string>();
  private readonly sizeIds = new Set<string>();
  private readonly ingredientIds = new Set<string>();

  constructor(private readonly calculator: PriceCalculator) {}

  /** Records every unresolved reference of one line; true when there was one. */
  checkLine(
    menuItemIds: readonly string[],
    sizeId: string | null,
    ingredients: readonly AddedIngredientInput[],
  ): boolean {
    let miss = false;
    for (const id of menuItemIds) {
      if (this.calculator.hasMenuItem(id)) continue;
      this.menuItemIds.add(id);
      miss = true;
    }
    if (sizeId !== null && !this.calculator.hasSize(sizeId)) {
      this.sizeIds.add(sizeId);
      miss = true;
    }
    for (const ingredient of ingredients) {
      if (this.calculator.hasIngredient(ingredient.id)) continue;
      this.ingredientIds.add(ingredient.id);
      miss = true;
    }
    return miss;
  }

  result(): CatalogMisses {
    return {
      menuItemIds: [...this.menuItemIds],
      sizeIds: [...this.sizeIds],
      ingredientIds: [...this.ingredientIds],
    };
  }
}

function pairKey(a: string, b: string): string {
  return `${a}_${b}`;
}

function exceedsTolerance(a: number, b: number): boolean {
  return roundMoney(Math.abs(a - b)) > PRICE_TOLERANCE;
}

/**
 * Recomputes every line from the catalog snapshot. The returned prices are
 * always the server's; client figures only decide the `corrected` flag.
 */
export function reconcileLineItems(
  snapshot: CatalogSnapshot,
  proposed: readonly ProposedLineItemInput[],
): ReconciliationResult {
  const calculator = new PriceCalculator(snapshot);
  const misses = new MissTracker(calculator);
  const items: ReconciledLineItem[] = [];
  const corrections: PriceCorrection[] = [];

  proposed.forEach((item, index) => {
    const variants = item.variants ?? {};
    const sizeId = variants.size?.id ?? null;
    const added = variants.addedIngredients ?? [];
    const secondProduct = variants.isSplit ? variants.secondProduct : null;

    let price: LinePrice;

    if (secondProduct?.id) {
      const halves = partitionSplitIngredients(added, secondProduct.name ?? '');
      price = calculator.splitItemPrice({
        firstMenuItemId: item.menuItemId,
        secondMenuItemId: secondProduct.id,
        sizeId,
        firstAdded: halves.first,
        secondAdded: halves.second,
        quantity: item.quantity,
      });
    } else {
      price = calculator.regularItemPrice(
        item.menuItemId,
        sizeId,
        added.map((a) => ({ ingredientId: a.id, quantity: a.quantity })),
        item.quantity,
      );
    }

    const catalogMiss = misses.checkLine(
      secondProduct?.id ? [item.menuItemId, secondProduct.id] : [item.menuItemId],
      sizeId,
      added,
    );

    const corrected =
      exceedsTolerance(price.unitPrice, item.unitPrice) ||
      exceedsTolerance(price.subtotal, item.subtotal);

    if (corrected) {
      corrections.push({
        index,
        menuItemId: item.menuItemId,
        name: item.name,
        client: { unitPrice: item.unitPrice, subtotal: item.subtotal },
        server: price,
      });
    }

    const { unitPrice: _clientUnitPrice, subtotal: _clientSubtotal, ...rest } =
      item;
    items.push({
      ...rest,
      unitPrice: price.unitPrice,
      subtotal: price.subtotal,
      corrected,
      catalogMiss,
    });
  });

  return {
    items,
    corrected: corrections.length > 0,
    catalogMiss: items.some((i) => i.catalogMiss),
    missing: misses.result(),
    corrections,
  };
}

export function sumSubtotals(items: readonly LinePrice[]): number {
  return roundMoney(items.reduce((sum, item) => sum + item.subtotal, 0));
}
