import { Injectable } from '@nestjs/common';
import type { ProposedLineItemInput } from '@shared/order';
import type { CatalogSnapshot } from '@shared/pricing';
import { normalizeUuid } from '@shared/utils';
import { CatalogRepository } from './catalog.repository';

export type CatalogReferences = {
  menuItemIds: string[];
  sizeIds: string[];
  ingredientIds: string[];
};

const addId = (target: Set<string>, raw: string | undefined): void => {
  // non-uuid ids can never match a catalog row; they stay catalog misses
  const id = normalizeUuid(raw);
  if (id) target.add(id);
};

/** Collects every catalog id a set of proposed lines refers to. */
export function collectCatalogReferences(
  items: readonly ProposedLineItemInput[],
): CatalogReferences {
  const menuItemIds = new Set<string>();
  const sizeIds = new Set<string>();
  const ingredientIds = new Set<string>();

  for (const item of items) {
    addId(menuItemIds, item.menuItemId);
    const variants = item.variants;
    if (!variants) continue;

    addId(sizeIds, variants.size?.id);
    if (variants.isSplit) addId(menuItemIds, variants.secondProduct?.id);
    for (const ingredient of variants.addedIngredients ?? []) {
      addId(ingredientIds, ingredient.id);
    }
  }

  return {
    menuItemIds: [...menuItemIds],
    sizeIds: [...sizeIds],
    ingredientIds: [...ingredientIds],
  };
}

@Injectable()
export class CatalogSnapshotLoader {
  constructor(private readonly catalog: CatalogRepository) {}

  async load(
    tenantId: string,
    items: readonly ProposedLineItemInput[],
  ): Promise<CatalogSnapshot> {
    const refs = collectCatalogReferences(items);

    const [menuItems, sizes, sizeAssignments, ingredients, ingredientSizePrices] =
      await Promise.all([
        this.catalog.findMenuItems(tenantId, refs.menuItemIds),
        this.catalog.findSizes(tenantId, refs.sizeIds),
        this.catalog.findSizeAssignments(
          tenantId,
          refs.menuItemIds,
          refs.sizeIds,
        ),
        this.catalog.findIngredients(tenantId, refs.ingredientIds),
        this.catalog.findIngredientSizePrices(
          tenantId,
          refs.ingredientIds,
          refs.sizeIds,
        ),
      ]);

    return { menuItems, sizes, sizeAssignments, ingredients, ingredientSizePrices };
  }
}
