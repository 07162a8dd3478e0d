import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { Product, ProductCategory } from './types.js';

const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../config/catalog.json', import.meta.url));

const CATEGORIES = ['whey_protein', 'protein_shake', 'protein_drink', 'paneer'] as const satisfies readonly ProductCategory[];

export const CATEGORY_LABELS: Record<ProductCategory, { label: string; emoji: string }> = {
  whey_protein: { label: 'Whey Protein', emoji: '💪' },
  protein_shake: { label: 'Protein Shakes', emoji: '🥤' },
  protein_drink: { label: 'Protein Drinks', emoji: '🥛' },
  paneer: { label: 'Paneer', emoji: '🧀' },
};

const productSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  category: z.enum(CATEGORIES),
  sku: z.string().min(1).optional(),
  url: z.string().url().optional(),
});

const catalogSchema = z
  .object({ products: z.array(productSchema).min(1) })
  .superRefine(({ products }, ctx) => {
    const seen = new Set<string>();
    products.forEach((product, index) => {
      if (seen.has(product.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['products', index, 'id'],
          message: `Duplicate product id: ${product.id}`,
        });
      }
      seen.add(product.id);
    });
  });

export class Catalog {
  private products: Map<string, Product>;

  constructor(products: Product[]) {
    this.products = new Map(products.map((p): [string, Product] => [p.id, p]));
  }

  get(id: string): Product | undefined {
    return this.products.get(id);
  }

  has(id: string): boolean {
    return this.products.has(id);
  }

  ids(): Set<string> {
    return new Set(this.products.keys());
  }

  all(): Product[] {
    return [...this.products.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  byCategory(): Map<ProductCategory, Product[]> {
    const grouped = new Map<ProductCategory, Product[]>();
    for (const category of CATEGORIES) {
      const members = this.all().filter(p => p.category === category);
      if (members.length > 0) grouped.set(category, members);
    }
    return grouped;
  }

  /** Case-insensitive match on id, name or SKU, for autocomplete. */
  search(query: string, limit = 25): Product[] {
    const needle = query.trim().toLowerCase();
    return this.all()
      .filter(p =>
        !needle ||
        p.id.toLowerCase().includes(needle) ||
        p.name.toLowerCase().includes(needle) ||
        (p.sku?.toLowerCase().includes(needle) ?? false)
      )
      .slice(0, limit);
  }
}

export function parseCatalog(raw: unknown): Catalog {
  return new Catalog(catalogSchema.parse(raw).products);
}

export function loadCatalog(catalogPath: string = DEFAULT_CATALOG_PATH): Catalog {
  const raw: unknown = JSON.parse(fs.readFileSync(catalogPath, 'utf8'));
  return parseCatalog(raw);
}
