import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';

const CatalogueSchema = z.array(
  z.object({
    productId: z.string().min(1),
    name: z.string().min(1),
    stock: z.number().int().nonnegative(),
  })
);

export type CatalogueEntry = z.infer<typeof CatalogueSchema>[number];

/** The starter catalogue shipped beside this file. */
export function loadCatalogue(file = path.join(__dirname, 'products.json')): CatalogueEntry[] {
  return CatalogueSchema.parse(JSON.parse(readFileSync(file, 'utf8')));
}
