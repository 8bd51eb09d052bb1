import type { Request, Response } from 'express';
import { z } from 'zod';
import { NotReadyError, ok, ValidationError, zodIssues } from 'saga-messaging';
import type { InventoryRepository } from '../../repositories/inventoryRepo';

export interface ProductsControllerDeps {
  inventory: InventoryRepository;
}

export const SetStockSchema = z.object({
  stock: z.number().int().nonnegative(),
  name: z.string().min(1).optional(),
});

export function createProductsController(getDeps: () => ProductsControllerDeps | null) {
  const requireDeps = (): ProductsControllerDeps => {
    const deps = getDeps();
    if (!deps) throw new NotReadyError();
    return deps;
  };

  const listProducts = async (req: Request, res: Response): Promise<void> => {
    const { inventory } = requireDeps();
    const ids = String(req.query.ids ?? '')
      .split(',')
      .map((id) => id.trim())
      .filter(Boolean);
    if (ids.length === 0) throw new ValidationError('Query parameter ids is required', ['ids: expected a comma-separated list']);
    const products = await inventory.getByIds([...new Set(ids)]);
    res.status(200).json(ok(products));
  };

  const setStock = async (req: Request, res: Response): Promise<void> => {
    const { inventory } = requireDeps();
    const parsed = SetStockSchema.safeParse(req.body);
    if (!parsed.success) throw new ValidationError('Invalid stock update', zodIssues(parsed.error));
    const product = await inventory.setStock(String(req.params.id), parsed.data.stock, parsed.data.name);
    res.status(200).json(ok(product, 'Stock updated'));
  };

  return { listProducts, setStock };
}
