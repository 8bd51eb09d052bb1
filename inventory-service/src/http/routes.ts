import { Application, Router } from 'express';
import { asyncHandler } from 'saga-messaging';
import { createProductsController, ProductsControllerDeps } from './controllers/products.controller';

export type ProductsDepsProvider = () => ProductsControllerDeps | null;

export function registerProductRoutes(app: Application, getDeps: ProductsDepsProvider) {
  const router = Router();
  const ctrl = createProductsController(getDeps);

  router.get('/products', asyncHandler(ctrl.listProducts));
  router.put('/products/:id/stock', asyncHandler(ctrl.setStock));

  app.use('/', router);
}

export default registerProductRoutes;
