import { Application, Router } from 'express';
import { asyncHandler } from 'saga-messaging';
import { createNotificationsController, NotificationsControllerDeps } from './controllers/notifications.controller';

export type NotificationsDepsProvider = () => NotificationsControllerDeps | null;

export function registerNotificationRoutes(app: Application, getDeps: NotificationsDepsProvider) {
  const router = Router();
  const ctrl = createNotificationsController(getDeps);

  router.post('/', asyncHandler(ctrl.create));
  router.get('/user/:userId', asyncHandler(ctrl.listByUser));
  router.post('/process-queue', asyncHandler(ctrl.processQueue));
  router.post('/preferences', asyncHandler(ctrl.upsertPreferences));
  router.delete('/:id', asyncHandler(ctrl.disable));

  app.use('/api/notifications', router);
}

export default registerNotificationRoutes;
