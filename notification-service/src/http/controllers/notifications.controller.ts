import type { Request, Response } from 'express';
import { z } from 'zod';
import { NotFoundError, NotReadyError, ok, ValidationError, zodIssues } from 'saga-messaging';
import { CreateNotificationSchema } from '../../domain/notification';
import { PreferenceSchema } from '../../domain/preference';
import type { NotificationService } from '../../notifications/notificationService';

export interface NotificationsControllerDeps {
  notificationService: NotificationService;
}

const PageSchema = z.object({
  take: z.coerce.number().int().min(1).max(200).default(50),
  skip: z.coerce.number().int().min(0).default(0),
});

function parsePage(query: unknown): z.infer<typeof PageSchema> {
  const parsed = PageSchema.safeParse(query);
  if (!parsed.success) throw new ValidationError('Invalid paging parameters', zodIssues(parsed.error));
  return parsed.data;
}

export function createNotificationsController(getDeps: () => NotificationsControllerDeps | null) {
  const requireDeps = (): NotificationsControllerDeps => {
    const deps = getDeps();
    if (!deps) throw new NotReadyError();
    return deps;
  };

  const create = async (req: Request, res: Response): Promise<void> => {
    const { notificationService } = requireDeps();
    const parsed = CreateNotificationSchema.safeParse(req.body);
    if (!parsed.success) throw new ValidationError('Invalid notification request', zodIssues(parsed.error));

    const result = await notificationService.create(parsed.data);
    switch (result.kind) {
      case 'rejected':
        throw new ValidationError('Notification rejected', result.errors);
      case 'duplicate':
        res.status(200).json(ok(result.notification, 'Notification already exists'));
        return;
      case 'created':
        res.status(201).json(ok(result.notification, 'Notification created'));
        return;
    }
  };

  const listByUser = async (req: Request, res: Response): Promise<void> => {
    const { notificationService } = requireDeps();
    const { take, skip } = parsePage(req.query);
    const list = await notificationService.listByUser(String(req.params.userId), take, skip);
    res.status(200).json(ok(list));
  };

  const processQueue = async (req: Request, res: Response): Promise<void> => {
    const { notificationService } = requireDeps();
    const { take, skip } = parsePage(req.query);
    const summary = await notificationService.processQueueBatch(take, skip);
    res.status(200).json(ok(summary, 'Queue processed'));
  };

  const disable = async (req: Request, res: Response): Promise<void> => {
    const { notificationService } = requireDeps();
    const id = String(req.params.id);
    if (!(await notificationService.disable(id))) throw new NotFoundError(`Notification ${id} not found`);
    res.status(200).json(ok(null, 'Notification disabled'));
  };

  const upsertPreferences = async (req: Request, res: Response): Promise<void> => {
    const { notificationService } = requireDeps();
    const parsed = PreferenceSchema.safeParse(req.body);
    if (!parsed.success) throw new ValidationError('Invalid preferences', zodIssues(parsed.error));
    const saved = await notificationService.upsertPreferences(parsed.data);
    res.status(200).json(ok(saved, 'Preferences saved'));
  };

  return { create, listByUser, processQueue, disable, upsertPreferences };
}
