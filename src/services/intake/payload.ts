// Graph change and lifecycle notification payloads
import { z } from 'zod';
import type { NotificationEvent } from '../../shared/types/api.js';

export const ChangeNotificationSchema = z.object({
  subscriptionId: z.string().min(1),
  clientState: z.string().optional(),
  changeType: z.enum(['created', 'updated', 'deleted']),
  resource: z.string().optional(),
  resourceData: z
    .object({
      id: z.string().optional(),
      '@odata.type': z.string().optional(),
    })
    .passthrough()
    .optional(),
  subscriptionExpirationDateTime: z.string().optional(),
  tenantId: z.string().optional(),
});

export const LIFECYCLE_EVENTS = ['reauthorizationRequired', 'subscriptionRemoved', 'missed'] as const;

export type LifecycleEventType = (typeof LIFECYCLE_EVENTS)[number];

export const LifecycleNotificationSchema = z.object({
  subscriptionId: z.string().min(1),
  clientState: z.string().optional(),
  lifecycleEvent: z.enum(LIFECYCLE_EVENTS),
  subscriptionExpirationDateTime: z.string().optional(),
});

export const NotificationBatchSchema = z.object({
  value: z.array(z.unknown()),
});

export interface LifecycleNotification {
  subscriptionId: string;
  lifecycleEvent: LifecycleEventType;
  receivedClientState: string;
}

/**
 * Message id from a resource path: "Users/{user}/Messages/{id}" or "messages('{id}')"
 */
export function resourceIdFromPath(resource: string): string | null {
  const segment = resource.split('/').filter(Boolean).pop();
  if (!segment) return null;

  const keyed = /\('([^']+)'\)$/.exec(segment);
  return keyed ? keyed[1] : segment;
}

export function parseNotification(raw: unknown): NotificationEvent | null {
  const parsed = ChangeNotificationSchema.safeParse(raw);
  if (!parsed.success) return null;

  const item = parsed.data;
  const resourceId = item.resourceData?.id || (item.resource ? resourceIdFromPath(item.resource) : null);
  if (!resourceId) return null;

  return {
    subscriptionId: item.subscriptionId,
    resourceId,
    changeType: item.changeType,
    receivedClientState: item.clientState ?? '',
  };
}

export function parseLifecycleNotification(raw: unknown): LifecycleNotification | null {
  const parsed = LifecycleNotificationSchema.safeParse(raw);
  if (!parsed.success) return null;

  return {
    subscriptionId: parsed.data.subscriptionId,
    lifecycleEvent: parsed.data.lifecycleEvent,
    receivedClientState: parsed.data.clientState ?? '',
  };
}

/** Items of a `{ value: [...] }` body, or null when the body has another shape */
export function batchItems(body: unknown): unknown[] | null {
  const parsed = NotificationBatchSchema.safeParse(body);
  return parsed.success ? parsed.data.value : null;
}
