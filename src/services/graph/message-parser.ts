// Graph message parser: raw message resource -> MessageRecord
import { z } from 'zod';
import { sliceText } from '../../lib/text.js';
import type { MessageRecord } from '../../shared/types/api.js';

const EmailAddressSchema = z.object({
  emailAddress: z
    .object({
      name: z.string().nullish(),
      address: z.string().nullish(),
    })
    .nullish(),
});

export const GraphMessageSchema = z.object({
  id: z.string(),
  subject: z.string().nullish(),
  from: EmailAddressSchema.nullish(),
  receivedDateTime: z.string().nullish(),
  bodyPreview: z.string().nullish(),
  body: z
    .object({
      contentType: z.string().nullish(),
      content: z.string().nullish(),
    })
    .nullish(),
  isRead: z.boolean().nullish(),
});

export type GraphMessage = z.infer<typeof GraphMessageSchema>;

/** Fields requested from Graph for every message */
export const MESSAGE_SELECT = 'id,subject,from,receivedDateTime,bodyPreview,body,isRead';

const ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
};

export function htmlToText(html: string): string {
  return html
    .replace(/<(script|style|head)[^>]*>[\s\S]*?<\/\1>/gi, ' ')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|li|tr|h[1-6])>/gi, '\n')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&(nbsp|amp|lt|gt|quot|#39);/g, (entity) => ENTITIES[entity] ?? entity)
    .replace(/[ \t\f\v]+/g, ' ')
    .replace(/\s*\n\s*/g, '\n')
    .trim();
}

export function formatSender(message: GraphMessage): string {
  const email = message.from?.emailAddress;
  const name = email?.name?.trim() ?? '';
  const address = email?.address?.trim() ?? '';

  if (name && address) return `${name} <${address}>`;
  return name || address || '(unknown)';
}

export function extractBodyText(message: GraphMessage): string {
  const content = message.body?.content;
  if (!content) {
    return message.bodyPreview?.trim() ?? '';
  }
  return message.body?.contentType?.toLowerCase() === 'html' ? htmlToText(content) : content.trim();
}

export function parseMessage(raw: unknown, maxBodyChars?: number): MessageRecord {
  const message = GraphMessageSchema.parse(raw);
  const bodyText = extractBodyText(message);
  const received = message.receivedDateTime ? new Date(message.receivedDateTime) : null;

  return {
    id: message.id,
    subject: message.subject?.trim() || '(no subject)',
    sender: formatSender(message),
    receivedAt: received && !Number.isNaN(received.getTime()) ? received : null,
    bodyText: maxBodyChars !== undefined ? sliceText(bodyText, maxBodyChars) : bodyText,
    isRead: message.isRead ?? false,
  };
}
