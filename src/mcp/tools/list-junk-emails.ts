/**
 * List Junk Emails Tool
 *
 * Returns the five most recent messages in the caller's junk folder, one
 * line each.
 */

import { z } from 'zod';
import type { ToolFactory } from '../types.js';

export const JUNK_MESSAGES_PATH =
  '/me/mailFolders/junkemail/messages?$top=5&$select=subject,from,receivedDateTime';

const MessageSchema = z.object({
  subject: z.string().nullable().optional(),
  from: z
    .object({
      emailAddress: z.object({ address: z.string().optional() }).optional(),
    })
    .nullable()
    .optional(),
  receivedDateTime: z.string(),
});

const MessagePageSchema = z.object({
  value: z.array(MessageSchema).default([]),
});

export type JunkMessage = z.infer<typeof MessageSchema>;

export function formatJunkMessage(message: JunkMessage): string {
  const sender = message.from?.emailAddress?.address ?? 'unknown';
  const subject = message.subject ?? '(no subject)';
  return `- ${subject} (from: ${sender}, ${message.receivedDateTime})`;
}

export const createListJunkEmailsTool: ToolFactory = ({ graph }) => ({
  name: 'list_junk_emails',
  description: 'List your 5 most recent junk emails.',
  schema: z.object({}),

  handler: async ({ credential }) => {
    const page = await graph.get(JUNK_MESSAGES_PATH, credential, MessagePageSchema);
    if (page.value.length === 0) {
      return 'No junk emails found.';
    }
    return page.value.map(formatJunkMessage).join('\n');
  },
});
