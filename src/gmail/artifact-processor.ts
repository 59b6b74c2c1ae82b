/**
 * Gmail Artifact Processor
 *
 * Turns one listed message id into a MessageArtifact: fetches the full
 * message (with the transient-error retry policy) and extracts headers,
 * body, labels and attachment references.
 *
 * Fetching is read-only and the artifact depends only on the message, so
 * processing the same item twice yields the same artifact.
 */

import { ItemProcessingError, errorMessage } from '../export/errors.js';
import type { ItemProcessor, SourceItem } from '../export/types.js';
import { gmailConfig } from './config.js';
import type { RetryPolicy } from './config.js';
import { toGmailError } from './gmail-client.js';
import { extractMessageContent, labelNames, messageReceivedAt } from './message-content.js';
import { withRetry } from './retry.js';
import type { AttachmentRef, GmailMessage, GmailMessagesApi, MessageArtifact } from './types.js';

interface ContentFields {
  accountId: string;
  from: string;
  to: string;
  cc: string;
  subject: string;
  date: string;
  folder: string;
  labels: string[];
  body: string;
  attachments: AttachmentRef[];
}

/** Plain-text block handed to downstream ingestion */
export function formatArtifactContent(fields: ContentFields): string {
  const lines = [
    'EMAIL METADATA:',
    `Account: ${fields.accountId}`,
    `From: ${fields.from}`,
    `To: ${fields.to}`,
  ];
  if (fields.cc) lines.push(`Cc: ${fields.cc}`);
  lines.push(
    `Subject: ${fields.subject}`,
    `Date: ${fields.date}`,
    `Folder: ${fields.folder}`,
    `Labels: ${fields.labels.join(', ')}`,
    '',
    'EMAIL CONTENT:',
    fields.body.trimEnd(),
  );

  if (fields.attachments.length > 0) {
    lines.push('', `ATTACHMENTS (${fields.attachments.length}):`);
    for (const att of fields.attachments) {
      lines.push(`- ${att.filename} (${att.mimeType})`);
    }
  }

  return lines.join('\n');
}

export function buildMessageArtifact(message: GmailMessage, accountId: string, messageId: string): MessageArtifact {
  const content = extractMessageContent(message);
  const labels = labelNames(message.labelIds);
  const folder = labels[0] ?? 'Unknown';

  return {
    type: 'gmail',
    accountId,
    messageId,
    threadId: message.threadId ?? null,
    subject: content.subject,
    from: content.from,
    to: content.to,
    cc: content.cc,
    date: content.date,
    receivedAt: messageReceivedAt(message, content.date),
    folder,
    labels,
    snippet: message.snippet ?? '',
    body: content.body,
    attachments: content.attachments,
    content: formatArtifactContent({ accountId, folder, labels, ...content }),
  };
}

export class GmailArtifactProcessor implements ItemProcessor<MessageArtifact> {
  constructor(
    private readonly gmail: GmailMessagesApi,
    private readonly accountId: string,
    private readonly retry: RetryPolicy = gmailConfig.retry,
  ) {}

  async process(item: SourceItem): Promise<MessageArtifact> {
    let message: GmailMessage;
    try {
      const response = await withRetry(
        () => this.gmail.users.messages.get({ userId: 'me', id: item.id, format: 'full' }),
        this.retry,
        'messages.get',
      );
      message = response.data;
    } catch (err) {
      const cause = toGmailError(err);
      throw new ItemProcessingError(item.id, `Failed to fetch message: ${errorMessage(cause)}`, { cause });
    }

    if (!message.id) {
      throw new ItemProcessingError(item.id, 'Gmail returned a message without an id');
    }

    try {
      return buildMessageArtifact(message, this.accountId, message.id);
    } catch (err) {
      throw new ItemProcessingError(item.id, `Failed to read message: ${errorMessage(err)}`, { cause: err });
    }
  }
}
