/**
 * Message Content Extraction
 *
 * Pure functions over full-format Gmail messages:
 * - headers (case-insensitive lookup)
 * - body: text/plain parts concatenated; text/html converted to text
 *   (html-to-text) when the message has no plain part
 * - attachments: parts with a filename and an attachmentId
 * - labels: system label ids mapped to display names
 * - receivedAt: internalDate, else the Date header
 */

import { convert } from 'html-to-text';
import type { HtmlToTextOptions } from 'html-to-text';
import type { AttachmentRef, GmailHeader, GmailMessage, GmailMessagePart, MessageContent } from './types.js';

// ---------------------------------------------------------------------------
// Headers
// ---------------------------------------------------------------------------

export function headerValue(headers: GmailHeader[] | undefined, name: string): string {
  const wanted = name.toLowerCase();
  return headers?.find((h) => h.name?.toLowerCase() === wanted)?.value ?? '';
}

// ---------------------------------------------------------------------------
// Body
// ---------------------------------------------------------------------------

function decodeBody(data: string | null | undefined): string {
  if (!data) return '';
  return Buffer.from(data, 'base64url').toString('utf-8');
}

const HTML_TO_TEXT_OPTIONS: HtmlToTextOptions = {
  wordwrap: false,
  selectors: [
    { selector: 'script', format: 'skip' },
    { selector: 'style', format: 'skip' },
    { selector: 'head', format: 'skip' },
    { selector: 'img', format: 'skip' },
  ],
};

/** Plain text of an HTML body; links keep their URL in brackets */
export function htmlToText(html: string): string {
  if (!html.trim()) return '';
  return convert(html, HTML_TO_TEXT_OPTIONS).replace(/\n{3,}/g, '\n\n').trim();
}

interface CollectedParts {
  plain: string[];
  html: string[];
  attachments: AttachmentRef[];
}

function attachmentUrl(messageId: string, attachmentId: string): string {
  return `https://www.googleapis.com/gmail/v1/users/me/messages/${messageId}/attachments/${attachmentId}`;
}

function walkPart(part: GmailMessagePart, messageId: string, acc: CollectedParts): void {
  const attachmentId = part.body?.attachmentId;

  if (part.filename && attachmentId) {
    acc.attachments.push({
      filename: part.filename,
      mimeType: part.mimeType ?? 'application/octet-stream',
      attachmentId,
      size: part.body?.size ?? 0,
      downloadUrl: attachmentUrl(messageId, attachmentId),
    });
  } else if (!part.filename && part.mimeType === 'text/plain') {
    acc.plain.push(decodeBody(part.body?.data));
  } else if (!part.filename && part.mimeType === 'text/html') {
    acc.html.push(decodeBody(part.body?.data));
  }

  for (const child of part.parts ?? []) {
    walkPart(child, messageId, acc);
  }
}

export function extractMessageContent(message: GmailMessage): MessageContent {
  const payload = message.payload ?? {};
  const headers = payload.headers ?? undefined;
  const collected: CollectedParts = { plain: [], html: [], attachments: [] };
  walkPart(payload, message.id ?? '', collected);

  const body =
    collected.plain.length > 0 ? collected.plain.join('') : htmlToText(collected.html.join('\n'));

  return {
    subject: headerValue(headers, 'Subject'),
    from: headerValue(headers, 'From'),
    to: headerValue(headers, 'To'),
    cc: headerValue(headers, 'Cc'),
    date: headerValue(headers, 'Date'),
    body,
    attachments: collected.attachments,
  };
}

// ---------------------------------------------------------------------------
// Labels
// ---------------------------------------------------------------------------

const SYSTEM_LABELS = new Map<string, string>([
  ['INBOX', 'Inbox'],
  ['SENT', 'Sent'],
  ['DRAFT', 'Drafts'],
  ['SPAM', 'Spam'],
  ['TRASH', 'Trash'],
  ['STARRED', 'Starred'],
  ['IMPORTANT', 'Important'],
  ['UNREAD', 'Unread'],
]);

/** System label ids become display names; user label ids pass through */
export function labelNames(labelIds: string[] | null | undefined): string[] {
  return (labelIds ?? []).map((id) => SYSTEM_LABELS.get(id) ?? id);
}

// ---------------------------------------------------------------------------
// Dates
// ---------------------------------------------------------------------------

/** Parses an RFC 2822 Date header; "(UTC)"-style comments are ignored */
export function parseDateHeader(value: string): Date | null {
  const cleaned = value.replace(/\([^)]*\)/g, '').trim();
  if (!cleaned) return null;
  const parsed = new Date(cleaned);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export function messageReceivedAt(message: GmailMessage, dateHeader: string): string | null {
  if (message.internalDate) {
    const millis = Number(message.internalDate);
    if (Number.isFinite(millis)) {
      return new Date(millis).toISOString();
    }
  }
  return parseDateHeader(dateHeader)?.toISOString() ?? null;
}
