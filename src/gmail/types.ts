/**
 * Gmail Module Type Definitions
 *
 * The Gmail API surface the exporter calls, narrowed to what it uses so the
 * real gmail_v1.Gmail client and test doubles both satisfy it.
 */

import type { gmail_v1 } from 'googleapis';

export type GmailMessage = gmail_v1.Schema$Message;
export type GmailMessagePart = gmail_v1.Schema$MessagePart;
export type GmailHeader = gmail_v1.Schema$MessagePartHeader;

export interface GmailMessagesApi {
  users: {
    messages: {
      list(
        params: gmail_v1.Params$Resource$Users$Messages$List,
      ): Promise<{ data: gmail_v1.Schema$ListMessagesResponse }>;
      get(params: gmail_v1.Params$Resource$Users$Messages$Get): Promise<{ data: GmailMessage }>;
    };
  };
}

export interface GmailProfileApi {
  users: {
    getProfile(params: gmail_v1.Params$Resource$Users$Getprofile): Promise<{ data: gmail_v1.Schema$Profile }>;
  };
}

/** Query parameters for users.messages.list derived from a filter */
export interface GmailQuery {
  /** Gmail search string; empty matches every message */
  q: string;
  includeSpamTrash: boolean;
}

export interface AttachmentRef {
  filename: string;
  mimeType: string;
  attachmentId: string;
  size: number;
  downloadUrl: string;
}

/** Headers, body and attachments pulled out of a full-format message */
export interface MessageContent {
  subject: string;
  from: string;
  to: string;
  cc: string;
  date: string;
  body: string;
  attachments: AttachmentRef[];
}

/** One exported message, as written to its context file */
export interface MessageArtifact {
  type: 'gmail';
  accountId: string;
  messageId: string;
  threadId: string | null;
  subject: string;
  from: string;
  to: string;
  cc: string;
  /** Raw Date header */
  date: string;
  /** ISO timestamp, from internalDate or the Date header */
  receivedAt: string | null;
  folder: string;
  labels: string[];
  snippet: string;
  body: string;
  attachments: AttachmentRef[];
  /** Plain-text rendering for ingestion */
  content: string;
}
