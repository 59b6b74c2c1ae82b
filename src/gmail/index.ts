// ============================================================================
// Gmail Module: Barrel Export
// ============================================================================
//
// Gmail implementations of the export engine's collaborators:
// - GmailMessageSource (ItemSource): paginated messages.list for a filter
// - GmailArtifactProcessor (ItemProcessor): full message -> MessageArtifact
//
// NOT exported: retry internals and MIME walking helpers.

export type {
  GmailMessagesApi,
  GmailProfileApi,
  GmailQuery,
  AttachmentRef,
  MessageArtifact,
} from './types.js';

export { gmailConfig, GMAIL_MAX_PAGE_SIZE } from './config.js';
export type { GmailConfig, RetryPolicy } from './config.js';

export { buildGmailQuery } from './query.js';
export { GmailMessageSource, encodeCursor, decodeCursor } from './message-source.js';
export type { GmailCursor, GmailMessageSourceOptions } from './message-source.js';
export { GmailArtifactProcessor, buildMessageArtifact, formatArtifactContent } from './artifact-processor.js';

export {
  getGmailReadonlyClient,
  getAccountProfile,
  GmailAuthError,
} from './gmail-client.js';
export type { AccountProfile, GmailAuthErrorCode } from './gmail-client.js';
