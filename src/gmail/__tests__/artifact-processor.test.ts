/**
 * Tests for turning fetched messages into export artifacts
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ItemProcessingError } from '../../export/errors.js';
import { GmailArtifactProcessor, buildMessageArtifact, formatArtifactContent } from '../artifact-processor.js';
import { GmailAuthError } from '../gmail-client.js';
import type { GmailMessage } from '../types.js';
import { apiError, b64, createMockGmailClient } from './mock-gmail.js';
import type { MockGmailClient } from './mock-gmail.js';

const ACCOUNT = 'user@example.com';

function sampleMessage(): GmailMessage {
  return {
    id: 'm1',
    threadId: 't1',
    labelIds: ['INBOX', 'UNREAD', 'Label_7'],
    snippet: 'Numbers attached',
    internalDate: '1767225600000',
    payload: {
      mimeType: 'multipart/mixed',
      headers: [
        { name: 'Subject', value: 'Quarterly report' },
        { name: 'From', value: 'Ana <ana@example.com>' },
        { name: 'To', value: ACCOUNT },
        { name: 'Date', value: 'Thu, 01 Jan 2026 00:00:00 +0000' },
      ],
      parts: [
        { mimeType: 'text/plain', body: { data: b64('Numbers attached.\n') } },
        { mimeType: 'application/pdf', filename: 'q4.pdf', body: { attachmentId: 'att-1', size: 2048 } },
      ],
    },
  };
}

describe('formatArtifactContent', () => {
  it('renders metadata, body and attachments', () => {
    const content = formatArtifactContent({
      accountId: ACCOUNT,
      from: 'Ana <ana@example.com>',
      to: ACCOUNT,
      cc: 'team@example.com',
      subject: 'Hello',
      date: 'Thu, 01 Jan 2026 00:00:00 +0000',
      folder: 'Inbox',
      labels: ['Inbox', 'Unread'],
      body: 'Hi all\n\n',
      attachments: [
        { filename: 'a.txt', mimeType: 'text/plain', attachmentId: 'x', size: 1, downloadUrl: 'https://example.com/a' },
      ],
    });

    expect(content.split('\n')).toEqual([
      'EMAIL METADATA:',
      'Account: user@example.com',
      'From: Ana <ana@example.com>',
      'To: user@example.com',
      'Cc: team@example.com',
      'Subject: Hello',
      'Date: Thu, 01 Jan 2026 00:00:00 +0000',
      'Folder: Inbox',
      'Labels: Inbox, Unread',
      '',
      'EMAIL CONTENT:',
      'Hi all',
      '',
      'ATTACHMENTS (1):',
      '- a.txt (text/plain)',
    ]);
  });

  it('omits the Cc line and attachment block when empty', () => {
    const content = formatArtifactContent({
      accountId: ACCOUNT,
      from: 'a@example.com',
      to: ACCOUNT,
      cc: '',
      subject: '',
      date: '',
      folder: 'Unknown',
      labels: [],
      body: 'x',
      attachments: [],
    });

    expect(content).not.toContain('Cc:');
    expect(content.endsWith('EMAIL CONTENT:\nx')).toBe(true);
  });
});

describe('buildMessageArtifact', () => {
  it('builds the full artifact from a message', () => {
    const artifact = buildMessageArtifact(sampleMessage(), ACCOUNT, 'm1');

    expect(artifact).toMatchObject({
      type: 'gmail',
      accountId: ACCOUNT,
      messageId: 'm1',
      threadId: 't1',
      subject: 'Quarterly report',
      from: 'Ana <ana@example.com>',
      to: ACCOUNT,
      cc: '',
      date: 'Thu, 01 Jan 2026 00:00:00 +0000',
      receivedAt: '2026-01-01T00:00:00.000Z',
      folder: 'Inbox',
      labels: ['Inbox', 'Unread', 'Label_7'],
      snippet: 'Numbers attached',
      body: 'Numbers attached.\n',
    });
    expect(artifact.attachments).toHaveLength(1);
    expect(artifact.content).toContain('EMAIL CONTENT:\nNumbers attached.\n\nATTACHMENTS (1):\n- q4.pdf (application/pdf)');
  });

  it('falls back to Unknown folder and null thread for bare messages', () => {
    const artifact = buildMessageArtifact({ id: 'm9' }, ACCOUNT, 'm9');

    expect(artifact.folder).toBe('Unknown');
    expect(artifact.threadId).toBeNull();
    expect(artifact.receivedAt).toBeNull();
    expect(artifact.snippet).toBe('');
  });
});

describe('GmailArtifactProcessor', () => {
  let gmail: MockGmailClient;
  let processor: GmailArtifactProcessor;

  beforeEach(() => {
    gmail = createMockGmailClient();
    processor = new GmailArtifactProcessor(gmail, ACCOUNT, { retries: 0, baseDelayMs: 0 });
  });

  it('fetches the full message and builds its artifact', async () => {
    gmail.users.messages.get.mockResolvedValueOnce({ data: sampleMessage() });

    const artifact = await processor.process({ id: 'm1', metadata: { threadId: 't1' } });

    expect(gmail.users.messages.get).toHaveBeenCalledWith({ userId: 'me', id: 'm1', format: 'full' });
    expect(artifact.messageId).toBe('m1');
    expect(artifact.subject).toBe('Quarterly report');
  });

  it('reports fetch failures as ItemProcessingError', async () => {
    gmail.users.messages.get.mockRejectedValueOnce(apiError('Requested entity was not found.', 404));

    const error = await processor.process({ id: 'gone', metadata: {} }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ItemProcessingError);
    expect(error).toMatchObject({ itemId: 'gone', message: 'Failed to fetch message: Requested entity was not found.' });
  });

  it('keeps auth failures as the cause', async () => {
    gmail.users.messages.get.mockRejectedValueOnce(apiError('Delegation denied for user@example.com', 403));

    const error = await processor.process({ id: 'm1', metadata: {} }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ItemProcessingError);
    expect(error instanceof Error && error.cause).toBeInstanceOf(GmailAuthError);
  });

  it('decodes entities in an HTML-only message, including out-of-range code points', async () => {
    gmail.users.messages.get.mockResolvedValueOnce({
      data: {
        id: 'm2',
        payload: { mimeType: 'text/html', body: { data: b64('<p>Price &#x110000; caf&eacute;&hellip;</p>') } },
      },
    });

    const artifact = await processor.process({ id: 'm2', metadata: {} });

    expect(artifact.body).toBe('Price \uFFFD café…');
  });

  it('reports a message it cannot read as ItemProcessingError', async () => {
    const unreadable: GmailMessage = {
      id: 'm3',
      get payload(): GmailMessage['payload'] {
        throw new Error('malformed payload');
      },
    };
    gmail.users.messages.get.mockResolvedValueOnce({ data: unreadable });

    const error = await processor.process({ id: 'm3', metadata: {} }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ItemProcessingError);
    expect(error).toMatchObject({ itemId: 'm3', message: 'Failed to read message: malformed payload' });
  });

  it('rejects a response without a message id', async () => {
    gmail.users.messages.get.mockResolvedValueOnce({ data: {} });

    await expect(processor.process({ id: 'm1', metadata: {} })).rejects.toThrow('Gmail returned a message without an id');
  });
});
