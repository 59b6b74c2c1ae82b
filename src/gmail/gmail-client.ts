/**
 * Gmail API Client (read-only)
 *
 * Supports two authentication modes:
 * 1. OAuth2 refresh token: GOOGLE_CLIENT_ID + GOOGLE_CLIENT_SECRET + GOOGLE_REFRESH_TOKEN
 * 2. Service account with domain-wide delegation: GOOGLE_SERVICE_ACCOUNT_KEY
 *    (base64 JSON key), impersonating the account being exported
 *
 * The mode is auto-detected: OAuth2 when GOOGLE_REFRESH_TOKEN is set,
 * otherwise service account. Clients are cached per account.
 *
 * Auth failures (missing/malformed credentials, 401/403, "Delegation denied")
 * surface as GmailAuthError. Other API errors propagate as-is.
 */

import { google } from 'googleapis';
import type { gmail_v1 } from 'googleapis';
import { JWT, OAuth2Client } from 'google-auth-library';
import { z } from 'zod';
import { httpStatusOf } from './retry.js';
import type { GmailProfileApi } from './types.js';

const READONLY_SCOPE = 'https://www.googleapis.com/auth/gmail.readonly';

// ---------------------------------------------------------------------------
// Error Types
// ---------------------------------------------------------------------------

export type GmailAuthErrorCode =
  | 'GMAIL_AUTH_ERROR'
  | 'GMAIL_AUTH_MISSING_OAUTH'
  | 'GMAIL_AUTH_MISSING_KEY'
  | 'GMAIL_AUTH_INVALID_KEY'
  | 'GMAIL_AUTH_DELEGATION';

/** Thrown when Gmail credentials are missing, malformed or rejected */
export class GmailAuthError extends Error {
  readonly code: GmailAuthErrorCode;

  constructor(message: string, code: GmailAuthErrorCode = 'GMAIL_AUTH_ERROR', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GmailAuthError';
    this.code = code;
  }
}

// ---------------------------------------------------------------------------
// OAuth2 Refresh Token Auth
// ---------------------------------------------------------------------------

function createOAuth2Auth(): OAuth2Client {
  const clientId = process.env.GOOGLE_CLIENT_ID;
  const clientSecret = process.env.GOOGLE_CLIENT_SECRET;
  const refreshToken = process.env.GOOGLE_REFRESH_TOKEN;

  if (!clientId || !clientSecret || !refreshToken) {
    throw new GmailAuthError(
      'OAuth2 credentials incomplete. Set GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET, and GOOGLE_REFRESH_TOKEN.',
      'GMAIL_AUTH_MISSING_OAUTH',
    );
  }

  const oauth2Client = new OAuth2Client(clientId, clientSecret);
  oauth2Client.setCredentials({ refresh_token: refreshToken });
  return oauth2Client;
}

// ---------------------------------------------------------------------------
// Service Account Auth
// ---------------------------------------------------------------------------

const ServiceAccountKeySchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

type ServiceAccountKey = z.infer<typeof ServiceAccountKeySchema>;

/** Decodes GOOGLE_SERVICE_ACCOUNT_KEY (base64 JSON) into the JWT fields */
export function loadServiceAccountKey(encoded = process.env.GOOGLE_SERVICE_ACCOUNT_KEY): ServiceAccountKey {
  if (!encoded) {
    throw new GmailAuthError(
      'No Gmail credentials found. Set either:\n' +
        '  - GOOGLE_CLIENT_ID + GOOGLE_CLIENT_SECRET + GOOGLE_REFRESH_TOKEN (OAuth2), or\n' +
        '  - GOOGLE_SERVICE_ACCOUNT_KEY (service account with domain-wide delegation)',
      'GMAIL_AUTH_MISSING_KEY',
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(encoded, 'base64').toString('utf-8'));
  } catch (err) {
    throw new GmailAuthError(
      'GOOGLE_SERVICE_ACCOUNT_KEY is malformed: not base64-encoded JSON.',
      'GMAIL_AUTH_INVALID_KEY',
      { cause: err },
    );
  }

  const result = ServiceAccountKeySchema.safeParse(parsed);
  if (!result.success) {
    throw new GmailAuthError(
      'GOOGLE_SERVICE_ACCOUNT_KEY is malformed: missing client_email or private_key.',
      'GMAIL_AUTH_INVALID_KEY',
    );
  }
  return result.data;
}

function createServiceAccountAuth(subject: string): JWT {
  const key = loadServiceAccountKey();
  return new JWT({
    email: key.client_email,
    key: key.private_key,
    scopes: [READONLY_SCOPE],
    subject,
  });
}

// ---------------------------------------------------------------------------
// Client Cache
// ---------------------------------------------------------------------------

const clientCache = new Map<string, gmail_v1.Gmail>();

/**
 * Returns a gmail.readonly client for the given account.
 *
 * Service account mode impersonates `accountId`. In OAuth2 mode the refresh
 * token decides the mailbox; `accountId` is then only the cache key and the
 * label on exported artifacts.
 */
export function getGmailReadonlyClient(accountId: string): gmail_v1.Gmail {
  const cached = clientCache.get(accountId);
  if (cached) return cached;

  let auth: OAuth2Client | JWT;
  if (process.env.GOOGLE_REFRESH_TOKEN) {
    auth = createOAuth2Auth();
  } else {
    auth = createServiceAccountAuth(accountId);
  }

  const client = google.gmail({ version: 'v1', auth });
  clientCache.set(accountId, client);
  return client;
}

/** Drops cached clients (credential rotation, tests) */
export function resetGmailClients(): void {
  clientCache.clear();
}

// ---------------------------------------------------------------------------
// Auth Error Detection
// ---------------------------------------------------------------------------

/**
 * Converts authentication/delegation failures into GmailAuthError; returns
 * any other error unchanged.
 */
export function toGmailError(err: unknown): unknown {
  if (err instanceof GmailAuthError) return err;

  const message = err instanceof Error ? err.message : String(err);
  const status = httpStatusOf(err);

  if (
    status === 401 ||
    status === 403 ||
    message.includes('Delegation denied') ||
    message.includes('unauthorized_client') ||
    message.includes('invalid_grant')
  ) {
    return new GmailAuthError(
      `Gmail API auth error: ${message}. Check credentials and permissions.`,
      'GMAIL_AUTH_DELEGATION',
      { cause: err },
    );
  }
  return err;
}

// ---------------------------------------------------------------------------
// Profile
// ---------------------------------------------------------------------------

export interface AccountProfile {
  emailAddress: string;
  messagesTotal: number | null;
  threadsTotal: number | null;
}

/** Reads the mailbox address and totals (`mailbox-export --profile`) */
export async function getAccountProfile(gmail: GmailProfileApi): Promise<AccountProfile> {
  try {
    const { data } = await gmail.users.getProfile({ userId: 'me' });
    if (!data.emailAddress) {
      throw new Error('Gmail profile returned no emailAddress');
    }
    return {
      emailAddress: data.emailAddress,
      messagesTotal: data.messagesTotal ?? null,
      threadsTotal: data.threadsTotal ?? null,
    };
  } catch (err) {
    throw toGmailError(err);
  }
}
