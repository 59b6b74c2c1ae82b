/**
 * Tests for the Express export trigger and health check
 *
 * The BullMQ queue and checkpoint store are mocked (no Redis required).
 * Tests cover status codes, response shapes, kill switch enforcement,
 * job id dedup and the status route.
 */

import { vi, describe, it, expect, beforeEach } from 'vitest';

// vi.hoisted runs before vi.mock hoisting: safe for mock variables
const { mockQueue, mockStore, mockConfig } = vi.hoisted(() => ({
  mockQueue: {
    add: vi.fn(),
    getJob: vi.fn(),
  },
  mockStore: {
    load: vi.fn(),
    save: vi.fn(),
    clear: vi.fn(),
  },
  mockConfig: {
    killSwitch: false,
    redis: { url: undefined, host: 'localhost', port: 6379, password: undefined },
    server: { port: 3000 },
    isDev: true,
  },
}));

// Real exportJobId, mocked queue instance
vi.mock('../../jobs/queue.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../jobs/queue.js')>()),
  getExportQueue: vi.fn(() => mockQueue),
}));

vi.mock('../../wiring.js', () => ({
  getCheckpointStore: vi.fn(() => mockStore),
}));

vi.mock('../../config.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../config.js')>()),
  appConfig: mockConfig,
}));

import request from 'supertest';
import { createApp } from '../server.js';
import { exportJobId } from '../../jobs/queue.js';
import { createEmptyCheckpoint, markFailed, markProcessed } from '../../export/checkpoint.js';
import { CheckpointCorruptionError } from '../../export/errors.js';

const ACCOUNT = 'user@example.com';
const UNREAD_JOB_ID = exportJobId(ACCOUNT, '{"kind":"unread"}');

function existingJob(state: string, failure?: { failedReason: string; attemptsMade: number; finishedOn: number }) {
  return {
    getState: vi.fn().mockResolvedValue(state),
    remove: vi.fn().mockResolvedValue(undefined),
    ...failure,
  };
}

describe('Export Server', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockConfig.killSwitch = false;
    mockQueue.getJob.mockResolvedValue(undefined);
    mockQueue.add.mockResolvedValue({ id: UNREAD_JOB_ID });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  describe('POST /exports', () => {
    it('returns 202 with the job id', async () => {
      const res = await request(createApp()).post('/exports').send({ accountId: ACCOUNT }).expect(202);

      expect(res.body).toEqual({ accepted: true, jobId: UNREAD_JOB_ID });
      expect(UNREAD_JOB_ID).toMatch(/^export-[0-9a-f]{24}$/);
    });

    it('enqueues with defaults applied and the dedup job id', async () => {
      await request(createApp()).post('/exports').send({ accountId: ACCOUNT }).expect(202);

      expect(mockQueue.add).toHaveBeenCalledWith(
        'export',
        {
          accountId: ACCOUNT,
          filter: { kind: 'unread' },
          mode: { type: 'resume' },
          createArtifact: true,
          requestedAt: expect.any(String),
        },
        { jobId: UNREAD_JOB_ID },
      );
    });

    it('passes filter, mode, count limit and inspection flag through', async () => {
      await request(createApp())
        .post('/exports')
        .send({
          accountId: ACCOUNT,
          filter: { kind: 'folder', name: 'Receipts' },
          mode: { type: 'start-from', position: 40 },
          countLimit: 25,
          createArtifact: false,
        })
        .expect(202);

      const [, data, opts] = mockQueue.add.mock.calls[0] ?? [];
      expect(data).toMatchObject({
        filter: { kind: 'folder', name: 'Receipts' },
        mode: { type: 'start-from', position: 40 },
        countLimit: 25,
        createArtifact: false,
      });
      expect(opts).toEqual({ jobId: exportJobId(ACCOUNT, '{"kind":"folder","name":"Receipts"}') });
    });

    it('gives different filters of one account different job ids', async () => {
      await request(createApp()).post('/exports').send({ accountId: ACCOUNT }).expect(202);
      await request(createApp())
        .post('/exports')
        .send({ accountId: ACCOUNT, filter: { kind: 'recent', days: 7 } })
        .expect(202);

      const first = mockQueue.add.mock.calls[0]?.[2];
      const second = mockQueue.add.mock.calls[1]?.[2];
      expect(first).not.toEqual(second);
    });

    it('returns 400 for an invalid body', async () => {
      const res = await request(createApp())
        .post('/exports')
        .send({ accountId: '  ', filter: { kind: 'recent', days: 0 } })
        .expect(400);

      expect(res.body.error).toBe('Invalid export request');
      expect(res.body.details).toHaveLength(2);
      expect(res.body.details[0]).toMatch(/^accountId: /);
      expect(res.body.details[1]).toMatch(/^filter\.days: /);
      expect(mockQueue.add).not.toHaveBeenCalled();
    });

    it('returns 503 when kill switch is active', async () => {
      mockConfig.killSwitch = true;

      const res = await request(createApp()).post('/exports').send({ accountId: ACCOUNT }).expect(503);

      expect(res.body).toEqual({ message: 'Export disabled' });
      expect(mockQueue.add).not.toHaveBeenCalled();
    });

    it('returns 409 while the same job is queued or running', async () => {
      mockQueue.getJob.mockResolvedValue(existingJob('active'));

      const res = await request(createApp()).post('/exports').send({ accountId: ACCOUNT }).expect(409);

      expect(res.body).toEqual({ error: 'Export already queued or running', jobId: UNREAD_JOB_ID, state: 'active' });
      expect(mockQueue.add).not.toHaveBeenCalled();
    });

    it('replaces a finished job with the same id', async () => {
      const finished = existingJob('completed');
      mockQueue.getJob.mockResolvedValue(finished);

      await request(createApp()).post('/exports').send({ accountId: ACCOUNT }).expect(202);

      expect(finished.remove).toHaveBeenCalledTimes(1);
      expect(mockQueue.add).toHaveBeenCalledTimes(1);
    });

    it('logs the failure reason before replacing a failed job', async () => {
      const failed = existingJob('failed', {
        failedReason: 'Gmail message listing failed: Backend Error',
        attemptsMade: 3,
        finishedOn: 1768521600000,
      });
      mockQueue.getJob.mockResolvedValue(failed);

      await request(createApp()).post('/exports').send({ accountId: ACCOUNT }).expect(202);

      expect(console.warn).toHaveBeenCalledWith('[server] Replacing failed job', {
        jobId: UNREAD_JOB_ID,
        failedReason: 'Gmail message listing failed: Backend Error',
        attemptsMade: 3,
        finishedOn: 1768521600000,
      });
      expect(failed.remove).toHaveBeenCalledTimes(1);
      expect(mockQueue.add).toHaveBeenCalledTimes(1);
    });

    it('replaces a completed job without a failure warning', async () => {
      mockQueue.getJob.mockResolvedValue(existingJob('completed'));

      await request(createApp()).post('/exports').send({ accountId: ACCOUNT }).expect(202);

      expect(console.warn).not.toHaveBeenCalled();
    });

    it('returns 500 when the queue is unavailable', async () => {
      mockQueue.add.mockRejectedValue(new Error('Connection is closed.'));

      const res = await request(createApp()).post('/exports').send({ accountId: ACCOUNT }).expect(500);

      expect(res.body).toEqual({ error: 'Internal server error' });
    });
  });

  describe('POST /exports/status', () => {
    it('reports checkpoint progress and queue state', async () => {
      const record = createEmptyCheckpoint(ACCOUNT, '{"kind":"unread"}', new Date('2026-01-16T00:00:00.000Z'));
      markProcessed(record, 'm1');
      markProcessed(record, 'm2');
      markFailed(record, 'm3', 'Failed to fetch message: Backend Error');
      record.cursor = '{"pageToken":"tok-2","ordinal":2}';
      mockStore.load.mockResolvedValue(record);
      mockQueue.getJob.mockResolvedValue(existingJob('completed'));

      const res = await request(createApp()).post('/exports/status').send({ accountId: ACCOUNT }).expect(200);

      expect(mockStore.load).toHaveBeenCalledWith(ACCOUNT, '{"kind":"unread"}');
      expect(res.body).toEqual({
        jobId: UNREAD_JOB_ID,
        state: 'completed',
        filterSignature: '{"kind":"unread"}',
        processed: 2,
        failed: { m3: 'Failed to fetch message: Backend Error' },
        cursor: '{"pageToken":"tok-2","ordinal":2}',
        lastUpdated: '2026-01-16T00:00:00.000Z',
      });
    });

    it('reports a job that never ran', async () => {
      mockStore.load.mockResolvedValue(createEmptyCheckpoint(ACCOUNT, '{"kind":"unread"}'));

      const res = await request(createApp()).post('/exports/status').send({ accountId: ACCOUNT }).expect(200);

      expect(res.body).toMatchObject({ state: null, processed: 0, failed: {}, cursor: null, lastUpdated: null });
    });

    it('returns 500 with the error code for a corrupt checkpoint', async () => {
      mockStore.load.mockRejectedValue(new CheckpointCorruptionError('export:checkpoint:abc', 'invalid JSON'));

      const res = await request(createApp()).post('/exports/status').send({ accountId: ACCOUNT }).expect(500);

      expect(res.body).toEqual({
        error: 'Checkpoint at export:checkpoint:abc is corrupt: invalid JSON',
        code: 'CHECKPOINT_CORRUPT',
      });
    });

    it('returns 400 without an account', async () => {
      const res = await request(createApp()).post('/exports/status').send({}).expect(400);

      expect(res.body.error).toBe('Invalid status request');
    });
  });

  describe('GET /health', () => {
    it('returns status and kill switch state', async () => {
      const res = await request(createApp()).get('/health').expect(200);

      expect(res.body).toMatchObject({ status: 'ok', killSwitch: false });
      expect(typeof res.body.timestamp).toBe('string');
      expect(['redis', 'file']).toContain(res.body.checkpointBackend);
    });
  });
});
