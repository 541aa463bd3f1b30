import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Response } from 'express';

vi.mock('./utils/log');

import { createApp, sendError } from './app';
import { err } from './utils/log';
import { ApiError } from './utils/net/errors';
import { createMockConfig } from './utils/test/mockData';

function createMockResponse() {
  const res = {
    status: vi.fn(),
    json: vi.fn(),
  };
  res.status.mockReturnValue(res);
  return res;
}

describe('App', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('sendError', () => {
    it('answers with the status of an ApiError', () => {
      const res = createMockResponse();

      sendError(res as unknown as Response, new ApiError('Transaction 9 not found', 404));

      expect(res.status).toHaveBeenCalledWith(404);
      expect(res.json).toHaveBeenCalledWith({ error: 'Transaction 9 not found' });
      expect(err).not.toHaveBeenCalled();
    });

    it('answers 500 and logs anything else', () => {
      const res = createMockResponse();

      sendError(res as unknown as Response, new Error('disk full'));

      expect(res.status).toHaveBeenCalledWith(500);
      expect(res.json).toHaveBeenCalledWith({ error: 'disk full' });
      expect(err).toHaveBeenCalledWith('Request failed', { error: 'disk full' });
    });

    it('hides values that are not errors', () => {
      const res = createMockResponse();

      sendError(res as unknown as Response, 'oops');

      expect(res.json).toHaveBeenCalledWith({ error: 'Unknown error' });
    });
  });

  describe('createApp', () => {
    it('builds an application ready to listen', () => {
      expect(typeof createApp(createMockConfig()).listen).toBe('function');
    });
  });
});
