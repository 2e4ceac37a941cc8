import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import type { NextFunction } from 'express';
import { z } from 'zod';
import { asyncRoute, handleApiError } from '../../route-helpers';
import { InvalidTransitionError, NotFoundError, ValidationError } from '../../errors';
import { createMockRequest, createMockResponse, type MockResponse } from '../helpers/mock-response';

describe('Route helpers - Unit Tests', () => {
  let mock: MockResponse;

  beforeEach(() => {
    mock = createMockResponse();
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('handleApiError', () => {
    it('should render zod failures as validation errors', () => {
      const result = z.object({ name: z.string() }).safeParse({});
      if (result.success) {
        throw new Error('expected the parse to fail');
      }

      handleApiError(result.error, 'create brand', mock.res);

      expect(mock.status).toHaveBeenCalledWith(400);
      expect(mock.json).toHaveBeenCalledWith({
        success: false,
        message: 'Validation failed',
        errors: [expect.stringContaining('Required at "name"')],
        code: 'VALIDATION_ERROR',
      });
    });

    it('should keep the status, code and details of domain errors', () => {
      handleApiError(new ValidationError('Invalid car pricing', ['Selling price must be positive']), 'create car', mock.res);

      expect(mock.status).toHaveBeenCalledWith(400);
      expect(mock.json).toHaveBeenCalledWith({
        success: false,
        message: 'Invalid car pricing',
        errors: ['Selling price must be positive'],
        code: 'VALIDATION_ERROR',
      });
    });

    it('should render invalid transitions as 409', () => {
      handleApiError(new InvalidTransitionError('sale', 'completed', 'cancelled'), 'cancel sale', mock.res);

      expect(mock.status).toHaveBeenCalledWith(409);
      expect(mock.json).toHaveBeenCalledWith({
        success: false,
        message: 'Cannot move sale from "completed" to "cancelled".',
        code: 'INVALID_TRANSITION',
      });
    });

    it('should map database errors before rendering them', () => {
      const deadlock = Object.assign(new Error('deadlock detected'), { code: '40P01' });

      handleApiError(deadlock, 'complete sale', mock.res);

      expect(mock.status).toHaveBeenCalledWith(409);
      expect(mock.json).toHaveBeenCalledWith({
        success: false,
        message: 'The record was changed by a concurrent request. Please retry.',
        code: 'CONFLICT',
      });
      expect(console.warn).toHaveBeenCalledWith(
        '[CONFLICT] complete sale: The record was changed by a concurrent request. Please retry.'
      );
    });

    it('should hide unexpected errors behind a 500', () => {
      handleApiError(new Error('socket hang up'), 'fetch cars', mock.res);

      expect(mock.status).toHaveBeenCalledWith(500);
      expect(mock.json).toHaveBeenCalledWith({
        success: false,
        message: 'Failed to fetch cars. Please try again later.',
        code: 'INTERNAL_ERROR',
      });
    });
  });

  describe('asyncRoute', () => {
    const req = createMockRequest();
    const next: NextFunction = () => undefined;

    it('should run the handler', async () => {
      const handler = asyncRoute('fetch brand', async (_req, res) => {
        res.status(200).json({ ok: true });
      });

      await handler(req, mock.res, next);

      expect(mock.json).toHaveBeenCalledWith({ ok: true });
    });

    it('should turn a rejected handler into an error response', async () => {
      const handler = asyncRoute('fetch sale', async () => {
        throw new NotFoundError('Sale', 's-1');
      });

      await handler(req, mock.res, next);

      expect(mock.status).toHaveBeenCalledWith(404);
      expect(mock.json).toHaveBeenCalledWith({ success: false, message: 'Sale s-1 not found', code: 'NOT_FOUND' });
    });
  });
});
