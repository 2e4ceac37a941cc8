import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  successEnvelope,
  errorEnvelope,
  sendSuccess,
  sendCreated,
  sendDeleted,
  sendPage,
  sendError,
  sendDomainError,
  sendValidationError,
  sendNotFound,
} from '../../response-utils';
import { InvalidTransitionError, ReferentialIntegrityError, ValidationError } from '../../errors';
import { createMockResponse, type MockResponse } from '../helpers/mock-response';

describe('Response Utils - Unit Tests', () => {
  let mock: MockResponse;

  beforeEach(() => {
    mock = createMockResponse();
  });

  describe('envelopes', () => {
    it('should leave the message out when none is given', () => {
      expect(successEnvelope({ id: 'car-1' })).toEqual({ success: true, data: { id: 'car-1' } });
      expect(successEnvelope([], 'Loaded')).toEqual({ success: true, data: [], message: 'Loaded' });
    });

    it('should only list errors when there are some', () => {
      expect(errorEnvelope('Broken', 'INTERNAL_ERROR', [])).toEqual({
        success: false,
        message: 'Broken',
        code: 'INTERNAL_ERROR',
      });
      expect(errorEnvelope('Bad input', 'VALIDATION_ERROR', ['name is required'])).toEqual({
        success: false,
        message: 'Bad input',
        code: 'VALIDATION_ERROR',
        errors: ['name is required'],
      });
    });
  });

  describe('senders', () => {
    it('should send success with status 200 by default', () => {
      sendSuccess(mock.res, { id: 'sale-1' }, 'Sale completed');

      expect(mock.status).toHaveBeenCalledWith(200);
      expect(mock.json).toHaveBeenCalledWith({ success: true, data: { id: 'sale-1' }, message: 'Sale completed' });
    });

    it('should send 201 for created records and null data for deletions', () => {
      sendCreated(mock.res, { id: 'brand-1' }, 'Brand created successfully');
      expect(mock.status).toHaveBeenLastCalledWith(201);
      expect(mock.json).toHaveBeenLastCalledWith({
        success: true,
        data: { id: 'brand-1' },
        message: 'Brand created successfully',
      });

      sendDeleted(mock.res, 'Brand deleted successfully');
      expect(mock.status).toHaveBeenLastCalledWith(200);
      expect(mock.json).toHaveBeenLastCalledWith({ success: true, data: null, message: 'Brand deleted successfully' });
    });

    it('should report whether more pages exist', () => {
      sendPage(mock.res, ['a', 'b'], { offset: 4, limit: 2 }, 7);
      expect(mock.json).toHaveBeenLastCalledWith({
        success: true,
        data: { items: ['a', 'b'], pagination: { offset: 4, limit: 2, total: 7, hasMore: true } },
      });

      sendPage(mock.res, ['g'], { offset: 6, limit: 2 }, 7);
      expect(mock.json).toHaveBeenLastCalledWith({
        success: true,
        data: { items: ['g'], pagination: { offset: 6, limit: 2, total: 7, hasMore: false } },
      });
    });

    it('should send errors with the given status and code', () => {
      sendError(mock.res, 409, 'CONFLICT', 'Conflict');

      expect(mock.status).toHaveBeenCalledWith(409);
      expect(mock.json).toHaveBeenCalledWith({ success: false, message: 'Conflict', code: 'CONFLICT' });
    });

    it('should send validation errors as 400 and missing records as 404', () => {
      sendValidationError(mock.res, ['year must be a number']);
      expect(mock.status).toHaveBeenLastCalledWith(400);
      expect(mock.json).toHaveBeenLastCalledWith({
        success: false,
        message: 'Validation failed',
        code: 'VALIDATION_ERROR',
        errors: ['year must be a number'],
      });

      sendNotFound(mock.res, 'Car');
      expect(mock.status).toHaveBeenLastCalledWith(404);
      expect(mock.json).toHaveBeenLastCalledWith({ success: false, message: 'Car not found', code: 'NOT_FOUND' });
    });
  });

  describe('sendDomainError', () => {
    it('should carry the status, code and details of the error', () => {
      sendDomainError(mock.res, new ValidationError('Invalid car pricing', ['Dealer discount exceeds MSRP']));

      expect(mock.status).toHaveBeenCalledWith(400);
      expect(mock.json).toHaveBeenCalledWith({
        success: false,
        message: 'Invalid car pricing',
        code: 'VALIDATION_ERROR',
        errors: ['Dealer discount exceeds MSRP'],
      });
    });

    it('should render lifecycle and integrity errors as 409', () => {
      sendDomainError(mock.res, new InvalidTransitionError('rental', 'returned', 'active'));
      expect(mock.status).toHaveBeenLastCalledWith(409);
      expect(mock.json).toHaveBeenLastCalledWith({
        success: false,
        message: 'Cannot move rental from "returned" to "active".',
        code: 'INVALID_TRANSITION',
      });

      sendDomainError(mock.res, new ReferentialIntegrityError('Customer is referenced by 2 sales'));
      expect(mock.json).toHaveBeenLastCalledWith({
        success: false,
        message: 'Customer is referenced by 2 sales',
        code: 'FOREIGN_KEY_VIOLATION',
      });
    });
  });
});
