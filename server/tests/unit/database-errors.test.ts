import { describe, it, expect } from '@jest/globals';
import { isPostgresError, mapDatabaseError } from '../../database-errors';
import {
  ConflictError,
  NotFoundError,
  ReferentialIntegrityError,
  UniqueConstraintError,
  ValidationError,
} from '../../errors';

function pgError(code: string, extra: { constraint?: string; detail?: string; column?: string } = {}): Error {
  return Object.assign(new Error(`postgres error ${code}`), { code, ...extra });
}

describe('Database error mapping - Unit Tests', () => {
  it('should recognise errors carrying a string code', () => {
    expect(isPostgresError(pgError('23505'))).toBe(true);
    expect(isPostgresError(new Error('plain'))).toBe(false);
    expect(isPostgresError({ code: '23505' })).toBe(false);
  });

  it('should map a unique violation to the field it concerns', () => {
    const mapped = mapDatabaseError(pgError('23505', { constraint: 'cars_stock_number_unique' }));

    expect(mapped).toBeInstanceOf(UniqueConstraintError);
    if (mapped instanceof UniqueConstraintError) {
      expect(mapped.message).toBe('A car with this stock number already exists.');
      expect(mapped.field).toBe('stock number');
    }
  });

  it('should map a second open sale to a conflict', () => {
    const mapped = mapDatabaseError(pgError('23505', { constraint: 'uq_sales_car_open' }));

    expect(mapped).toBeInstanceOf(ConflictError);
    if (mapped instanceof ConflictError) {
      expect(mapped.message).toBe('This car already has an open or completed sale.');
    }
  });

  it('should fall back to a generic unique violation for unknown constraints', () => {
    const mapped = mapDatabaseError(pgError('23505'));
    expect(mapped).toBeInstanceOf(UniqueConstraintError);
    if (mapped instanceof UniqueConstraintError) {
      expect(mapped.message).toBe('A record with this value already exists.');
    }
  });

  it('should map foreign key violations by action', () => {
    expect(mapDatabaseError(pgError('23503'), 'delete')).toBeInstanceOf(ReferentialIntegrityError);

    const onWrite = mapDatabaseError(pgError('23503', { detail: 'Key (car_id)=(x) is not present in table "cars".' }));
    expect(onWrite).toBeInstanceOf(ValidationError);
    if (onWrite instanceof ValidationError) {
      expect(onWrite.errors).toEqual(['Key (car_id)=(x) is not present in table "cars".']);
    }
  });

  it('should map not-null, length and check violations to validation errors', () => {
    const missing = mapDatabaseError(pgError('23502', { column: 'title' }));
    expect(missing).toBeInstanceOf(ValidationError);
    if (missing instanceof ValidationError) {
      expect(missing.message).toBe('Missing required field: title');
    }
    expect(mapDatabaseError(pgError('22001'))).toBeInstanceOf(ValidationError);
    expect(mapDatabaseError(pgError('23514'))).toBeInstanceOf(ValidationError);
  });

  it('should map numeric overflow to a validation error', () => {
    const overflow = mapDatabaseError(pgError('22003'));

    expect(overflow).toBeInstanceOf(ValidationError);
    if (overflow instanceof ValidationError) {
      expect(overflow.message).toBe('A number is out of range for its field.');
    }
  });

  it('should map serialization failures and deadlocks to conflicts', () => {
    expect(mapDatabaseError(pgError('40001'))).toBeInstanceOf(ConflictError);
    expect(mapDatabaseError(pgError('40P01'))).toBeInstanceOf(ConflictError);
  });

  it('should pass through domain errors and unknown errors', () => {
    const notFound = new NotFoundError('Car', 'c-1');
    const unknown = pgError('XX000');
    const plain = new Error('boom');

    expect(mapDatabaseError(notFound)).toBe(notFound);
    expect(mapDatabaseError(unknown)).toBe(unknown);
    expect(mapDatabaseError(plain)).toBe(plain);
  });
});
