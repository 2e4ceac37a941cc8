import { describe, it, expect } from '@jest/globals';
import {
  slugify,
  pickUniqueSlug,
  carSlugBase,
  buildCarTitle,
  assertCarPricing,
  carFinalPrice,
  sortCarImages,
  pickMainImage,
} from '../../catalog-rules';
import { ValidationError } from '../../errors';
import type { CarImage } from '@shared/schema';

function image(id: string, displayOrder: number, isMain = false, createdAt = '2025-01-01T00:00:00Z'): CarImage {
  return {
    id,
    carId: 'car-1',
    url: `https://images.test/${id}.jpg`,
    altText: null,
    isMain,
    displayOrder,
    createdAt: new Date(createdAt),
  };
}

describe('Catalog rules - Unit Tests', () => {
  describe('slugify', () => {
    it('should join parts and collapse separators', () => {
      expect(slugify('Mercedes-Benz', 'C 300', 2021, 'STK-001')).toBe('mercedes-benz-c-300-2021-stk-001');
    });

    it('should strip accents and skip empty parts', () => {
      expect(slugify('Škoda', null, '  ', 'Octavia!')).toBe('skoda-octavia');
    });
  });

  describe('pickUniqueSlug', () => {
    it('should return the base when it is free', () => {
      expect(pickUniqueSlug('toyota', ['honda'])).toBe('toyota');
    });

    it('should append the first free numeric suffix', () => {
      expect(pickUniqueSlug('toyota', ['toyota', 'toyota-2'])).toBe('toyota-3');
    });

    it('should fall back to a placeholder for an empty base', () => {
      expect(pickUniqueSlug('', [])).toBe('item');
    });
  });

  it('should build car titles and slug bases from the catalog names', () => {
    expect(buildCarTitle(2022, 'Toyota', 'Corolla')).toBe('2022 Toyota Corolla');
    expect(carSlugBase('Toyota', 'Corolla', 2022, 'A-17')).toBe('toyota-corolla-2022-a-17');
  });

  describe('assertCarPricing', () => {
    it('should accept a price within MSRP minus discount', () => {
      expect(() => assertCarPricing({ msrp: 30000, sellingPrice: 28000, dealerDiscount: 2000 })).not.toThrow();
    });

    it('should reject a selling price above MSRP minus discount', () => {
      try {
        assertCarPricing({ msrp: 30000, sellingPrice: 29000, dealerDiscount: 2000 });
        throw new Error('expected a pricing error');
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.errors).toEqual([
            'Selling price (29000) cannot exceed MSRP (30000) minus dealer discount (2000)',
          ]);
        }
      }
    });

    it('should reject a discount larger than the price', () => {
      expect(() => assertCarPricing({ sellingPrice: 1000, dealerDiscount: 1500 })).toThrow('Invalid car pricing');
    });
  });

  it('should compute the final price as selling price minus discount', () => {
    expect(carFinalPrice({ sellingPrice: 25000, dealerDiscount: 1500 })).toBe(23500);
  });

  describe('images', () => {
    it('should order by display order, then creation time', () => {
      const sorted = sortCarImages([
        image('c', 2),
        image('b', 1, false, '2025-01-02T00:00:00Z'),
        image('a', 1, false, '2025-01-01T00:00:00Z'),
      ]);
      expect(sorted.map((img) => img.id)).toEqual(['a', 'b', 'c']);
    });

    it('should prefer the flagged main image', () => {
      expect(pickMainImage([image('a', 0), image('b', 1, true)])?.id).toBe('b');
    });

    it('should fall back to the first image, or null when there are none', () => {
      expect(pickMainImage([image('b', 3), image('a', 1)])?.id).toBe('a');
      expect(pickMainImage([])).toBeNull();
    });
  });
});
