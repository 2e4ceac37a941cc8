import type { Car, CarImage } from "@shared/schema";
import { ValidationError } from "./errors";

type SlugPart = string | number | null | undefined;

export function slugify(...parts: SlugPart[]): string {
  return parts
    .filter((part): part is string | number => part !== null && part !== undefined && String(part).trim() !== "")
    .map(String)
    .join(" ")
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/** First free slug among `base`, `base-2`, `base-3`, ... */
export function pickUniqueSlug(base: string, taken: Iterable<string>): string {
  const used = new Set(taken);
  const root = base || "item";

  if (!used.has(root)) {
    return root;
  }

  let suffix = 2;
  while (used.has(`${root}-${suffix}`)) {
    suffix++;
  }
  return `${root}-${suffix}`;
}

export function carSlugBase(brandName: string, modelName: string, year: number, stockNumber: string): string {
  return slugify(brandName, modelName, year, stockNumber);
}

export function buildCarTitle(year: number, brandName: string, modelName: string): string {
  return `${year} ${brandName} ${modelName}`;
}

export interface CarPricing {
  msrp?: number | null;
  sellingPrice: number;
  dealerDiscount: number;
}

export function assertCarPricing(pricing: CarPricing): void {
  const { msrp, sellingPrice, dealerDiscount } = pricing;
  const errors: string[] = [];

  if (sellingPrice <= 0) {
    errors.push("Selling price must be positive");
  }
  if (dealerDiscount < 0) {
    errors.push("Dealer discount cannot be negative");
  }
  if (dealerDiscount > sellingPrice) {
    errors.push(`Dealer discount (${dealerDiscount}) cannot exceed the selling price (${sellingPrice})`);
  }
  if (msrp !== null && msrp !== undefined && sellingPrice > msrp - dealerDiscount) {
    errors.push(`Selling price (${sellingPrice}) cannot exceed MSRP (${msrp}) minus dealer discount (${dealerDiscount})`);
  }

  if (errors.length > 0) {
    throw new ValidationError("Invalid car pricing", errors);
  }
}

export function carFinalPrice(car: Pick<Car, "sellingPrice" | "dealerDiscount">): number {
  return car.sellingPrice - car.dealerDiscount;
}

export function sortCarImages(images: readonly CarImage[]): CarImage[] {
  return [...images].sort((a, b) =>
    a.displayOrder - b.displayOrder || a.createdAt.getTime() - b.createdAt.getTime()
  );
}

/** The flagged main image, else the first image in display order. */
export function pickMainImage(images: readonly CarImage[]): CarImage | null {
  const sorted = sortCarImages(images);
  return sorted.find((image) => image.isMain) ?? sorted[0] ?? null;
}
