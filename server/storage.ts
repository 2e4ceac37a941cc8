import type {
  Brand,
  InsertBrand,
  CarModel,
  InsertCarModel,
  Category,
  InsertCategory,
  Feature,
  InsertFeature,
  Car,
  InsertCar,
  UpdateCar,
  CarWithDetails,
  CarImage,
  InsertCarImage,
  RentalRate,
  UpsertRentalRate,
  Customer,
  InsertCustomer,
  Inquiry,
  InsertInquiry,
  InquiryStatus,
  InquiryCloseReason,
  TestDrive,
  InsertTestDrive,
  TestDriveStatus,
  Sale,
  InsertSale,
  SaleStatus,
  Rental,
  InsertRental,
  RentalStatus,
  RentalQuoteRequest,
  BlogPost,
  InsertBlogPost,
  UpdateBlogPost,
  CarCondition,
  CarStatus,
} from "@shared/schema";
import { carFinalPrice, pickMainImage, sortCarImages } from "./catalog-rules";
import type { ResolvedRentalTerms, RentalCost } from "./rental-pricing";
import { log } from "./log";

export interface DeleteOptions {
  cascade?: boolean;
}

export interface CarFilterOptions {
  brandId?: string;
  carModelId?: string;
  categoryId?: string;
  conditionType?: CarCondition;
  status?: CarStatus;
  year?: number;
  minPrice?: number;
  maxPrice?: number;
  forSale?: boolean;
  forRent?: boolean;
  featured?: boolean;
  search?: string;
  sortBy?: 'sellingPrice' | 'year' | 'mileage' | 'createdAt';
  sortOrder?: 'asc' | 'desc';
  offset?: number;
  limit?: number;
}

export interface CarListResult {
  cars: Car[];
  total: number;
  hasMore: boolean;
}

export interface InquiryFilterOptions {
  status?: InquiryStatus;
  carId?: string;
  customerId?: string;
}

export interface TestDriveFilterOptions {
  status?: TestDriveStatus;
  carId?: string;
  customerId?: string;
}

export interface SaleFilterOptions {
  status?: SaleStatus;
  carId?: string;
  customerId?: string;
}

export interface RentalFilterOptions {
  status?: RentalStatus;
  carId?: string;
  customerId?: string;
}

export interface BlogPostFilterOptions {
  publishedOnly?: boolean;
}

export type RentalQuote = ResolvedRentalTerms & RentalCost;

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export type StorageKind = "memory" | "postgres";

export interface IStorage {
  readonly kind: StorageKind;

  getBrands(): Promise<Brand[]>;
  getBrand(id: string): Promise<Brand | undefined>;
  createBrand(brand: InsertBrand): Promise<Brand>;
  updateBrand(id: string, updates: Partial<InsertBrand>): Promise<Brand>;
  deleteBrand(id: string, options?: DeleteOptions): Promise<void>;

  getCarModels(brandId?: string): Promise<CarModel[]>;
  getCarModel(id: string): Promise<CarModel | undefined>;
  createCarModel(carModel: InsertCarModel): Promise<CarModel>;
  updateCarModel(id: string, updates: Partial<InsertCarModel>): Promise<CarModel>;
  deleteCarModel(id: string, options?: DeleteOptions): Promise<void>;

  getCategories(): Promise<Category[]>;
  getCategory(id: string): Promise<Category | undefined>;
  createCategory(category: InsertCategory): Promise<Category>;
  updateCategory(id: string, updates: Partial<InsertCategory>): Promise<Category>;
  deleteCategory(id: string, options?: DeleteOptions): Promise<void>;

  getFeatures(): Promise<Feature[]>;
  getFeature(id: string): Promise<Feature | undefined>;
  createFeature(feature: InsertFeature): Promise<Feature>;
  updateFeature(id: string, updates: Partial<InsertFeature>): Promise<Feature>;
  deleteFeature(id: string): Promise<void>;

  getCars(filters?: CarFilterOptions): Promise<CarListResult>;
  getCar(id: string): Promise<Car | undefined>;
  getCarBySlug(slug: string): Promise<Car | undefined>;
  getCarWithDetails(id: string): Promise<CarWithDetails | undefined>;
  createCar(car: InsertCar): Promise<Car>;
  updateCar(id: string, updates: UpdateCar): Promise<Car>;
  deleteCar(id: string): Promise<void>;
  getCarFeatures(carId: string): Promise<Feature[]>;
  setCarFeatures(carId: string, featureIds: string[]): Promise<Feature[]>;

  getCarImages(carId: string): Promise<CarImage[]>;
  addCarImage(image: InsertCarImage): Promise<CarImage>;
  setCarImageMain(carId: string, imageId: string): Promise<CarImage>;
  updateCarImageOrder(carId: string, imageId: string, displayOrder: number): Promise<CarImage>;
  deleteCarImage(carId: string, imageId: string): Promise<void>;

  getRentalRates(carId: string): Promise<RentalRate[]>;
  setRentalRate(carId: string, rate: UpsertRentalRate): Promise<RentalRate>;

  getCustomers(search?: string): Promise<Customer[]>;
  getCustomer(id: string): Promise<Customer | undefined>;
  createCustomer(customer: InsertCustomer): Promise<Customer>;
  updateCustomer(id: string, updates: Partial<InsertCustomer>): Promise<Customer>;
  deleteCustomer(id: string): Promise<void>;

  getInquiries(filters?: InquiryFilterOptions): Promise<Inquiry[]>;
  getInquiry(id: string): Promise<Inquiry | undefined>;
  createInquiry(inquiry: InsertInquiry): Promise<Inquiry>;
  transitionInquiry(id: string, status: InquiryStatus, closeReason?: InquiryCloseReason): Promise<Inquiry>;

  getTestDrives(filters?: TestDriveFilterOptions): Promise<TestDrive[]>;
  getTestDrive(id: string): Promise<TestDrive | undefined>;
  createTestDrive(testDrive: InsertTestDrive): Promise<TestDrive>;
  transitionTestDrive(id: string, status: TestDriveStatus, feedback?: string): Promise<TestDrive>;

  getSales(filters?: SaleFilterOptions): Promise<Sale[]>;
  getSale(id: string): Promise<Sale | undefined>;
  createSale(sale: InsertSale): Promise<Sale>;
  completeSale(id: string): Promise<Sale>;
  cancelSale(id: string, reason?: string): Promise<Sale>;

  getRentals(filters?: RentalFilterOptions): Promise<Rental[]>;
  getRental(id: string): Promise<Rental | undefined>;
  quoteRental(request: RentalQuoteRequest): Promise<RentalQuote>;
  createRental(rental: InsertRental): Promise<Rental>;
  activateRental(id: string): Promise<Rental>;
  returnRental(id: string): Promise<Rental>;
  cancelRental(id: string, reason?: string): Promise<Rental>;

  getBlogPosts(filters?: BlogPostFilterOptions): Promise<BlogPost[]>;
  getBlogPost(id: string): Promise<BlogPost | undefined>;
  getBlogPostBySlug(slug: string): Promise<BlogPost | undefined>;
  createBlogPost(post: InsertBlogPost): Promise<BlogPost>;
  updateBlogPost(id: string, updates: UpdateBlogPost): Promise<BlogPost>;
  setBlogPostPublished(id: string, isPublished: boolean): Promise<BlogPost>;
  deleteBlogPost(id: string): Promise<void>;
}

export function clampPageSize(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit) || limit <= 0) {
    return DEFAULT_PAGE_SIZE;
  }
  return Math.min(Math.floor(limit), MAX_PAGE_SIZE);
}

/** `%term%` for ILIKE, with backslash, `%` and `_` in the term matched literally. */
export function containsPattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, (char) => `\\${char}`)}%`;
}

/** Drops keys whose value is undefined so a partial update never blanks a column. */
export function definedFields<T extends object>(updates: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in updates) {
    if (Object.prototype.hasOwnProperty.call(updates, key) && updates[key] !== undefined) {
      result[key] = updates[key];
    }
  }
  return result;
}

export function appendNote(existing: string | null, note: string | undefined): string | null {
  if (!note) {
    return existing;
  }
  return existing ? `${existing}\n${note}` : note;
}

export function carsInUseMessage(resource: string, name: string, carCount: number): string {
  return `Cannot delete ${resource} "${name}": it is referenced by ${carCount} car(s). Remove those cars first or request a cascading delete.`;
}

export function carHistoryMessage(referenceCount: number): string {
  return `Cannot delete car(s) referenced by ${referenceCount} inquiry, test drive, sale or rental record(s); those records are kept for audit history.`;
}

export function assembleCarDetails(
  car: Car,
  parts: {
    carModel: CarModel;
    brand: Brand;
    category: Category;
    features: Feature[];
    images: CarImage[];
    rentalRates: RentalRate[];
  }
): CarWithDetails {
  return {
    ...car,
    brandId: parts.brand.id,
    brandName: parts.brand.name,
    modelName: parts.carModel.name,
    categoryName: parts.category.name,
    finalPrice: carFinalPrice(car),
    features: parts.features,
    images: sortCarImages(parts.images),
    mainImage: pickMainImage(parts.images),
    rentalRates: parts.rentalRates,
  };
}

async function createStorage(): Promise<IStorage> {
  if (!process.env.DATABASE_URL && !process.env.POSTGRES_URL && !process.env.PGHOST) {
    log("DATABASE_URL not set - using in-memory storage (data lost on restart)", "storage");
    const { MemStorage } = await import("./mem-storage");
    return new MemStorage();
  }

  const { DatabaseStorage } = await import("./database-storage");
  const storage = new DatabaseStorage();
  await storage.ping();
  log("connected to PostgreSQL", "storage");
  return storage;
}

let storageInstance: IStorage | null = null;

export async function getStorage(): Promise<IStorage> {
  if (!storageInstance) {
    storageInstance = await createStorage();
  }
  return storageInstance;
}
