import { sql } from "drizzle-orm";
import { pgTable, text, varchar, integer, timestamp, boolean, index, uniqueIndex, primaryKey } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// Closed choice sets. Every status column below is typed from one of these.
export const CAR_CONDITIONS = ["new", "foreign_used", "local_used"] as const;
export const CAR_STATUSES = ["available", "reserved", "sold", "rented"] as const;
export const FEATURE_CATEGORIES = ["interior", "safety", "technical", "extra"] as const;
export const CONTACT_CHANNELS = ["email", "phone", "whatsapp"] as const;
export const RATE_TYPES = ["daily", "weekly", "monthly"] as const;
export const INQUIRY_TYPES = ["purchase", "rental", "test_drive", "general"] as const;
export const INQUIRY_STATUSES = ["new", "contacted", "closed"] as const;
export const INQUIRY_CLOSE_REASONS = ["converted", "duplicate", "spam", "unreachable", "not_interested", "other"] as const;
export const TEST_DRIVE_STATUSES = ["scheduled", "completed", "cancelled", "no_show"] as const;
export const PAYMENT_METHODS = ["cash", "bank_transfer", "financing", "trade_in"] as const;
export const SALE_STATUSES = ["pending", "completed", "cancelled"] as const;
export const RENTAL_STATUSES = ["reserved", "active", "returned", "cancelled"] as const;

export type CarCondition = (typeof CAR_CONDITIONS)[number];
export type CarStatus = (typeof CAR_STATUSES)[number];
export type FeatureCategory = (typeof FEATURE_CATEGORIES)[number];
export type ContactChannel = (typeof CONTACT_CHANNELS)[number];
export type RateType = (typeof RATE_TYPES)[number];
export type InquiryType = (typeof INQUIRY_TYPES)[number];
export type InquiryStatus = (typeof INQUIRY_STATUSES)[number];
export type InquiryCloseReason = (typeof INQUIRY_CLOSE_REASONS)[number];
export type TestDriveStatus = (typeof TEST_DRIVE_STATUSES)[number];
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];
export type SaleStatus = (typeof SALE_STATUSES)[number];
export type RentalStatus = (typeof RENTAL_STATUSES)[number];

// Car manufacturers
export const brands = pgTable("brands", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: text("name").notNull().unique(),
  slug: text("slug").notNull().unique(),
  countryOfOrigin: text("country_of_origin"),
  description: text("description"),
  isActive: boolean("is_active").default(true).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const carModels = pgTable("car_models", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  brandId: varchar("brand_id").notNull().references(() => brands.id, { onDelete: 'restrict', onUpdate: 'cascade' }),
  name: text("name").notNull(),
  slug: text("slug").notNull(),
  isActive: boolean("is_active").default(true).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => ({
  brandNameUnique: uniqueIndex("uq_car_models_brand_name").on(table.brandId, table.name),
  brandIdIdx: index("idx_car_models_brand_id").on(table.brandId),
}));

// Body styles: Sedan, SUV, Hatchback, ...
export const categories = pgTable("categories", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: text("name").notNull().unique(),
  slug: text("slug").notNull().unique(),
  description: text("description"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const features = pgTable("features", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: text("name").notNull().unique(),
  category: text("category", { enum: FEATURE_CATEGORIES }).notNull(),
  icon: text("icon"),
  description: text("description"),
  isActive: boolean("is_active").default(true).notNull(),
}, (table) => ({
  categoryIdx: index("idx_features_category").on(table.category),
}));

// Inventory
export const cars = pgTable("cars", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  carModelId: varchar("car_model_id").notNull().references(() => carModels.id, { onDelete: 'restrict', onUpdate: 'cascade' }),
  categoryId: varchar("category_id").notNull().references(() => categories.id, { onDelete: 'restrict', onUpdate: 'cascade' }),
  year: integer("year").notNull(),
  conditionType: text("condition_type", { enum: CAR_CONDITIONS }).notNull(),
  stockNumber: text("stock_number").notNull().unique(),
  vin: text("vin").unique(),
  // Whole currency units
  msrp: integer("msrp"),
  sellingPrice: integer("selling_price").notNull(),
  dealerDiscount: integer("dealer_discount").default(0).notNull(),
  status: text("status", { enum: CAR_STATUSES }).default("available").notNull(),
  title: text("title").notNull(),
  slug: text("slug").notNull().unique(),
  color: text("color"),
  mileage: integer("mileage"),
  transmission: text("transmission"),
  fuelType: text("fuel_type"),
  description: text("description"),
  location: text("location"),
  isFeatured: boolean("is_featured").default(false).notNull(),
  isForSale: boolean("is_for_sale").default(true).notNull(),
  isForRent: boolean("is_for_rent").default(false).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => ({
  carModelIdx: index("idx_cars_car_model_id").on(table.carModelId),
  categoryIdx: index("idx_cars_category_id").on(table.categoryId),
  statusIdx: index("idx_cars_status").on(table.status),
  yearConditionIdx: index("idx_cars_year_condition").on(table.year, table.conditionType),
  sellingPriceIdx: index("idx_cars_selling_price").on(table.sellingPrice),
}));

export const carFeatures = pgTable("car_features", {
  carId: varchar("car_id").notNull().references(() => cars.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
  featureId: varchar("feature_id").notNull().references(() => features.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
}, (table) => ({
  pk: primaryKey({ columns: [table.carId, table.featureId] }),
  featureIdIdx: index("idx_car_features_feature_id").on(table.featureId),
}));

export const carImages = pgTable("car_images", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  carId: varchar("car_id").notNull().references(() => cars.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
  url: text("url").notNull(),
  altText: text("alt_text"),
  isMain: boolean("is_main").default(false).notNull(),
  displayOrder: integer("display_order").notNull().default(0),
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => ({
  carIdOrderIdx: index("idx_car_images_car_order").on(table.carId, table.displayOrder),
  // At most one main image per car
  mainImageUnique: uniqueIndex("uq_car_images_main").on(table.carId).where(sql`${table.isMain} = true`),
}));

// Rate card used as the default pricing of new rentals
export const rentalRates = pgTable("rental_rates", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  carId: varchar("car_id").notNull().references(() => cars.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
  rateType: text("rate_type", { enum: RATE_TYPES }).notNull(),
  rate: integer("rate").notNull(),
  securityDeposit: integer("security_deposit").default(0).notNull(),
  isActive: boolean("is_active").default(true).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => ({
  carRateTypeUnique: uniqueIndex("uq_rental_rates_car_type").on(table.carId, table.rateType),
}));

export const customers = pgTable("customers", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  firstName: text("first_name").notNull(),
  lastName: text("last_name").notNull(),
  email: text("email").notNull(),
  phone: text("phone").notNull(),
  address: text("address"),
  city: text("city"),
  country: text("country"),
  drivingLicenseNumber: text("driving_license_number"),
  preferredContact: text("preferred_contact", { enum: CONTACT_CHANNELS }).default("email").notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => ({
  emailIdx: index("idx_customers_email").on(table.email),
}));

export const inquiries = pgTable("inquiries", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  customerId: varchar("customer_id").notNull().references(() => customers.id, { onDelete: 'restrict', onUpdate: 'cascade' }),
  carId: varchar("car_id").notNull().references(() => cars.id, { onDelete: 'restrict', onUpdate: 'cascade' }),
  inquiryType: text("inquiry_type", { enum: INQUIRY_TYPES }).default("general").notNull(),
  message: text("message").notNull(),
  status: text("status", { enum: INQUIRY_STATUSES }).default("new").notNull(),
  closeReason: text("close_reason", { enum: INQUIRY_CLOSE_REASONS }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => ({
  statusCreatedAtIdx: index("idx_inquiries_status_created").on(table.status, table.createdAt),
  carIdIdx: index("idx_inquiries_car_id").on(table.carId),
  customerIdIdx: index("idx_inquiries_customer_id").on(table.customerId),
}));

export const testDrives = pgTable("test_drives", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  customerId: varchar("customer_id").notNull().references(() => customers.id, { onDelete: 'restrict', onUpdate: 'cascade' }),
  carId: varchar("car_id").notNull().references(() => cars.id, { onDelete: 'restrict', onUpdate: 'cascade' }),
  scheduledAt: timestamp("scheduled_at").notNull(),
  durationMinutes: integer("duration_minutes").default(30).notNull(),
  pickupLocation: text("pickup_location").default("Main showroom").notNull(),
  status: text("status", { enum: TEST_DRIVE_STATUSES }).default("scheduled").notNull(),
  notes: text("notes"),
  feedback: text("feedback"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => ({
  carScheduledIdx: index("idx_test_drives_car_scheduled").on(table.carId, table.scheduledAt),
  statusIdx: index("idx_test_drives_status").on(table.status),
}));

export const sales = pgTable("sales", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  customerId: varchar("customer_id").notNull().references(() => customers.id, { onDelete: 'restrict', onUpdate: 'cascade' }),
  carId: varchar("car_id").notNull().references(() => cars.id, { onDelete: 'restrict', onUpdate: 'cascade' }),
  inquiryId: varchar("inquiry_id").references(() => inquiries.id, { onDelete: 'set null', onUpdate: 'cascade' }),
  paymentMethod: text("payment_method", { enum: PAYMENT_METHODS }).notNull(),
  finalPrice: integer("final_price").notNull(),
  depositAmount: integer("deposit_amount").default(0).notNull(),
  tradeInValue: integer("trade_in_value").default(0).notNull(),
  financingAmount: integer("financing_amount").default(0).notNull(),
  status: text("status", { enum: SALE_STATUSES }).default("pending").notNull(),
  saleDate: timestamp("sale_date"),
  notes: text("notes"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => ({
  // A car is sold at most once; cancelled sales do not count
  openSaleUnique: uniqueIndex("uq_sales_car_open").on(table.carId).where(sql`${table.status} <> 'cancelled'`),
  statusIdx: index("idx_sales_status").on(table.status),
  customerIdIdx: index("idx_sales_customer_id").on(table.customerId),
}));

export const rentals = pgTable("rentals", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  customerId: varchar("customer_id").notNull().references(() => customers.id, { onDelete: 'restrict', onUpdate: 'cascade' }),
  carId: varchar("car_id").notNull().references(() => cars.id, { onDelete: 'restrict', onUpdate: 'cascade' }),
  inquiryId: varchar("inquiry_id").references(() => inquiries.id, { onDelete: 'set null', onUpdate: 'cascade' }),
  // Half-open range [startDate, endDate)
  startDate: timestamp("start_date").notNull(),
  endDate: timestamp("end_date").notNull(),
  pickupLocation: text("pickup_location").notNull(),
  returnLocation: text("return_location").notNull(),
  dailyRate: integer("daily_rate").notNull(),
  weeklyRate: integer("weekly_rate"),
  monthlyRate: integer("monthly_rate"),
  totalDays: integer("total_days").notNull(),
  totalCost: integer("total_cost").notNull(),
  securityDeposit: integer("security_deposit").default(0).notNull(),
  status: text("status", { enum: RENTAL_STATUSES }).default("reserved").notNull(),
  notes: text("notes"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => ({
  // Overlap checks scan non-terminal rentals of one car
  carStatusIdx: index("idx_rentals_car_status").on(table.carId, table.status),
  customerIdIdx: index("idx_rentals_customer_id").on(table.customerId),
}));

export const blogPosts = pgTable("blog_posts", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  title: text("title").notNull(),
  slug: text("slug").notNull().unique(),
  body: text("body").notNull(),
  excerpt: text("excerpt"),
  authorName: text("author_name"),
  isPublished: boolean("is_published").default(false).notNull(),
  publishedAt: timestamp("published_at"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => ({
  publishedIdx: index("idx_blog_posts_published").on(table.isPublished, table.publishedAt),
}));

// Amounts are stored in Postgres integer columns
export const MAX_AMOUNT = 2_147_483_647;

const money = (label: string) => z.number()
  .int({ message: `${label} must be a whole number` })
  .nonnegative({ message: `${label} cannot be negative` })
  .max(MAX_AMOUNT, { message: `${label} cannot exceed ${MAX_AMOUNT}` });

// Insert schemas for validation
export const insertBrandSchema = createInsertSchema(brands, {
  name: z.string().trim().min(1, "Brand name is required").max(50, "Brand name cannot exceed 50 characters"),
  countryOfOrigin: z.string().trim().max(50),
}).omit({
  id: true,
  slug: true,
  createdAt: true,
});

export const insertCarModelSchema = createInsertSchema(carModels, {
  brandId: z.string().min(1, "Brand is required"),
  name: z.string().trim().min(1, "Model name is required").max(100, "Model name cannot exceed 100 characters"),
}).omit({
  id: true,
  slug: true,
  createdAt: true,
});

export const insertCategorySchema = createInsertSchema(categories, {
  name: z.string().trim().min(1, "Category name is required").max(50, "Category name cannot exceed 50 characters"),
}).omit({
  id: true,
  slug: true,
  createdAt: true,
});

export const insertFeatureSchema = createInsertSchema(features, {
  name: z.string().trim().min(1, "Feature name is required").max(100, "Feature name cannot exceed 100 characters"),
  category: z.enum(FEATURE_CATEGORIES, {
    errorMap: () => ({ message: "Category must be one of: interior, safety, technical, extra" })
  }),
}).omit({
  id: true,
});

export const insertCarSchema = createInsertSchema(cars, {
  carModelId: z.string().min(1, "Car model is required"),
  categoryId: z.string().min(1, "Category is required"),
  year: z.number().int().min(1900, "Year must be 1900 or later").max(2100, "Year must be 2100 or earlier"),
  conditionType: z.enum(CAR_CONDITIONS, {
    errorMap: () => ({ message: "Condition must be one of: new, foreign_used, local_used" })
  }),
  stockNumber: z.string().trim().min(1, "Stock number is required").max(20, "Stock number cannot exceed 20 characters"),
  vin: z.string().trim().toUpperCase().min(11, "VIN must be at least 11 characters").max(17, "VIN cannot exceed 17 characters"),
  msrp: money("MSRP"),
  sellingPrice: money("Selling price").positive({ message: "Selling price must be positive" }),
  dealerDiscount: money("Dealer discount"),
  mileage: money("Mileage"),
}).omit({
  id: true,
  status: true,
  title: true,
  slug: true,
  createdAt: true,
  updatedAt: true,
}).extend({
  title: z.string().trim().max(200).optional(),
  featureIds: z.array(z.string().min(1)).optional(),
});

export const updateCarSchema = insertCarSchema.omit({ featureIds: true }).partial();

export const insertCarImageSchema = createInsertSchema(carImages, {
  carId: z.string().min(1, "Car is required"),
  url: z.string().url("Image URL must be a valid URL"),
  altText: z.string().max(100),
  displayOrder: z.number().int().nonnegative(),
}).omit({
  id: true,
  createdAt: true,
});

export const upsertRentalRateSchema = z.object({
  rateType: z.enum(RATE_TYPES, {
    errorMap: () => ({ message: "Rate type must be one of: daily, weekly, monthly" })
  }),
  rate: money("Rate").positive({ message: "Rate must be positive" }),
  securityDeposit: money("Security deposit").default(0),
  isActive: z.boolean().default(true),
});

export const insertCustomerSchema = createInsertSchema(customers, {
  firstName: z.string().trim().min(1, "First name is required").max(50),
  lastName: z.string().trim().min(1, "Last name is required").max(50),
  email: z.string().trim().toLowerCase().email("Invalid email format"),
  phone: z.string().trim().regex(/^\+?[0-9 ()-]{7,20}$/, "Phone number must be 7-20 digits"),
  preferredContact: z.enum(CONTACT_CHANNELS, {
    errorMap: () => ({ message: "Preferred contact must be one of: email, phone, whatsapp" })
  }),
}).omit({
  id: true,
  createdAt: true,
});

export const insertInquirySchema = createInsertSchema(inquiries, {
  customerId: z.string().min(1, "Customer is required"),
  carId: z.string().min(1, "Car is required"),
  message: z.string().trim().min(1, "Message is required").max(5000),
}).omit({
  id: true,
  status: true,
  closeReason: true,
  createdAt: true,
  updatedAt: true,
});

export const inquiryTransitionSchema = z.object({
  status: z.enum(INQUIRY_STATUSES, {
    errorMap: () => ({ message: "Status must be one of: new, contacted, closed" })
  }),
  closeReason: z.enum(INQUIRY_CLOSE_REASONS).optional(),
});

export const insertTestDriveSchema = createInsertSchema(testDrives, {
  customerId: z.string().min(1, "Customer is required"),
  carId: z.string().min(1, "Car is required"),
  durationMinutes: z.number().int().min(10, "Test drives last at least 10 minutes").max(240, "Test drives last at most 4 hours"),
}).omit({
  id: true,
  status: true,
  feedback: true,
  createdAt: true,
  updatedAt: true,
}).extend({
  scheduledAt: z.coerce.date(),
});

export const testDriveTransitionSchema = z.object({
  status: z.enum(TEST_DRIVE_STATUSES, {
    errorMap: () => ({ message: "Status must be one of: scheduled, completed, cancelled, no_show" })
  }),
  feedback: z.string().trim().max(5000).optional(),
});

export const insertSaleSchema = z.object({
  customerId: z.string().min(1, "Customer is required"),
  carId: z.string().min(1, "Car is required"),
  inquiryId: z.string().min(1).optional(),
  paymentMethod: z.enum(PAYMENT_METHODS, {
    errorMap: () => ({ message: "Payment method must be one of: cash, bank_transfer, financing, trade_in" })
  }),
  finalPrice: money("Final price").positive({ message: "Final price must be positive" }).optional(),
  depositAmount: money("Deposit amount").optional(),
  tradeInValue: money("Trade-in value").optional(),
  financingAmount: money("Financing amount").optional(),
  notes: z.string().trim().max(5000).optional(),
});

export const cancelTransactionSchema = z.object({
  reason: z.string().trim().max(500).optional(),
});

export const insertRentalSchema = z.object({
  customerId: z.string().min(1, "Customer is required"),
  carId: z.string().min(1, "Car is required"),
  inquiryId: z.string().min(1).optional(),
  startDate: z.coerce.date(),
  endDate: z.coerce.date(),
  pickupLocation: z.string().trim().min(1, "Pickup location is required").max(200),
  returnLocation: z.string().trim().min(1, "Return location is required").max(200),
  dailyRate: money("Daily rate").positive({ message: "Daily rate must be positive" }).optional(),
  weeklyRate: money("Weekly rate").positive({ message: "Weekly rate must be positive" }).optional(),
  monthlyRate: money("Monthly rate").positive({ message: "Monthly rate must be positive" }).optional(),
  securityDeposit: money("Security deposit").optional(),
  notes: z.string().trim().max(5000).optional(),
});

export const rentalQuoteSchema = z.object({
  carId: z.string().min(1).optional(),
  startDate: z.coerce.date(),
  endDate: z.coerce.date(),
  dailyRate: money("Daily rate").positive().optional(),
  weeklyRate: money("Weekly rate").positive().optional(),
  monthlyRate: money("Monthly rate").positive().optional(),
});

export const insertBlogPostSchema = createInsertSchema(blogPosts, {
  title: z.string().trim().min(1, "Title is required").max(200, "Title cannot exceed 200 characters"),
  body: z.string().min(1, "Body is required"),
  excerpt: z.string().max(300, "Excerpt cannot exceed 300 characters"),
}).omit({
  id: true,
  publishedAt: true,
  createdAt: true,
  updatedAt: true,
}).extend({
  slug: z.string().trim().regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, "Slug may only contain lowercase letters, digits and dashes").optional(),
});

export const updateBlogPostSchema = insertBlogPostSchema.omit({ isPublished: true }).partial();

export const publishBlogPostSchema = z.object({
  isPublished: z.boolean(),
});

// Types
export type Brand = typeof brands.$inferSelect;
export type InsertBrand = z.infer<typeof insertBrandSchema>;

export type CarModel = typeof carModels.$inferSelect;
export type InsertCarModel = z.infer<typeof insertCarModelSchema>;

export type Category = typeof categories.$inferSelect;
export type InsertCategory = z.infer<typeof insertCategorySchema>;

export type Feature = typeof features.$inferSelect;
export type InsertFeature = z.infer<typeof insertFeatureSchema>;

export type Car = typeof cars.$inferSelect;
export type InsertCar = z.infer<typeof insertCarSchema>;
export type UpdateCar = z.infer<typeof updateCarSchema>;

export type CarFeature = typeof carFeatures.$inferSelect;

export type CarImage = typeof carImages.$inferSelect;
export type InsertCarImage = z.infer<typeof insertCarImageSchema>;

export type RentalRate = typeof rentalRates.$inferSelect;
export type UpsertRentalRate = z.input<typeof upsertRentalRateSchema>;

export type Customer = typeof customers.$inferSelect;
export type InsertCustomer = z.infer<typeof insertCustomerSchema>;

export type Inquiry = typeof inquiries.$inferSelect;
export type InsertInquiry = z.infer<typeof insertInquirySchema>;

export type TestDrive = typeof testDrives.$inferSelect;
export type InsertTestDrive = z.infer<typeof insertTestDriveSchema>;

export type Sale = typeof sales.$inferSelect;
export type InsertSale = z.infer<typeof insertSaleSchema>;

export type Rental = typeof rentals.$inferSelect;
export type InsertRental = z.infer<typeof insertRentalSchema>;
export type RentalQuoteRequest = z.infer<typeof rentalQuoteSchema>;

export type BlogPost = typeof blogPosts.$inferSelect;
export type InsertBlogPost = z.infer<typeof insertBlogPostSchema>;
export type UpdateBlogPost = z.infer<typeof updateBlogPostSchema>;

// Car with its catalog references resolved for display
export type CarWithDetails = Car & {
  brandId: string;
  brandName: string;
  modelName: string;
  categoryName: string;
  finalPrice: number;
  features: Feature[];
  images: CarImage[];
  mainImage: CarImage | null;
  rentalRates: RentalRate[];
};
