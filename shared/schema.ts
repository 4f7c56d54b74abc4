import { relations } from "drizzle-orm";
import {
  pgTable,
  pgEnum,
  serial,
  text,
  varchar,
  integer,
  boolean,
  timestamp,
  doublePrecision,
  index,
  unique,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// Enums
export const userRoleEnum = pgEnum("user_role", ["admin", "contributor", "user"]);

export const productStatusEnum = pgEnum("product_status", [
  "VEGAN",
  "NON_VEGAN",
  "MAYBE_VEGAN",
  "NOT_FOUND",
]);

export const productStateEnum = pgEnum("product_state", [
  "CREATED",
  "NEED_CONTACT",
  "WAITING_BRAND_REPLY",
  "NOT_FOUND",
  "WAITING_PUBLISH",
  "PUBLISHED",
]);

export const checkingStatusEnum = pgEnum("checking_status", ["PENDING", "VEGAN", "NON_VEGAN"]);

export const additiveStatusEnum = pgEnum("additive_status", ["VEGAN", "NON_VEGAN", "MAYBE_VEGAN"]);

export const interestingProductTypeEnum = pgEnum("interesting_product_type", ["popular", "sponsored"]);

export type UserRole = (typeof userRoleEnum.enumValues)[number];

const createdAt = () => timestamp("created_at").defaultNow().notNull();
const updatedAt = () =>
  timestamp("updated_at")
    .defaultNow()
    .notNull()
    .$onUpdate(() => new Date());

// Accounts
export const users = pgTable("users", {
  id: serial("id").primaryKey(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
  role: userRoleEnum("role").default("user").notNull(),
  nickname: varchar("nickname").notNull().unique(),
  email: varchar("email").notNull().unique(),
  isActive: boolean("is_active").default(false).notNull(),
  avatar: varchar("avatar"),
  nbProductsSent: integer("nb_products_sent").default(0).notNull(),
});

export const apiClients = pgTable("api_clients", {
  id: serial("id").primaryKey(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
  name: varchar("name").notNull().unique(),
  apiKey: varchar("api_key").notNull().unique(),
  isActive: boolean("is_active").default(false).notNull(),
});

// Catalog
export const brands = pgTable("brands", {
  id: serial("id").primaryKey(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
  name: varchar("name").notNull().unique(),
  parentId: integer("parent_id"),
  logoPath: varchar("logo_path"),
}, (table) => ({
  parentIdx: index("idx_brands_parent_id").on(table.parentId),
}));

export const products = pgTable("products", {
  id: serial("id").primaryKey(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
  ean: varchar("ean").notNull().unique(),
  name: varchar("name"),
  description: text("description"),
  problemDescription: text("problem_description"),
  brandId: integer("brand_id").references(() => brands.id),
  brandName: varchar("brand_name"),
  status: productStatusEnum("status").default("MAYBE_VEGAN").notNull(),
  biodynamic: boolean("biodynamic").default(false).notNull(),
  state: productStateEnum("state").default("CREATED").notNull(),
  createdFromOff: boolean("created_from_off").default(false).notNull(),
  hasNonVeganOldReceipe: boolean("has_non_vegan_old_receipe").default(false).notNull(),
  lastModifiedBy: integer("last_modified_by").references(() => users.id, { onDelete: "set null" }),
  photo: varchar("photo"),
}, (table) => ({
  brandIdx: index("idx_products_brand_id").on(table.brandId),
  brandNameIdx: index("idx_products_brand_name").on(table.brandName),
}));

export const checkings = pgTable("checkings", {
  id: serial("id").primaryKey(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
  requestedOn: timestamp("requested_on").defaultNow().notNull(),
  respondedOn: timestamp("responded_on"),
  status: checkingStatusEnum("status").default("PENDING").notNull(),
  response: text("response"),
  userId: integer("user_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  productId: integer("product_id").notNull().references(() => products.id, { onDelete: "cascade" }),
}, (table) => ({
  productIdx: index("idx_checkings_product_id").on(table.productId),
}));

export const additives = pgTable("additives", {
  id: serial("id").primaryKey(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
  eNumber: varchar("e_number").notNull().unique(),
  name: varchar("name"),
  description: text("description"),
  status: additiveStatusEnum("status").default("MAYBE_VEGAN").notNull(),
  source: varchar("source"),
});

export const cosmetics = pgTable("cosmetics", {
  id: serial("id").primaryKey(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
  brandName: varchar("brand_name").notNull().unique(),
  isVegan: boolean("is_vegan").default(false).notNull(),
  isCrueltyFree: boolean("is_cruelty_free").default(false).notNull(),
  description: text("description"),
});

export const householdCleaners = pgTable("household_cleaners", {
  id: serial("id").primaryKey(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
  brandName: varchar("brand_name").notNull().unique(),
  isVegan: boolean("is_vegan").default(false).notNull(),
  isCrueltyFree: boolean("is_cruelty_free").default(false).notNull(),
  description: text("description"),
  source: varchar("source"),
});

export const errorReports = pgTable("error_reports", {
  id: serial("id").primaryKey(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
  ean: varchar("ean").notNull(),
  comment: varchar("comment").notNull(),
  contact: varchar("contact"),
  handled: boolean("handled").default(false).notNull(),
  createdBy: integer("created_by").references(() => users.id, { onDelete: "set null" }),
}, (table) => ({
  eanIdx: index("idx_error_reports_ean").on(table.ean),
}));

export const productCategories = pgTable("product_categories", {
  id: serial("id").primaryKey(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
  name: varchar("name").notNull().unique(),
  parentCategoryId: integer("parent_category_id"),
  image: varchar("image"),
});

export const interestingProducts = pgTable("interesting_products", {
  id: serial("id").primaryKey(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
  ean: varchar("ean").notNull(),
  name: varchar("name"),
  image: varchar("image"),
  type: interestingProductTypeEnum("type").default("popular").notNull(),
  categoryId: integer("category_id").notNull().references(() => productCategories.id),
  brandId: integer("brand_id").references(() => brands.id),
}, (table) => ({
  eanIdx: index("idx_interesting_products_ean").on(table.ean),
}));

// Partners
export const partnerCategories = pgTable("partner_categories", {
  id: serial("id").primaryKey(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
  name: varchar("name").notNull().unique(),
});

export const partners = pgTable("partners", {
  id: serial("id").primaryKey(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
  name: varchar("name").notNull().unique(),
  url: varchar("url").notNull(),
  logoPath: varchar("logo_path"),
  description: text("description"),
  discountText: varchar("discount_text"),
  discountCode: varchar("discount_code"),
  isAffiliate: boolean("is_affiliate").default(false).notNull(),
  showCodeInWebsite: boolean("show_code_in_website").default(false).notNull(),
  isActive: boolean("is_active").default(true).notNull(),
  categoryId: integer("category_id").references(() => partnerCategories.id, { onDelete: "set null" }),
});

// Brand scoring
export const scoringCategories = pgTable("scoring_categories", {
  id: serial("id").primaryKey(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
  name: varchar("name", { length: 100 }).notNull().unique(),
});

export const scoringCriteria = pgTable("scoring_criteria", {
  id: serial("id").primaryKey(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
  name: varchar("name", { length: 200 }).notNull(),
  categoryId: integer("category_id").notNull().references(() => scoringCategories.id, { onDelete: "cascade" }),
}, (table) => ({
  categoryIdx: index("idx_scoring_criteria_category_id").on(table.categoryId),
}));

export const brandCriterionScores = pgTable("brand_criterion_scores", {
  id: serial("id").primaryKey(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
  brandId: integer("brand_id").notNull().references(() => brands.id, { onDelete: "cascade" }),
  criterionId: integer("criterion_id").notNull().references(() => scoringCriteria.id, { onDelete: "cascade" }),
  score: doublePrecision("score").notNull(),
  description: text("description"),
}, (table) => ({
  brandCriterionUnique: unique("unique_brand_criterion_score").on(table.brandId, table.criterionId),
}));

// Shops and scans
export const shops = pgTable("shops", {
  id: serial("id").primaryKey(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
  name: varchar("name").notNull(),
  latitude: doublePrecision("latitude").notNull(),
  longitude: doublePrecision("longitude").notNull(),
  address: varchar("address"),
  city: varchar("city"),
  country: varchar("country"),
  osmId: varchar("osm_id").unique(),
  osmType: varchar("osm_type"),
  shopType: varchar("shop_type"),
}, (table) => ({
  latitudeIdx: index("idx_shops_latitude").on(table.latitude),
  longitudeIdx: index("idx_shops_longitude").on(table.longitude),
}));

export const scanEvents = pgTable("scan_events", {
  id: serial("id").primaryKey(),
  dateCreated: timestamp("date_created").defaultNow().notNull(),
  ean: varchar("ean").notNull(),
  latitude: doublePrecision("latitude"),
  longitude: doublePrecision("longitude"),
  shopId: integer("shop_id").references(() => shops.id, { onDelete: "set null" }),
  lookupApiResponse: text("lookup_api_response"),
  userId: integer("user_id").references(() => users.id, { onDelete: "set null" }),
}, (table) => ({
  eanIdx: index("idx_scan_events_ean").on(table.ean),
  shopIdx: index("idx_scan_events_shop_id").on(table.shopId),
}));

// Relations
export const usersRelations = relations(users, ({ many }) => ({
  checkings: many(checkings),
}));

export const brandsRelations = relations(brands, ({ one, many }) => ({
  parent: one(brands, {
    fields: [brands.parentId],
    references: [brands.id],
    relationName: "brand_parent",
  }),
  children: many(brands, { relationName: "brand_parent" }),
  products: many(products),
  scores: many(brandCriterionScores),
}));

export const productsRelations = relations(products, ({ one, many }) => ({
  brand: one(brands, { fields: [products.brandId], references: [brands.id] }),
  lastModifier: one(users, { fields: [products.lastModifiedBy], references: [users.id] }),
  checkings: many(checkings),
}));

export const checkingsRelations = relations(checkings, ({ one }) => ({
  user: one(users, { fields: [checkings.userId], references: [users.id] }),
  product: one(products, { fields: [checkings.productId], references: [products.id] }),
}));

export const errorReportsRelations = relations(errorReports, ({ one }) => ({
  product: one(products, { fields: [errorReports.ean], references: [products.ean] }),
  author: one(users, { fields: [errorReports.createdBy], references: [users.id] }),
}));

export const productCategoriesRelations = relations(productCategories, ({ one, many }) => ({
  parent: one(productCategories, {
    fields: [productCategories.parentCategoryId],
    references: [productCategories.id],
    relationName: "category_parent",
  }),
  children: many(productCategories, { relationName: "category_parent" }),
  interestingProducts: many(interestingProducts),
}));

export const interestingProductsRelations = relations(interestingProducts, ({ one }) => ({
  category: one(productCategories, {
    fields: [interestingProducts.categoryId],
    references: [productCategories.id],
  }),
  brand: one(brands, { fields: [interestingProducts.brandId], references: [brands.id] }),
}));

export const partnerCategoriesRelations = relations(partnerCategories, ({ many }) => ({
  partners: many(partners),
}));

export const partnersRelations = relations(partners, ({ one }) => ({
  category: one(partnerCategories, { fields: [partners.categoryId], references: [partnerCategories.id] }),
}));

export const scoringCategoriesRelations = relations(scoringCategories, ({ many }) => ({
  criteria: many(scoringCriteria),
}));

export const scoringCriteriaRelations = relations(scoringCriteria, ({ one, many }) => ({
  category: one(scoringCategories, {
    fields: [scoringCriteria.categoryId],
    references: [scoringCategories.id],
  }),
  brandScores: many(brandCriterionScores),
}));

export const brandCriterionScoresRelations = relations(brandCriterionScores, ({ one }) => ({
  brand: one(brands, { fields: [brandCriterionScores.brandId], references: [brands.id] }),
  criterion: one(scoringCriteria, {
    fields: [brandCriterionScores.criterionId],
    references: [scoringCriteria.id],
  }),
}));

export const shopsRelations = relations(shops, ({ many }) => ({
  scanEvents: many(scanEvents),
}));

export const scanEventsRelations = relations(scanEvents, ({ one }) => ({
  shop: one(shops, { fields: [scanEvents.shopId], references: [shops.id] }),
  user: one(users, { fields: [scanEvents.userId], references: [users.id] }),
}));

// Insert schemas
const generatedColumns = { id: true, createdAt: true, updatedAt: true } as const;

export const insertUserSchema = createInsertSchema(users, {
  email: (schema) => schema.email.email(),
  nickname: (schema) => schema.nickname.min(1),
}).omit({ ...generatedColumns, nbProductsSent: true });

export const updateOwnAccountSchema = insertUserSchema.pick({ nickname: true, avatar: true }).partial();

export const insertApiClientSchema = createInsertSchema(apiClients, {
  name: (schema) => schema.name.min(1),
  apiKey: (schema) => schema.apiKey.min(1),
}).omit(generatedColumns);

export const insertBrandSchema = createInsertSchema(brands, {
  name: (schema) => schema.name.min(1),
}).omit(generatedColumns);

export const insertProductSchema = createInsertSchema(products, {
  ean: (schema) => schema.ean.min(1),
}).omit({ ...generatedColumns, lastModifiedBy: true });

export const insertCheckingSchema = createInsertSchema(checkings, {
  requestedOn: z.coerce.date(),
  respondedOn: z.coerce.date().nullable(),
}).omit({ ...generatedColumns, userId: true });

export const insertAdditiveSchema = createInsertSchema(additives, {
  eNumber: (schema) => schema.eNumber.min(1),
}).omit(generatedColumns);

export const insertCosmeticSchema = createInsertSchema(cosmetics, {
  brandName: (schema) => schema.brandName.min(1),
}).omit(generatedColumns);

export const insertHouseholdCleanerSchema = createInsertSchema(householdCleaners, {
  brandName: (schema) => schema.brandName.min(1),
}).omit(generatedColumns);

export const insertErrorReportSchema = createInsertSchema(errorReports, {
  ean: (schema) => schema.ean.min(1),
  comment: (schema) => schema.comment.min(1),
}).omit(generatedColumns);

export const insertProductCategorySchema = createInsertSchema(productCategories, {
  name: (schema) => schema.name.min(1),
}).omit(generatedColumns);

export const insertInterestingProductSchema = createInsertSchema(interestingProducts, {
  ean: (schema) => schema.ean.min(1),
}).omit(generatedColumns);

export const insertPartnerCategorySchema = createInsertSchema(partnerCategories, {
  name: (schema) => schema.name.min(1),
}).omit(generatedColumns);

export const insertPartnerSchema = createInsertSchema(partners, {
  name: (schema) => schema.name.min(1),
  url: (schema) => schema.url.min(1),
}).omit(generatedColumns);

export const insertScoringCategorySchema = createInsertSchema(scoringCategories, {
  name: (schema) => schema.name.min(1).max(100),
}).omit(generatedColumns);

export const insertScoringCriterionSchema = createInsertSchema(scoringCriteria, {
  name: (schema) => schema.name.min(1).max(200),
}).omit(generatedColumns);

export const insertBrandCriterionScoreSchema = createInsertSchema(brandCriterionScores, {
  score: (schema) => schema.score.min(0).max(5),
}).omit({ ...generatedColumns, brandId: true });

export const updateBrandCriterionScoreSchema = insertBrandCriterionScoreSchema
  .omit({ criterionId: true })
  .partial();

export const insertShopSchema = createInsertSchema(shops, {
  name: (schema) => schema.name.min(1),
  latitude: (schema) => schema.latitude.min(-90).max(90),
  longitude: (schema) => schema.longitude.min(-180).max(180),
}).omit(generatedColumns);

export const insertScanEventSchema = createInsertSchema(scanEvents, {
  ean: (schema) => schema.ean.min(1),
  latitude: (schema) => schema.latitude.min(-90).max(90),
  longitude: (schema) => schema.longitude.min(-180).max(180),
}).omit({ id: true, dateCreated: true });

// Types
export type User = typeof users.$inferSelect;
export type InsertUser = z.infer<typeof insertUserSchema>;
export type ApiClient = typeof apiClients.$inferSelect;
export type InsertApiClient = z.infer<typeof insertApiClientSchema>;
export type Brand = typeof brands.$inferSelect;
export type InsertBrand = z.infer<typeof insertBrandSchema>;
export type Product = typeof products.$inferSelect;
export type InsertProduct = z.infer<typeof insertProductSchema>;
export type Checking = typeof checkings.$inferSelect;
export type InsertChecking = z.infer<typeof insertCheckingSchema>;
export type Additive = typeof additives.$inferSelect;
export type InsertAdditive = z.infer<typeof insertAdditiveSchema>;
export type Cosmetic = typeof cosmetics.$inferSelect;
export type InsertCosmetic = z.infer<typeof insertCosmeticSchema>;
export type HouseholdCleaner = typeof householdCleaners.$inferSelect;
export type InsertHouseholdCleaner = z.infer<typeof insertHouseholdCleanerSchema>;
export type ErrorReport = typeof errorReports.$inferSelect;
export type InsertErrorReport = z.infer<typeof insertErrorReportSchema>;
export type ProductCategory = typeof productCategories.$inferSelect;
export type InsertProductCategory = z.infer<typeof insertProductCategorySchema>;
export type InterestingProduct = typeof interestingProducts.$inferSelect;
export type InsertInterestingProduct = z.infer<typeof insertInterestingProductSchema>;
export type PartnerCategory = typeof partnerCategories.$inferSelect;
export type InsertPartnerCategory = z.infer<typeof insertPartnerCategorySchema>;
export type Partner = typeof partners.$inferSelect;
export type InsertPartner = z.infer<typeof insertPartnerSchema>;
export type ScoringCategory = typeof scoringCategories.$inferSelect;
export type InsertScoringCategory = z.infer<typeof insertScoringCategorySchema>;
export type ScoringCriterion = typeof scoringCriteria.$inferSelect;
export type InsertScoringCriterion = z.infer<typeof insertScoringCriterionSchema>;
export type BrandCriterionScore = typeof brandCriterionScores.$inferSelect;
export type InsertBrandCriterionScore = z.infer<typeof insertBrandCriterionScoreSchema>;
export type Shop = typeof shops.$inferSelect;
export type InsertShop = z.infer<typeof insertShopSchema>;
export type ScanEvent = typeof scanEvents.$inferSelect;
export type InsertScanEvent = z.infer<typeof insertScanEventSchema>;
