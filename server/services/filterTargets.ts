import {
  additives,
  apiClients,
  brands,
  checkings,
  cosmetics,
  errorReports,
  householdCleaners,
  interestingProducts,
  partnerCategories,
  partners,
  productCategories,
  products,
  scanEvents,
  scoringCategories,
  scoringCriteria,
  shops,
  users,
} from "../../shared/schema.js";
import type { FilterTarget } from "./filterUtils.js";
import { lastRequestedBySql, lastRequestedOnSql } from "./productUtils.js";
import { brandScoreSql } from "./scoringUtils.js";

export const userTarget: FilterTarget = { table: users };

export const apiClientTarget: FilterTarget = { table: apiClients };

export const brandTarget: FilterTarget = {
  table: brands,
  relations: {
    parent: { target: () => brandTarget, localKey: "parent_id", foreignKey: "id" },
  },
  computed: {
    score: brandScoreSql,
  },
};

export const productTarget: FilterTarget = {
  table: products,
  relations: {
    brand: { target: () => brandTarget, localKey: "brand_id", foreignKey: "id" },
    checkings: { target: () => checkingTarget, localKey: "id", foreignKey: "product_id" },
  },
  computed: {
    last_requested_on: lastRequestedOnSql,
    last_requested_by: lastRequestedBySql,
  },
};

export const checkingTarget: FilterTarget = {
  table: checkings,
  relations: {
    user: { target: () => userTarget, localKey: "user_id", foreignKey: "id" },
    product: { target: () => productTarget, localKey: "product_id", foreignKey: "id" },
  },
};

export const additiveTarget: FilterTarget = { table: additives };

export const cosmeticTarget: FilterTarget = { table: cosmetics };

export const householdCleanerTarget: FilterTarget = { table: householdCleaners };

export const errorReportTarget: FilterTarget = {
  table: errorReports,
  relations: {
    product: { target: () => productTarget, localKey: "ean", foreignKey: "ean" },
  },
};

export const productCategoryTarget: FilterTarget = {
  table: productCategories,
  relations: {
    parent: { target: () => productCategoryTarget, localKey: "parent_category_id", foreignKey: "id" },
  },
};

export const interestingProductTarget: FilterTarget = {
  table: interestingProducts,
  relations: {
    category: { target: () => productCategoryTarget, localKey: "category_id", foreignKey: "id" },
    brand: { target: () => brandTarget, localKey: "brand_id", foreignKey: "id" },
  },
};

export const partnerCategoryTarget: FilterTarget = { table: partnerCategories };

export const partnerTarget: FilterTarget = {
  table: partners,
  relations: {
    category: { target: () => partnerCategoryTarget, localKey: "category_id", foreignKey: "id" },
  },
};

export const scoringCategoryTarget: FilterTarget = { table: scoringCategories };

export const scoringCriterionTarget: FilterTarget = {
  table: scoringCriteria,
  relations: {
    category: { target: () => scoringCategoryTarget, localKey: "category_id", foreignKey: "id" },
  },
};

export const shopTarget: FilterTarget = {
  table: shops,
  relations: {
    scan_events: { target: () => scanEventTarget, localKey: "id", foreignKey: "shop_id" },
  },
};

export const scanEventTarget: FilterTarget = {
  table: scanEvents,
  defaultSort: "date_created",
  relations: {
    shop: { target: () => shopTarget, localKey: "shop_id", foreignKey: "id" },
    user: { target: () => userTarget, localKey: "user_id", foreignKey: "id" },
  },
};
