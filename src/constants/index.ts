/**
 * Constants barrel exports
 */

export * from "./catalog";
export * from "./grid";
export * from "./logger";
export * from "./runner";
export * from "./textNormalization";
export * from "./wishlist";
export * from "./clients/http";
export * from "./clients/bungie";
export * from "./clients/googleSheets";
