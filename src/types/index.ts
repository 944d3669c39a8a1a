export * from "./logger";
export * from "./catalog";
export * from "./grid";
export * from "./wishlist";
export * from "./runner";
export * from "./clients/http";
export * from "./clients/googleSheets";
// Bungie types are intentionally NOT exported from the global barrel.
// Import directly from "@/types/clients/bungie" within src/clients/bungie/ only.
