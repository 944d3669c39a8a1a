export type { CatalogSource } from "./catalog/catalogSource";
export type { GridSource } from "./grid/gridSource";
