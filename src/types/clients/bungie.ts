/**
 * Bungie.net Platform API type definitions
 *
 * Only the fields this project reads are modelled.
 * Intentionally NOT exported from the global types barrel (@/types);
 * import from "@/types/clients/bungie" within src/clients/bungie/ only.
 */

/**
 * Manifest payload: locale -> content blob name -> relative path
 */
export type BungieManifest = {
  version: string;
  jsonWorldComponentContentPaths: Record<string, Record<string, string>>;
};

export type BungieApiErrorDetails = {
  errorCode: number;
  errorStatus: string;
  message: string;
  url: string;
};
