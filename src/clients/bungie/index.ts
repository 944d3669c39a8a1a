/**
 * Bungie.net client public API
 */

export {
  BungieManifestClient,
  BungieApiError,
  parseManifestResponse,
  resolveContentUrl,
} from "./bungieClient";
export type { BungieManifestClientConfig } from "./bungieClient";
