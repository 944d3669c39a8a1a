/**
 * Bungie.net API client constants
 */

export const BUNGIE_BASE_URL = "https://www.bungie.net";

/**
 * Manifest endpoint (index of content blob paths)
 */
export const BUNGIE_MANIFEST_PATH = "/Platform/Destiny2/Manifest/";

/**
 * Header carrying the application API key
 */
export const BUNGIE_API_KEY_HEADER = "X-API-Key";

/**
 * ErrorStatus value of a successful Platform response
 */
export const BUNGIE_SUCCESS_STATUS = "Success";

/**
 * Locale whose content paths are used. Only one locale is reconciled.
 */
export const BUNGIE_CONTENT_LOCALE = "en";

/**
 * Content blobs are large (the item definitions run to hundreds of MB),
 * so they get a longer timeout than regular API calls.
 */
export const BUNGIE_CONTENT_TIMEOUT_MS = 180_000;
