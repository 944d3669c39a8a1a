/**
 * BungieManifestClient: fetches the Destiny 2 manifest content blobs
 *
 * Implements the CatalogSource interface on top of the Bungie.net Platform API.
 */

import type { CatalogSource } from "@/interfaces/catalog/catalogSource";
import type { RawCatalog } from "@/types/catalog";
import type { HttpRequestFn } from "@/types/clients/http";
import type {
  BungieApiErrorDetails,
  BungieManifest,
} from "@/types/clients/bungie";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import {
  BUNGIE_API_KEY_HEADER,
  BUNGIE_BASE_URL,
  BUNGIE_CONTENT_LOCALE,
  BUNGIE_CONTENT_TIMEOUT_MS,
  BUNGIE_MANIFEST_PATH,
  BUNGIE_SUCCESS_STATUS,
} from "@/constants/clients/bungie";
import {
  CATEGORY_DEFINITION_BLOB,
  ITEM_DEFINITION_BLOB,
  PLUG_SET_DEFINITION_BLOB,
} from "@/constants/catalog";
import { SchemaDriftError } from "@/catalog/errors";
import * as logger from "@/logger";

/**
 * Platform envelope reported a non-success status
 */
export class BungieApiError extends Error {
  public readonly details: BungieApiErrorDetails;

  constructor(details: BungieApiErrorDetails) {
    super(
      `Bungie API error ${details.errorCode} (${details.errorStatus}): ${details.message}`,
    );
    this.name = "BungieApiError";
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BungieApiError);
    }
  }
}

export interface BungieManifestClientConfig {
  /** Application API key sent as X-API-Key */
  apiKey: string;

  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate the Platform envelope and the manifest payload inside it
 *
 * @throws {BungieApiError} If ErrorStatus is not "Success"
 * @throws {SchemaDriftError} If the envelope or payload is malformed
 */
export function parseManifestResponse(
  data: unknown,
  url: string,
): BungieManifest {
  if (!isRecord(data)) {
    throw new SchemaDriftError("manifest", "response is not an object");
  }

  if (data.ErrorStatus !== BUNGIE_SUCCESS_STATUS) {
    throw new BungieApiError({
      errorCode: typeof data.ErrorCode === "number" ? data.ErrorCode : -1,
      errorStatus:
        typeof data.ErrorStatus === "string" ? data.ErrorStatus : "Unknown",
      message: typeof data.Message === "string" ? data.Message : "",
      url,
    });
  }

  const manifest = data.Response;
  if (!isRecord(manifest)) {
    throw new SchemaDriftError("manifest.Response", "missing payload");
  }

  const pathsByLocale = manifest.jsonWorldComponentContentPaths;
  if (!isRecord(pathsByLocale)) {
    throw new SchemaDriftError(
      "manifest.Response.jsonWorldComponentContentPaths",
      "missing content paths",
    );
  }

  const contentPaths: Record<string, Record<string, string>> = {};
  for (const [locale, blobs] of Object.entries(pathsByLocale)) {
    if (!isRecord(blobs)) {
      continue;
    }
    const paths: Record<string, string> = {};
    for (const [blob, path] of Object.entries(blobs)) {
      if (typeof path === "string") {
        paths[blob] = path;
      }
    }
    contentPaths[locale] = paths;
  }

  return {
    version: typeof manifest.version === "string" ? manifest.version : "",
    jsonWorldComponentContentPaths: contentPaths,
  };
}

/**
 * Absolute URL of a content blob for the configured locale
 *
 * @throws {SchemaDriftError} If the manifest lists no path for the blob
 */
export function resolveContentUrl(
  manifest: BungieManifest,
  blobName: string,
): string {
  const path =
    manifest.jsonWorldComponentContentPaths[BUNGIE_CONTENT_LOCALE]?.[blobName];
  if (!path) {
    throw new SchemaDriftError(
      `manifest.jsonWorldComponentContentPaths.${BUNGIE_CONTENT_LOCALE}.${blobName}`,
      "no content path",
    );
  }
  return new URL(path, BUNGIE_BASE_URL).toString();
}

/**
 * Bungie.net implementation of CatalogSource
 */
export class BungieManifestClient implements CatalogSource {
  private readonly apiKey: string;
  private readonly httpRequest: HttpRequestFn;

  constructor(config: BungieManifestClientConfig) {
    if (!config.apiKey) {
      throw new Error(
        "Bungie authentication configuration missing: apiKey is required",
      );
    }

    this.apiKey = config.apiKey;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;

    logger.debug("BungieManifestClient initialized");
  }

  /**
   * Fetch the manifest index
   */
  async fetchManifest(): Promise<BungieManifest> {
    const url = new URL(BUNGIE_MANIFEST_PATH, BUNGIE_BASE_URL).toString();
    const data = await this.httpRequest({
      method: "GET",
      url,
      headers: { [BUNGIE_API_KEY_HEADER]: this.apiKey },
    });
    const manifest = parseManifestResponse(data, url);

    logger.info("Fetched Bungie manifest", { version: manifest.version });
    return manifest;
  }

  private async fetchBlob(manifest: BungieManifest, blobName: string): Promise<unknown> {
    const url = resolveContentUrl(manifest, blobName);
    logger.debug("Fetching manifest content blob", { blob: blobName, url });
    return this.httpRequest({
      method: "GET",
      url,
      timeoutMs: BUNGIE_CONTENT_TIMEOUT_MS,
    });
  }

  /**
   * Fetch all three content blobs to completion
   *
   * @throws {BungieApiError | SchemaDriftError | HttpError} Nothing partial is returned
   */
  async fetchCatalog(): Promise<RawCatalog> {
    const manifest = await this.fetchManifest();

    const [categories, items, plugSets] = await Promise.all([
      this.fetchBlob(manifest, CATEGORY_DEFINITION_BLOB),
      this.fetchBlob(manifest, ITEM_DEFINITION_BLOB),
      this.fetchBlob(manifest, PLUG_SET_DEFINITION_BLOB),
    ]);

    logger.info("Fetched manifest content blobs", {
      version: manifest.version,
      locale: BUNGIE_CONTENT_LOCALE,
    });

    return { categories, items, plugSets };
  }
}
