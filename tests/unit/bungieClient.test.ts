/**
 * Unit tests for BungieManifestClient
 *
 * All HTTP goes through the mock harness; no network
 */

import { beforeEach, describe, it, expect } from "vitest";
import {
  BungieApiError,
  BungieManifestClient,
  parseManifestResponse,
  resolveContentUrl,
} from "@/clients/bungie";
import { HttpError } from "@/clients/http";
import { SchemaDriftError } from "@/catalog";
import { createMockHttp, type MockHttp } from "../helpers/mockHttp";
import { loadFixtureJson, loadRawCatalog } from "../helpers/fixtures";

const MANIFEST_URL = "https://www.bungie.net/Platform/Destiny2/Manifest/";
const CONTENT_BASE = "https://www.bungie.net/common/destiny2_content/json/en";
const CATEGORIES_URL = `${CONTENT_BASE}/DestinyItemCategoryDefinition-test.json`;
const ITEMS_URL = `${CONTENT_BASE}/DestinyInventoryItemDefinition-test.json`;
const PLUG_SETS_URL = `${CONTENT_BASE}/DestinyPlugSetDefinition-test.json`;

function registerCatalog(mock: MockHttp): void {
  const raw = loadRawCatalog();
  mock.on("GET", MANIFEST_URL, loadFixtureJson("bungie/manifest.json"));
  mock.on("GET", CATEGORIES_URL, raw.categories);
  mock.on("GET", ITEMS_URL, raw.items);
  mock.on("GET", PLUG_SETS_URL, raw.plugSets);
}

describe("BungieManifestClient", () => {
  let mock: MockHttp;
  let client: BungieManifestClient;

  beforeEach(() => {
    mock = createMockHttp();
    client = new BungieManifestClient({
      apiKey: "test-api-key",
      httpRequest: mock.request,
    });
  });

  it("requires an API key", () => {
    expect(() => new BungieManifestClient({ apiKey: "" })).toThrow(
      "Bungie authentication configuration missing: apiKey is required",
    );
  });

  it("fetches the manifest with the API key, then the three en blobs", async () => {
    registerCatalog(mock);

    const catalog = await client.fetchCatalog();

    expect(catalog).toEqual(loadRawCatalog());

    const requests = mock.getRecordedRequests();
    expect(requests).toHaveLength(4);
    expect(requests[0]).toEqual({
      method: "GET",
      url: MANIFEST_URL,
      headers: { "X-API-Key": "test-api-key" },
    });
    expect(requests.slice(1).map((req) => req.url)).toEqual([
      CATEGORIES_URL,
      ITEMS_URL,
      PLUG_SETS_URL,
    ]);
    expect(requests[1].timeoutMs).toBe(180_000);
  });

  it("rejects a non-success envelope with BungieApiError", async () => {
    mock.on("GET", MANIFEST_URL, {
      ErrorCode: 2101,
      ErrorStatus: "ApiInvalidOrExpiredKey",
      Message: "Invalid API key",
    });

    await expect(client.fetchCatalog()).rejects.toThrow(
      "Bungie API error 2101 (ApiInvalidOrExpiredKey): Invalid API key",
    );
    await expect(client.fetchManifest()).rejects.toBeInstanceOf(BungieApiError);
  });

  it("propagates transport failures", async () => {
    mock.onResponse("GET", MANIFEST_URL, { status: 503, body: "maintenance" });

    await expect(client.fetchCatalog()).rejects.toBeInstanceOf(HttpError);
  });

  it("fails with SchemaDriftError when a content path is missing", async () => {
    const raw = loadRawCatalog();
    mock.on("GET", MANIFEST_URL, {
      ErrorCode: 1,
      ErrorStatus: "Success",
      Message: "Ok",
      Response: {
        version: "test-manifest-2",
        jsonWorldComponentContentPaths: {
          en: {
            DestinyItemCategoryDefinition:
              "/common/destiny2_content/json/en/DestinyItemCategoryDefinition-test.json",
            DestinyInventoryItemDefinition:
              "/common/destiny2_content/json/en/DestinyInventoryItemDefinition-test.json",
          },
        },
      },
    });
    mock.on("GET", CATEGORIES_URL, raw.categories);
    mock.on("GET", ITEMS_URL, raw.items);

    await expect(client.fetchCatalog()).rejects.toThrow(
      "Catalog schema drift at manifest.jsonWorldComponentContentPaths.en.DestinyPlugSetDefinition: no content path",
    );
  });
});

describe("parseManifestResponse", () => {
  it("keeps string paths per locale", () => {
    const manifest = parseManifestResponse(loadFixtureJson("bungie/manifest.json"), MANIFEST_URL);

    expect(manifest.version).toBe("test-manifest-1");
    expect(Object.keys(manifest.jsonWorldComponentContentPaths)).toEqual(["en", "fr"]);
  });

  it("rejects a success envelope without a payload", () => {
    expect(() =>
      parseManifestResponse({ ErrorCode: 1, ErrorStatus: "Success", Message: "Ok" }, MANIFEST_URL),
    ).toThrow(SchemaDriftError);
  });
});

describe("resolveContentUrl", () => {
  it("resolves the en path against bungie.net", () => {
    const manifest = parseManifestResponse(loadFixtureJson("bungie/manifest.json"), MANIFEST_URL);
    expect(resolveContentUrl(manifest, "DestinyPlugSetDefinition")).toBe(PLUG_SETS_URL);
  });
});
