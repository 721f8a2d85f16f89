/**
 * Test utility to create a properly configured Express app for testing
 */
import path from "path";
import { createApp } from "../../src/app";
import {
  GeoLookupResult,
  UnknownCountryPolicy,
} from "../../src/models/geo-data";
import { AccessGate } from "../../src/services/access-gate";
import { BlockListStore } from "../../src/services/block-list-store";
import { CountryCatalog } from "../../src/services/country-catalog";
import { StubResolver } from "./stub-resolver";

export const COUNTRY_DATA_FILE = path.join(
  __dirname,
  "..",
  "..",
  "data",
  "countries.csv"
);

/**
 * Addresses the stub resolver knows about
 */
export const TEST_LOCATIONS: Record<string, GeoLookupResult> = {
  "85.214.132.117": {
    ip: "85.214.132.117",
    countryCode: "DE",
    city: "Berlin",
    region: "Land Berlin",
    org: "AS6724 Strato AG",
  },
  "3.3.3.3": { ip: "3.3.3.3", countryCode: "US" },
  "5.5.5.5": { ip: "5.5.5.5", countryCode: "RU" },
  // A private address stands in for the host's public one
  "10.0.0.8": { ip: "85.214.132.117", countryCode: "DE" },
};

export interface TestAppOptions {
  catalog: CountryCatalog;
  unknownCountryPolicy?: UnknownCountryPolicy;
}

/**
 * Create a test app instance with a fresh block list
 */
export function createTestApp(options: TestAppOptions) {
  const resolver = new StubResolver(TEST_LOCATIONS);
  const blockList = new BlockListStore();
  const gate = new AccessGate(resolver, blockList, {
    unknownCountryPolicy: options.unknownCountryPolicy ?? "open",
  });

  const app = createApp({
    resolver,
    blockList,
    catalog: options.catalog,
    gate,
  });

  return { app, resolver, blockList, gate };
}
