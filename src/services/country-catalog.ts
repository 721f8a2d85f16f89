import fs from "fs";
import path from "path";
import csv from "csv-parser";
import { CountryCode, CountryEntry } from "../models/geo-data";
import { normalizeCountryCode } from "./block-list-store";

export const DEFAULT_COUNTRY_DATA_FILE = path.join(
  process.cwd(),
  "data",
  "countries.csv"
);

/**
 * Address handed out for countries without a dedicated simulated IP
 */
export const DEFAULT_SIMULATED_IP = "198.51.100.1";

/**
 * Country names and the deterministic addresses used by VPN simulation
 */
export class CountryCatalog {
  private readonly entries: Map<CountryCode, CountryEntry> = new Map();

  constructor(entries: Iterable<CountryEntry>) {
    for (const entry of entries) {
      this.entries.set(normalizeCountryCode(entry.code), entry);
    }
  }

  /**
   * Load the catalog from a CSV file with columns code,name,simulated_ip
   */
  static load(
    filePath: string = DEFAULT_COUNTRY_DATA_FILE
  ): Promise<CountryCatalog> {
    return new Promise((resolve, reject) => {
      const entries: CountryEntry[] = [];

      fs.createReadStream(filePath)
        .on("error", reject)
        .pipe(csv())
        .on("data", (row: Record<string, string>) => {
          const code = row.code?.trim();
          if (!code) {
            return;
          }
          entries.push({
            code: normalizeCountryCode(code),
            name: row.name?.trim() || code,
            simulatedIp: row.simulated_ip?.trim() || null,
          });
        })
        .on("end", () => {
          const catalog = new CountryCatalog(entries);
          console.log(`Loaded ${catalog.size} countries from ${filePath}`);
          resolve(catalog);
        })
        .on("error", reject);
    });
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Display name, or undefined for codes the catalog does not know
   */
  getName(code: string): string | undefined {
    return this.entries.get(normalizeCountryCode(code))?.name;
  }

  /**
   * Same country always maps to the same address
   */
  getSimulatedIp(code: string): string {
    return (
      this.entries.get(normalizeCountryCode(code))?.simulatedIp ??
      DEFAULT_SIMULATED_IP
    );
  }
}
