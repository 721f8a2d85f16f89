import path from "path";
import {
  CountryCatalog,
  DEFAULT_SIMULATED_IP,
} from "../../src/services/country-catalog";
import { COUNTRY_DATA_FILE } from "../utils/test-app";

describe("CountryCatalog", () => {
  describe("loaded from the bundled CSV", () => {
    let catalog: CountryCatalog;

    beforeAll(async () => {
      catalog = await CountryCatalog.load(COUNTRY_DATA_FILE);
    });

    it("should load every country", () => {
      expect(catalog.size).toBe(249);
    });

    it("should look up names case-insensitively", () => {
      expect(catalog.getName("DE")).toBe("Germany");
      expect(catalog.getName("us")).toBe("United States");
    });

    it("should keep names that contain commas", () => {
      expect(catalog.getName("BQ")).toBe("Bonaire, Sint Eustatius and Saba");
    });

    it("should return the same simulated IP for the same country", () => {
      expect(catalog.getSimulatedIp("DE")).toBe("185.199.108.153");
      expect(catalog.getSimulatedIp("de")).toBe("185.199.108.153");
      expect(catalog.getSimulatedIp("RU")).toBe("46.4.96.137");
    });

    it("should fall back to the default simulated IP", () => {
      expect(catalog.getSimulatedIp("AF")).toBe(DEFAULT_SIMULATED_IP);
      expect(catalog.getSimulatedIp("ZZ")).toBe(DEFAULT_SIMULATED_IP);
    });

    it("should not know made-up codes", () => {
      expect(catalog.getName("ZZ")).toBeUndefined();
    });
  });

  it("should build a catalog from entries", () => {
    const catalog = new CountryCatalog([
      { code: "se", name: "Sweden", simulatedIp: "185.40.4.194" },
    ]);

    expect(catalog.getName("se")).toBe("Sweden");
    expect(catalog.getSimulatedIp("SE")).toBe("185.40.4.194");
  });

  it("should reject when the file does not exist", async () => {
    await expect(
      CountryCatalog.load(path.join(__dirname, "missing-countries.csv"))
    ).rejects.toThrow("ENOENT");
  });
});
