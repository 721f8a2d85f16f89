import path from "path";
import { loadConfig } from "../src/config";

describe("loadConfig", () => {
  it("should apply defaults", () => {
    const config = loadConfig({});

    expect(config).toEqual({
      port: 8080,
      geoLookupTimeoutMs: 5000,
      ipEchoTimeoutMs: 3000,
      geoCacheTtlMs: 60000,
      unknownCountryPolicy: "open",
      ipInfoToken: undefined,
      countryDataFile: path.resolve(process.cwd(), "data", "countries.csv"),
    });
  });

  it("should read values from the environment", () => {
    const config = loadConfig({
      PORT: "3001",
      GEO_LOOKUP_TIMEOUT_MS: "4000",
      IP_ECHO_TIMEOUT_MS: "2500",
      GEO_CACHE_TTL_MS: "0",
      GEO_FAIL_POLICY: "Closed",
      IPINFO_TOKEN: "test-token",
    });

    expect(config.port).toBe(3001);
    expect(config.geoLookupTimeoutMs).toBe(4000);
    expect(config.ipEchoTimeoutMs).toBe(2500);
    expect(config.geoCacheTtlMs).toBe(0);
    expect(config.unknownCountryPolicy).toBe("closed");
    expect(config.ipInfoToken).toBe("test-token");
  });

  it("should reject an unknown policy", () => {
    expect(() => loadConfig({ GEO_FAIL_POLICY: "maybe" })).toThrow(
      'GEO_FAIL_POLICY must be "open" or "closed", got "maybe"'
    );
  });

  it("should reject non-numeric timeouts", () => {
    expect(() => loadConfig({ GEO_LOOKUP_TIMEOUT_MS: "soon" })).toThrow(
      'GEO_LOOKUP_TIMEOUT_MS must be a positive integer, got "soon"'
    );
  });

  it.each(["GEO_LOOKUP_TIMEOUT_MS", "IP_ECHO_TIMEOUT_MS"])(
    "should reject a zero %s, which would disable the timeout",
    (name) => {
      expect(() => loadConfig({ [name]: "0" })).toThrow(
        `${name} must be a positive integer, got "0"`
      );
    }
  );

  it("should reject a negative cache TTL", () => {
    expect(() => loadConfig({ GEO_CACHE_TTL_MS: "-5" })).toThrow(
      'GEO_CACHE_TTL_MS must be a non-negative integer, got "-5"'
    );
  });
});
