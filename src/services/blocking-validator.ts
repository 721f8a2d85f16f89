import { CountryCode } from "../models/geo-data";
import { normalizeCountryCode } from "./block-list-store";

export interface BlockingTestResult {
  country: CountryCode;
  blocked: boolean;
  status: string;
  response_time: number;
}

export interface BlockingValidationReport {
  test_results: BlockingTestResult[];
  summary: {
    blocked_count: number;
    allowed_count: number;
    total_tests: number;
  };
}

/**
 * Evaluate test countries against a hypothetical block list.
 * Never reads or writes the live block list.
 */
export function validateBlocking(
  blockedCountries: readonly string[],
  testCountries: readonly string[]
): BlockingValidationReport {
  const blocked = new Set(blockedCountries.map(normalizeCountryCode));

  const results = testCountries.map((raw): BlockingTestResult => {
    const country = normalizeCountryCode(raw);
    const isBlocked = blocked.has(country);
    return {
      country,
      blocked: isBlocked,
      status: isBlocked ? "Access denied (geo-blocked)" : "Access granted",
      // Simulated probe latency, stable per country code
      response_time: 50 + country.length * 10,
    };
  });

  const blockedCount = results.filter((result) => result.blocked).length;

  return {
    test_results: results,
    summary: {
      blocked_count: blockedCount,
      allowed_count: results.length - blockedCount,
      total_tests: results.length,
    },
  };
}
