/**
 * Upper-case ISO 3166-1 alpha-2 code, or UNKNOWN_COUNTRY
 */
export type CountryCode = string;

/**
 * Sentinel used when no provider could resolve a country
 */
export const UNKNOWN_COUNTRY = "UNKNOWN";

/**
 * Where a client address was read from
 */
export type IpSource =
  | "x-forwarded-for"
  | "x-real-ip"
  | "cf-connecting-ip"
  | "remote-address";

export interface ClientAddress {
  ip: string;
  source: IpSource;
}

/**
 * Interface representing the result of a geolocation lookup.
 * The country may be missing when only the IP could be discovered.
 */
export interface GeoLookupResult {
  ip: string;
  countryCode: CountryCode | null;
  city?: string;
  region?: string;
  org?: string;
}

/**
 * What to do with a request whose country could not be resolved
 */
export type UnknownCountryPolicy = "open" | "closed";

/**
 * Outcome of one access gate evaluation
 */
export interface AccessDecision {
  allowed: boolean;
  countryCode: CountryCode;
  clientIp: string;
  resolvedIp: string | null;
  // Raw IP as taken from the request, before any public-IP discovery
  detectedVia: string;
  ipSource: IpSource | "simulated";
  timestamp: string;
  reason: string;
}

/**
 * Interface for a country catalog entry
 */
export interface CountryEntry {
  code: CountryCode;
  name: string;
  simulatedIp: string | null;
}
