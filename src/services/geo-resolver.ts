import { GeoLookupResult } from "../models/geo-data";
import { GeoProvider, ProviderChains } from "./geo-providers";
import { IpUtil } from "./ip-util";
import { LookupCache } from "./lookup-cache";

const HOST_CACHE_KEY = "host:self";

/**
 * Raised when every provider in a chain failed for an address
 */
export class GeoResolutionError extends Error {
  constructor(
    public readonly ip: string,
    public readonly failures: string[]
  ) {
    super(
      `Could not determine country for IP ${ip}` +
        (failures.length > 0 ? ` (${failures.join("; ")})` : "")
    );
    this.name = "GeoResolutionError";
  }
}

/**
 * Anything that can turn a client address into a location
 */
export interface CountryResolver {
  resolve(ip: string): Promise<GeoLookupResult>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Resolves client addresses to countries through ordered provider chains.
 *
 * Public addresses go straight to the country lookup chain. Private and
 * loopback addresses cannot be geolocated, so the host's own public IP is
 * discovered instead and resolved in its place: first from a provider that
 * reports both IP and country, then from the echo services. Each provider is tried at
 * most once per resolution, in order; the first usable answer wins.
 */
export class GeoResolver implements CountryResolver {
  constructor(
    private readonly providers: ProviderChains,
    private readonly cache: LookupCache<GeoLookupResult>
  ) {}

  /**
   * Resolve an address to a location.
   * The result may lack a country when only the public IP could be discovered.
   * @throws GeoResolutionError when no provider produced anything usable
   */
  async resolve(ip: string): Promise<GeoLookupResult> {
    if (IpUtil.isPrivateIp(ip)) {
      console.log(`Private IP detected (${ip}), discovering public IP`);
      return this.discoverPublicLocation(ip);
    }

    return this.lookupCountry(ip);
  }

  /**
   * Run the country lookup chain for a public address
   */
  async lookupCountry(ip: string): Promise<GeoLookupResult> {
    const cached = this.cache.get(ip);
    if (cached) {
      return cached;
    }

    const failures: string[] = [];
    for (const provider of this.providers.countryLookups) {
      const result = await this.attempt(provider, ip, failures);
      if (result?.countryCode) {
        console.log(`${provider.name} result: ${ip} -> ${result.countryCode}`);
        const located = { ...result, ip };
        this.cache.set(ip, located);
        return located;
      }
      if (result) {
        failures.push(`${provider.name}: no country in response`);
      }
    }

    throw new GeoResolutionError(ip, failures);
  }

  private async discoverPublicLocation(
    privateIp: string
  ): Promise<GeoLookupResult> {
    const cached = this.cache.get(HOST_CACHE_KEY);
    if (cached) {
      return cached;
    }

    const failures: string[] = [];
    for (const provider of this.providers.hostLocators) {
      const result = await this.attempt(provider, undefined, failures);
      if (!result || !this.isPublic(provider, result, failures)) {
        continue;
      }
      if (!result.countryCode) {
        failures.push(`${provider.name}: no country in response`);
        continue;
      }

      console.log(
        `Public IP from ${provider.name}: ${result.ip} -> ${result.countryCode}`
      );
      this.cache.set(HOST_CACHE_KEY, result);
      return result;
    }

    for (const provider of this.providers.publicIpEchoes) {
      const result = await this.attempt(provider, undefined, failures);
      if (!result || !this.isPublic(provider, result, failures)) {
        continue;
      }

      console.log(`Public IP from ${provider.name}: ${result.ip}`);
      try {
        const located = await this.lookupCountry(result.ip);
        this.cache.set(HOST_CACHE_KEY, located);
        return located;
      } catch (error) {
        console.warn(errorMessage(error));
        return { ip: result.ip, countryCode: null };
      }
    }

    console.warn(
      `Could not get public IP for private address ${privateIp} from any provider`
    );
    throw new GeoResolutionError(privateIp, failures);
  }

  private isPublic(
    provider: GeoProvider,
    result: GeoLookupResult,
    failures: string[]
  ): boolean {
    if (!IpUtil.isValidIp(result.ip) || IpUtil.isPrivateIp(result.ip)) {
      failures.push(`${provider.name}: returned non-public IP ${result.ip}`);
      return false;
    }
    return true;
  }

  private async attempt(
    provider: GeoProvider,
    ip: string | undefined,
    failures: string[]
  ): Promise<GeoLookupResult | null> {
    try {
      return await provider.lookup(ip);
    } catch (error) {
      const message = errorMessage(error);
      console.warn(`Lookup failed, trying next provider: ${message}`);
      failures.push(message);
      return null;
    }
  }
}
