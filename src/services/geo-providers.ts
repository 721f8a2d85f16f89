import axios, { AxiosInstance } from "axios";
import { GeoLookupResult } from "../models/geo-data";
import { IpUtil } from "./ip-util";

/**
 * Raised by a provider when it cannot produce a usable result
 */
export class ProviderError extends Error {
  constructor(
    public readonly provider: string,
    message: string
  ) {
    super(`${provider}: ${message}`);
    this.name = "ProviderError";
  }
}

/**
 * One step of a lookup chain.
 * `lookup(ip)` resolves a specific address; `lookup()` resolves the calling host.
 */
export interface GeoProvider {
  readonly name: string;
  lookup(ip?: string): Promise<GeoLookupResult>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(
  data: Record<string, unknown>,
  key: string
): string | undefined {
  const value = data[key];
  return typeof value === "string" && value.trim() !== ""
    ? value.trim()
    : undefined;
}

function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.code === "ECONNABORTED" || error.code === "ETIMEDOUT"
      ? `timed out (${error.message})`
      : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export interface IpInfoProviderOptions {
  timeoutMs: number;
  token?: string;
  baseUrl?: string;
}

/**
 * ipinfo.io lookup: `/json` for the calling host, `/{ip}/json` for an address
 */
export class IpInfoProvider implements GeoProvider {
  readonly name = "ipinfo.io";
  private readonly baseUrl: string;

  constructor(
    private readonly http: AxiosInstance,
    private readonly options: IpInfoProviderOptions
  ) {
    this.baseUrl = options.baseUrl ?? "https://ipinfo.io";
  }

  async lookup(ip?: string): Promise<GeoLookupResult> {
    if (ip !== undefined && !IpUtil.isValidIp(ip)) {
      throw new ProviderError(this.name, `not an IP address: "${ip}"`);
    }

    const url = ip
      ? `${this.baseUrl}/${ip}/json`
      : `${this.baseUrl}/json`;

    let status: number;
    let data: unknown;
    try {
      const response = await this.http.get<unknown>(url, {
        timeout: this.options.timeoutMs,
        params: this.options.token ? { token: this.options.token } : undefined,
        validateStatus: () => true,
      });
      status = response.status;
      data = response.data;
    } catch (error) {
      throw new ProviderError(this.name, describeError(error));
    }

    if (status !== 200) {
      throw new ProviderError(this.name, `unexpected status ${status}`);
    }
    if (!isRecord(data)) {
      throw new ProviderError(this.name, "response is not a JSON object");
    }

    const resolvedIp = readString(data, "ip") ?? ip;
    if (!resolvedIp) {
      throw new ProviderError(this.name, "response carries no IP");
    }

    const country = readString(data, "country");
    return {
      ip: resolvedIp,
      countryCode: country ? country.toUpperCase() : null,
      city: readString(data, "city"),
      region: readString(data, "region"),
      org: readString(data, "org"),
    };
  }
}

/**
 * Plain "what is my IP" service returning the caller's address as text.
 * Only answers for the calling host; the country is left for a follow-up lookup.
 */
export class IpEchoProvider implements GeoProvider {
  constructor(
    readonly name: string,
    private readonly url: string,
    private readonly http: AxiosInstance,
    private readonly timeoutMs: number
  ) {}

  async lookup(ip?: string): Promise<GeoLookupResult> {
    if (ip !== undefined) {
      throw new ProviderError(this.name, "only reports the calling host's IP");
    }

    let status: number;
    let data: unknown;
    try {
      const response = await this.http.get<unknown>(this.url, {
        timeout: this.timeoutMs,
        responseType: "text",
        validateStatus: () => true,
      });
      status = response.status;
      data = response.data;
    } catch (error) {
      throw new ProviderError(this.name, describeError(error));
    }

    if (status !== 200) {
      throw new ProviderError(this.name, `unexpected status ${status}`);
    }

    const discovered = typeof data === "string" ? data.trim() : "";
    if (!IpUtil.isValidIp(discovered)) {
      throw new ProviderError(this.name, `unusable response "${discovered}"`);
    }

    return { ip: discovered, countryCode: null };
  }
}

export interface ProviderChainOptions {
  lookupTimeoutMs: number;
  echoTimeoutMs: number;
  ipInfoToken?: string;
}

/**
 * Ordered lookup chains.
 * `hostLocators` must answer with both the host's IP and its country;
 * `publicIpEchoes` only report the IP, whose country is then looked up.
 */
export interface ProviderChains {
  countryLookups: GeoProvider[];
  hostLocators: GeoProvider[];
  publicIpEchoes: GeoProvider[];
}

/**
 * Default provider order: ipinfo for country lookups and for locating the
 * host, then the plain echo services for its public IP.
 */
export function createDefaultProviders(
  options: ProviderChainOptions,
  http: AxiosInstance = axios.create()
): ProviderChains {
  const ipInfo = new IpInfoProvider(http, {
    timeoutMs: options.lookupTimeoutMs,
    token: options.ipInfoToken,
  });

  return {
    countryLookups: [ipInfo],
    hostLocators: [ipInfo],
    publicIpEchoes: [
      new IpEchoProvider(
        "ipify",
        "https://api.ipify.org?format=text",
        http,
        options.echoTimeoutMs
      ),
      new IpEchoProvider(
        "checkip.amazonaws.com",
        "https://checkip.amazonaws.com",
        http,
        options.echoTimeoutMs
      ),
      new IpEchoProvider(
        "icanhazip.com",
        "https://icanhazip.com",
        http,
        options.echoTimeoutMs
      ),
    ],
  };
}
