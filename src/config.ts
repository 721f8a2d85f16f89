import path from "path";
import dotenv from "dotenv";
import { UnknownCountryPolicy } from "./models/geo-data";

// Load environment variables from .env
dotenv.config();

export interface AppConfig {
  port: number;
  geoLookupTimeoutMs: number;
  ipEchoTimeoutMs: number;
  geoCacheTtlMs: number;
  unknownCountryPolicy: UnknownCountryPolicy;
  ipInfoToken?: string;
  countryDataFile: string;
}

function readInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  { positive = false }: { positive?: boolean } = {}
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }

  const value = parseInt(raw, 10);
  if (isNaN(value) || value < 0 || (positive && value === 0)) {
    const kind = positive ? "a positive" : "a non-negative";
    throw new Error(`${name} must be ${kind} integer, got "${raw}"`);
  }
  return value;
}

function readPolicy(env: NodeJS.ProcessEnv): UnknownCountryPolicy {
  const raw = (env.GEO_FAIL_POLICY || "open").trim().toLowerCase();
  if (raw !== "open" && raw !== "closed") {
    throw new Error(`GEO_FAIL_POLICY must be "open" or "closed", got "${raw}"`);
  }
  return raw;
}

/**
 * Read configuration from the environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: readInt(env, "PORT", 8080),
    // axios treats a timeout of 0 as no timeout at all
    geoLookupTimeoutMs: readInt(env, "GEO_LOOKUP_TIMEOUT_MS", 5000, {
      positive: true,
    }),
    ipEchoTimeoutMs: readInt(env, "IP_ECHO_TIMEOUT_MS", 3000, {
      positive: true,
    }),
    geoCacheTtlMs: readInt(env, "GEO_CACHE_TTL_MS", 60000),
    unknownCountryPolicy: readPolicy(env),
    ipInfoToken: env.IPINFO_TOKEN || undefined,
    countryDataFile: path.resolve(
      process.cwd(),
      env.COUNTRY_DATA_FILE || path.join("data", "countries.csv")
    ),
  };
}
