import { Request, Response } from "express";
import { UNKNOWN_COUNTRY } from "../models/geo-data";
import { AccessGate } from "../services/access-gate";
import {
  BlockListStore,
  normalizeCountryCode,
} from "../services/block-list-store";
import { validateBlocking } from "../services/blocking-validator";
import { extractClientAddress } from "../services/client-ip";
import { CountryCatalog } from "../services/country-catalog";
import { CountryResolver } from "../services/geo-resolver";

export interface ControllerDependencies {
  resolver: CountryResolver;
  blockList: BlockListStore;
  catalog: CountryCatalog;
  gate: AccessGate;
}

const COUNTRY_CODE_PATTERN = /^[A-Z]{2}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function badRequest(res: Response, error: string, message: string) {
  return res.status(400).json({ success: false, error, message });
}

/**
 * Read a list of country codes from a request body field.
 * Returns the normalized codes, or the offending entries when some are not two-letter codes.
 */
function readCountryList(
  body: Record<string, unknown>,
  field: string
): { codes: string[] } | { invalid: unknown[] } | null {
  const value = body[field];
  if (!Array.isArray(value)) {
    return null;
  }

  const codes: string[] = [];
  const invalid: unknown[] = [];
  for (const entry of value) {
    const code = typeof entry === "string" ? normalizeCountryCode(entry) : "";
    if (COUNTRY_CODE_PATTERN.test(code)) {
      codes.push(code);
    } else {
      invalid.push(entry);
    }
  }

  return invalid.length > 0 ? { invalid } : { codes };
}

export function createAccessController(deps: ControllerDependencies) {
  const { resolver, blockList, catalog, gate } = deps;

  return {
    /**
     * GET /api/ip-info: location probe, never blocked
     */
    async ipInfo(req: Request, res: Response) {
      try {
        const client = extractClientAddress(
          req.headers,
          req.socket.remoteAddress
        );

        let ip = client.ip;
        let countryCode = UNKNOWN_COUNTRY;
        let city: string | undefined;
        let region: string | undefined;
        let isp: string | undefined;
        try {
          const location = await resolver.resolve(client.ip);
          ip = location.ip;
          countryCode = location.countryCode ?? UNKNOWN_COUNTRY;
          city = location.city;
          region = location.region;
          isp = location.org;
        } catch (error) {
          console.warn(
            `Could not resolve location for ${client.ip}, using detected IP:`,
            error instanceof Error ? error.message : error
          );
        }

        const countryName = catalog.getName(countryCode) ?? "Unknown";
        console.log(
          `IP Info response: ${ip} -> ${countryCode} (${countryName})`
        );

        return res.status(200).json({
          ip,
          country_code: countryCode,
          country_name: countryName,
          city: city ?? "Unknown",
          region: region ?? "Unknown",
          isp: isp ?? "Unknown",
        });
      } catch (error) {
        console.error("Error processing ip-info request:", error);
        return res
          .status(500)
          .json({ success: false, error: "Failed to resolve IP information" });
      }
    },

    /**
     * GET /api/test-access: only reached when the access gate allowed the request
     */
    testAccess(req: Request, res: Response) {
      const decision = res.locals.accessDecision;
      const now = new Date();

      return res.status(200).json({
        success: true,
        message: "Access granted! You can access this API.",
        client_ip:
          decision?.clientIp ??
          extractClientAddress(req.headers, req.socket.remoteAddress).ip,
        country_code: decision?.countryCode ?? UNKNOWN_COUNTRY,
        timestamp: decision?.timestamp ?? now.toISOString(),
        server_time: Math.floor(now.getTime() / 1000),
      });
    },

    /**
     * POST /api/simulate-vpn: decide as if the request came from the given country
     */
    simulateVpn(req: Request, res: Response) {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        return badRequest(
          res,
          "Invalid JSON request",
          "Request body must be a JSON object"
        );
      }

      const rawCode = body.country_code;
      if (typeof rawCode !== "string" || rawCode.trim() === "") {
        return badRequest(
          res,
          "Country code is required",
          "country_code must be a non-empty string"
        );
      }

      const countryCode = normalizeCountryCode(rawCode);
      if (!COUNTRY_CODE_PATTERN.test(countryCode)) {
        return badRequest(
          res,
          "Invalid country code",
          `"${rawCode}" is not a two-letter ISO country code`
        );
      }

      const countryName = catalog.getName(countryCode) ?? "Unknown Country";
      const simulatedIp = catalog.getSimulatedIp(countryCode);
      const decision = gate.evaluateCountry(
        countryCode,
        simulatedIp,
        "simulated"
      );

      console.log(
        `VPN Simulation: ${countryName} (${countryCode}) from IP ${simulatedIp} - Blocked: ${!decision.allowed}`
      );

      if (!decision.allowed) {
        return res.status(403).json({
          success: false,
          message: `Access denied: ${countryName} (${countryCode}) is blocked`,
          country_code: countryCode,
          country_name: countryName,
          simulated_ip: simulatedIp,
          is_blocked: true,
          timestamp: decision.timestamp,
          error: "Country is geo-blocked",
          reason: decision.reason,
        });
      }

      return res.status(200).json({
        success: true,
        message: `Access granted from ${countryName} (${countryCode})`,
        country_code: countryCode,
        country_name: countryName,
        simulated_ip: simulatedIp,
        is_blocked: false,
        timestamp: decision.timestamp,
      });
    },

    /**
     * POST /api/block-countries: replace the live block list
     */
    async blockCountries(req: Request, res: Response) {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        return badRequest(
          res,
          "Invalid JSON request",
          "Request body must be a JSON object"
        );
      }

      const list = readCountryList(body, "countries");
      if (!list) {
        return badRequest(
          res,
          "Invalid request",
          "countries must be an array of country codes"
        );
      }
      if ("invalid" in list) {
        return res.status(400).json({
          success: false,
          error: "Invalid country codes",
          message:
            "Every entry in countries must be a two-letter ISO country code",
          invalid: list.invalid,
        });
      }

      try {
        const blocked = await blockList.setBlocked(list.codes);
        console.log(`Blocking countries: ${blocked.join(", ") || "(none)"}`);

        return res.status(200).json({
          message: `Successfully blocked ${blocked.length} countries`,
          blocked_countries: blocked,
          success: true,
        });
      } catch (error) {
        console.error("Error updating block list:", error);
        return res
          .status(500)
          .json({ success: false, error: "Failed to update block list" });
      }
    },

    /**
     * POST /api/validate-blocking: offline check against a hypothetical list
     */
    validateBlocking(req: Request, res: Response) {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        return badRequest(
          res,
          "Invalid JSON request",
          "Request body must be a JSON object"
        );
      }

      const blocked = readCountryList(body, "blocked_countries");
      const tests = readCountryList(body, "test_countries");
      if (!blocked || !tests) {
        return badRequest(
          res,
          "Invalid request",
          "blocked_countries and test_countries must be arrays of country codes"
        );
      }
      if ("invalid" in blocked || "invalid" in tests) {
        return res.status(400).json({
          success: false,
          error: "Invalid country codes",
          message: "Every entry must be a two-letter ISO country code",
          invalid: [
            ...("invalid" in blocked ? blocked.invalid : []),
            ...("invalid" in tests ? tests.invalid : []),
          ],
        });
      }

      console.log(
        `Validating blocking for countries: ${tests.codes.join(", ")}`
      );
      const report = validateBlocking(blocked.codes, tests.codes);
      console.log(
        `Validation complete: ${report.summary.blocked_count} blocked, ${report.summary.allowed_count} allowed`
      );

      return res.status(200).json({ success: true, ...report });
    },
  };
}

export type AccessController = ReturnType<typeof createAccessController>;
