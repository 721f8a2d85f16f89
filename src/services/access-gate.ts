import { IncomingHttpHeaders } from "http";
import { NextFunction, Request, RequestHandler, Response } from "express";
import {
  AccessDecision,
  CountryCode,
  IpSource,
  UNKNOWN_COUNTRY,
  UnknownCountryPolicy,
} from "../models/geo-data";
import { BlockListStore, normalizeCountryCode } from "./block-list-store";
import { extractClientAddress } from "./client-ip";
import { CountryResolver } from "./geo-resolver";

export const GEO_BLOCK_REASON = "Geo-blocking policy in effect";
export const UNKNOWN_COUNTRY_DENY_REASON =
  "Country could not be determined and unknown countries are denied";
const ALLOWED_REASON = "Country not blocked";
const UNKNOWN_COUNTRY_ALLOW_REASON =
  "Country could not be determined and unknown countries are allowed";

declare global {
  namespace Express {
    interface Locals {
      accessDecision?: AccessDecision;
    }
  }
}

export interface AccessGateOptions {
  unknownCountryPolicy: UnknownCountryPolicy;
  now?: () => Date;
}

/**
 * JSON body returned with a 403
 */
export interface DenyBody {
  success: false;
  error: string;
  message: string;
  country_code: CountryCode;
  client_ip: string;
  actual_ip?: string;
  detected_via: string;
  ip_source: AccessDecision["ipSource"];
  blocked_at: string;
  reason: string;
}

export function buildDenyBody(decision: AccessDecision): DenyBody {
  const unknown = decision.countryCode === UNKNOWN_COUNTRY;
  const body: DenyBody = {
    success: false,
    error: unknown ? "Country Unknown" : "Country Blocked",
    message: unknown
      ? "Access denied: Your country could not be determined"
      : `Access denied: Your country (${decision.countryCode}) has been blocked`,
    country_code: decision.countryCode,
    client_ip: decision.clientIp,
    detected_via: decision.detectedVia,
    ip_source: decision.ipSource,
    blocked_at: decision.timestamp,
    reason: decision.reason,
  };

  if (decision.resolvedIp && decision.resolvedIp !== decision.clientIp) {
    body.actual_ip = decision.resolvedIp;
  }

  return body;
}

/**
 * Resolves the caller's country and checks it against the block list.
 *
 * Unknown countries follow an explicit policy: "open" lets them through,
 * "closed" denies them. The block list alone decides for every known country.
 */
export class AccessGate {
  private readonly now: () => Date;

  constructor(
    private readonly resolver: CountryResolver,
    private readonly blockList: BlockListStore,
    private readonly options: AccessGateOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async evaluate(
    headers: IncomingHttpHeaders,
    remoteAddress: string | undefined
  ): Promise<AccessDecision> {
    const client = extractClientAddress(headers, remoteAddress);

    let countryCode: CountryCode = UNKNOWN_COUNTRY;
    let resolvedIp: string | null = null;
    try {
      const location = await this.resolver.resolve(client.ip);
      resolvedIp = location.ip;
      if (location.countryCode) {
        countryCode = location.countryCode;
      } else {
        console.warn(`Could not determine country for IP ${location.ip}`);
      }
    } catch (error) {
      console.warn(
        `Could not determine country for IP ${client.ip}:`,
        error instanceof Error ? error.message : error
      );
    }

    return this.evaluateCountry(
      countryCode,
      client.ip,
      client.source,
      resolvedIp
    );
  }

  /**
   * Decide for an already known country
   */
  evaluateCountry(
    countryCode: CountryCode,
    clientIp: string,
    ipSource: IpSource | "simulated",
    resolvedIp: string | null = null
  ): AccessDecision {
    const code = normalizeCountryCode(countryCode) || UNKNOWN_COUNTRY;

    let allowed: boolean;
    let reason: string;
    if (this.blockList.isBlocked(code)) {
      allowed = false;
      reason = GEO_BLOCK_REASON;
    } else if (code === UNKNOWN_COUNTRY) {
      allowed = this.options.unknownCountryPolicy === "open";
      reason = allowed
        ? UNKNOWN_COUNTRY_ALLOW_REASON
        : UNKNOWN_COUNTRY_DENY_REASON;
    } else {
      allowed = true;
      reason = ALLOWED_REASON;
    }

    const decision: AccessDecision = {
      allowed,
      countryCode: code,
      clientIp,
      resolvedIp,
      detectedVia: clientIp,
      ipSource,
      timestamp: this.now().toISOString(),
      reason,
    };

    this.log(decision);
    return decision;
  }

  /**
   * Express middleware: 403 on deny, otherwise annotate the response and continue
   */
  middleware(): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction) => {
      try {
        const decision = await this.evaluate(
          req.headers,
          req.socket.remoteAddress
        );

        if (!decision.allowed) {
          return res.status(403).json(buildDenyBody(decision));
        }

        res.setHeader("X-Client-Country", decision.countryCode);
        res.setHeader("X-Client-IP", decision.clientIp);
        res.locals.accessDecision = decision;
        next();
      } catch (error) {
        next(error);
      }
    };
  }

  private log(decision: AccessDecision): void {
    const actual = decision.resolvedIp ?? decision.clientIp;
    console.log(
      `Request from IP: ${decision.clientIp} (actual: ${actual}, via ${decision.ipSource}), Country: ${decision.countryCode}`
    );

    if (decision.allowed) {
      console.log(
        `ALLOWED: ${decision.clientIp} (${decision.countryCode}) - ${decision.reason}`
      );
    } else {
      console.log(
        `BLOCKED: ${decision.clientIp} (actual: ${actual}, ${decision.countryCode}) - ${decision.reason}`
      );
    }
  }
}
