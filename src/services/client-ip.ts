import { IncomingHttpHeaders } from "http";
import { ClientAddress } from "../models/geo-data";

/**
 * Read a header as a single trimmed string; repeated headers use the first value
 */
function headerValue(
  headers: IncomingHttpHeaders,
  name: string
): string | undefined {
  const raw = headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Strip the port from a peer address.
 * "[::1]:54321" -> "::1", "10.0.0.2:8080" -> "10.0.0.2", "::ffff:127.0.0.1" stays as is.
 */
export function stripPort(remoteAddress: string): string {
  if (remoteAddress.startsWith("[")) {
    const endBracket = remoteAddress.indexOf("]");
    if (endBracket > 0) {
      return remoteAddress.slice(1, endBracket);
    }
  }

  const colonIndex = remoteAddress.lastIndexOf(":");
  // More than one colon means a bare IPv6 address without a port
  if (colonIndex > 0 && remoteAddress.indexOf(":") === colonIndex) {
    return remoteAddress.slice(0, colonIndex);
  }

  return remoteAddress;
}

/**
 * Derive the best-guess client address from proxy headers, falling back to the peer address.
 * Values are not validated; malformed ones fail later at lookup time.
 */
export function extractClientAddress(
  headers: IncomingHttpHeaders,
  remoteAddress: string | undefined
): ClientAddress {
  const forwardedFor = headerValue(headers, "x-forwarded-for");
  if (forwardedFor) {
    const first = forwardedFor.split(",")[0].trim();
    if (first) {
      return { ip: first, source: "x-forwarded-for" };
    }
  }

  const realIp = headerValue(headers, "x-real-ip");
  if (realIp) {
    return { ip: realIp, source: "x-real-ip" };
  }

  const cloudflareIp = headerValue(headers, "cf-connecting-ip");
  if (cloudflareIp) {
    return { ip: cloudflareIp, source: "cf-connecting-ip" };
  }

  return { ip: stripPort(remoteAddress ?? ""), source: "remote-address" };
}
