/**
 * Utility functions for working with IP addresses
 */

/**
 * Numeric IPv4 range, both ends inclusive
 */
export interface Ipv4Range {
  cidr: string;
  start: number;
  end: number;
}

/**
 * IPv4 blocks that are never routed on the public internet
 */
const NON_ROUTABLE_IPV4_CIDRS = [
  "0.0.0.0/8", // "this" network
  "10.0.0.0/8",
  "100.64.0.0/10", // carrier-grade NAT
  "127.0.0.0/8",
  "169.254.0.0/16", // link-local
  "172.16.0.0/12",
  "192.168.0.0/16",
];

const IPV4_MAPPED_PREFIX = /^::ffff:/i;

export class IpUtil {
  private static nonRoutableIpv4: Ipv4Range[] | null = null;

  /**
   * Convert an IPv4 address to its numeric representation
   * Example: "192.168.1.1" -> 3232235777
   */
  static ipToLong(ip: string): number {
    return (
      ip
        .split(".")
        .reduce((acc, octet) => (acc << 8) + parseInt(octet, 10), 0) >>> 0
    );
  }

  /**
   * Validate if the given string is a valid IPv4 address
   */
  static isValidIpv4(ip: string): boolean {
    const pattern = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;
    if (!pattern.test(ip)) return false;

    return ip
      .split(".")
      .map(Number)
      .every((num) => num >= 0 && num <= 255);
  }

  /**
   * Validate if the given string is a valid IPv6 address
   * Handles standard, compressed and IPv4-mapped formats
   */
  static isValidIpv6(ip: string): boolean {
    const pattern =
      /^(([0-9a-fA-F]{1,4}:){7}[0-9a-fA-F]{1,4}|([0-9a-fA-F]{1,4}:){1,7}:|([0-9a-fA-F]{1,4}:){1,6}:[0-9a-fA-F]{1,4}|([0-9a-fA-F]{1,4}:){1,5}(:[0-9a-fA-F]{1,4}){1,2}|([0-9a-fA-F]{1,4}:){1,4}(:[0-9a-fA-F]{1,4}){1,3}|([0-9a-fA-F]{1,4}:){1,3}(:[0-9a-fA-F]{1,4}){1,4}|([0-9a-fA-F]{1,4}:){1,2}(:[0-9a-fA-F]{1,4}){1,5}|[0-9a-fA-F]{1,4}:((:[0-9a-fA-F]{1,4}){1,6})|:((:[0-9a-fA-F]{1,4}){1,7}|:)|fe80:(:[0-9a-fA-F]{0,4}){0,4}%[0-9a-zA-Z]+|::(ffff(:0{1,4})?:)?((25[0-5]|(2[0-4]|1?[0-9])?[0-9])\.){3}(25[0-5]|(2[0-4]|1?[0-9])?[0-9])|([0-9a-fA-F]{1,4}:){1,4}:((25[0-5]|(2[0-4]|1?[0-9])?[0-9])\.){3}(25[0-5]|(2[0-4]|1?[0-9])?[0-9]))$/;

    return pattern.test(ip);
  }

  /**
   * Determine if an IP address is IPv4 or IPv6
   */
  static getIpVersion(ip: string): 4 | 6 | null {
    if (this.isValidIpv4(ip)) return 4;
    if (this.isValidIpv6(ip)) return 6;
    return null;
  }

  /**
   * Check if an IP address is valid (either IPv4 or IPv6)
   */
  static isValidIp(ip: string): boolean {
    return this.isValidIpv4(ip) || this.isValidIpv6(ip);
  }

  /**
   * Expand a compressed IPv6 address to its eight groups
   * Example: "::1" -> "0:0:0:0:0:0:0:1"
   * A trailing dotted IPv4 part becomes two groups: "::ffff:1.2.3.4" -> "0:0:0:0:0:ffff:102:304"
   */
  static normalizeIpv6(ip: string): string {
    if (!ip) {
      throw new Error("IP address cannot be empty");
    }

    const halves = ip.split("::");
    if (halves.length > 2) {
      throw new Error(`Invalid IPv6 address: ${ip} (more than one "::")`);
    }

    const toGroups = (half: string): string[] =>
      half === ""
        ? []
        : half.split(":").flatMap((group) => this.expandEmbeddedIpv4(group));
    const head = toGroups(halves[0]);
    const tail = halves.length === 2 ? toGroups(halves[1]) : [];

    let groups: string[];
    if (halves.length === 2) {
      const missing = 8 - head.length - tail.length;
      if (missing < 1) {
        throw new Error(`Invalid IPv6 address: ${ip} (too many groups)`);
      }
      groups = [...head, ...Array<string>(missing).fill("0"), ...tail];
    } else {
      groups = head;
    }

    if (
      groups.length !== 8 ||
      groups.some((g) => !/^[0-9a-fA-F]{1,4}$/.test(g))
    ) {
      throw new Error(`Invalid IPv6 address: ${ip}`);
    }

    return groups.map((g) => g.replace(/^0+(?=.)/, "")).join(":");
  }

  private static expandEmbeddedIpv4(group: string): string[] {
    if (!this.isValidIpv4(group)) {
      return [group];
    }
    const value = this.ipToLong(group);
    return [(value >>> 16).toString(16), (value & 0xffff).toString(16)];
  }

  /**
   * Parse CIDR notation (e.g., "192.168.1.0/24") to its numeric bounds
   */
  static parseIpv4Cidr(cidr: string): Ipv4Range | null {
    const parts = cidr.split("/");
    if (parts.length !== 2) return null;

    const [ip, prefix] = parts;
    if (!/^\d{1,2}$/.test(prefix)) return null;
    const prefixLength = parseInt(prefix, 10);

    if (!this.isValidIpv4(ip) || prefixLength > 32) {
      return null;
    }

    const mask = prefixLength === 0 ? 0 : (~0 << (32 - prefixLength)) >>> 0;
    const start = (this.ipToLong(ip) & mask) >>> 0;
    const end = (start | (~mask >>> 0)) >>> 0;

    return { cidr, start, end };
  }

  /**
   * Check whether an address belongs to a reserved, non-routable range.
   * IPv4-mapped IPv6 addresses are classified by their IPv4 part.
   */
  static isPrivateIp(ip: string): boolean {
    const candidate = ip.trim();

    if (IPV4_MAPPED_PREFIX.test(candidate)) {
      const mapped = candidate.replace(IPV4_MAPPED_PREFIX, "");
      if (this.isValidIpv4(mapped)) {
        return this.isPrivateIpv4(mapped);
      }
    }

    switch (this.getIpVersion(candidate)) {
      case 4:
        return this.isPrivateIpv4(candidate);
      case 6:
        return this.isPrivateIpv6(candidate);
      default:
        return false;
    }
  }

  private static isPrivateIpv4(ip: string): boolean {
    const value = this.ipToLong(ip);
    return this.getNonRoutableIpv4Ranges().some(
      (range) => value >= range.start && value <= range.end
    );
  }

  private static isPrivateIpv6(ip: string): boolean {
    // Zone identifiers only appear on link-local addresses
    if (ip.includes("%")) return true;

    let normalized: string;
    try {
      normalized = this.normalizeIpv6(ip.toLowerCase());
    } catch (error) {
      console.warn(
        `Treating ${ip} as public:`,
        error instanceof Error ? error.message : error
      );
      return false;
    }

    const groups = normalized
      .split(":")
      .map((group) => parseInt(group, 16));

    // :: and ::1
    if (groups.slice(0, 7).every((g) => g === 0) && groups[7] <= 1) {
      return true;
    }

    const first = groups[0];
    // fc00::/7 unique local, fe80::/10 link-local
    return (first & 0xfe00) === 0xfc00 || (first & 0xffc0) === 0xfe80;
  }

  private static getNonRoutableIpv4Ranges(): Ipv4Range[] {
    if (!this.nonRoutableIpv4) {
      this.nonRoutableIpv4 = NON_ROUTABLE_IPV4_CIDRS.map((cidr) => {
        const range = this.parseIpv4Cidr(cidr);
        if (!range) {
          throw new Error(`Invalid built-in CIDR: ${cidr}`);
        }
        return range;
      });
    }
    return this.nonRoutableIpv4;
  }
}
