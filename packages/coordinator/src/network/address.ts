/**
 * IPv4 address lists for naming camera servers.
 *
 * Servers are identified by their address. Users name groups of them as a
 * single address, a dash-separated range, or a comma-separated mix of both:
 *
 *   192.168.0.1
 *   192.168.0.1-192.168.0.10
 *   192.168.0.1,192.168.0.5-192.168.0.10
 *
 * Every address must belong to the configured network.
 */

import { isIPv4 } from "node:net";
import { AddressSyntaxError } from "../utils/errors.js";

/** Largest number of addresses a single range may expand to */
export const MAX_RANGE_SIZE = 65536;

export interface Ipv4Network {
  /** Normalized CIDR notation, host bits cleared */
  cidr: string;
  base: number;
  prefix: number;
  mask: number;
}

export function ipv4ToInt(address: string): number {
  const trimmed = address.trim();
  if (!isIPv4(trimmed)) {
    throw new AddressSyntaxError(`Invalid address "${trimmed}"`, address);
  }
  return trimmed.split(".").reduce((acc, octet) => acc * 256 + Number(octet), 0);
}

export function intToIpv4(value: number): string {
  return [value >>> 24, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff].join(".");
}

/**
 * Parse "a.b.c.d/prefix". Host bits in the address are cleared.
 */
export function parseNetwork(cidr: string): Ipv4Network {
  const [address, prefixText, ...rest] = cidr.trim().split("/");
  if (prefixText === undefined || rest.length > 0 || !/^\d{1,2}$/.test(prefixText)) {
    throw new AddressSyntaxError(`Invalid network "${cidr}"`, cidr);
  }
  const prefix = Number(prefixText);
  if (prefix > 32) {
    throw new AddressSyntaxError(`Invalid network "${cidr}"`, cidr);
  }
  const mask = prefix === 0 ? 0 : (0xffffffff << (32 - prefix)) >>> 0;
  const base = (ipv4ToInt(address ?? "") & mask) >>> 0;
  return { cidr: `${intToIpv4(base)}/${prefix}`, base, prefix, mask };
}

export function networkContains(network: Ipv4Network, value: number): boolean {
  return ((value & network.mask) >>> 0) === network.base;
}

/**
 * Parses address syntax against one network.
 */
export class AddressParser {
  readonly network: Ipv4Network;

  constructor(network: Ipv4Network | string) {
    this.network = typeof network === "string" ? parseNetwork(network) : network;
  }

  /**
   * Parse a single address and check it belongs to the network.
   */
  parseAddress(text: string): string {
    return intToIpv4(this.toMember(text));
  }

  /**
   * Parse "start-finish" (inclusive) into every address it covers.
   */
  parseAddressRange(text: string): string[] {
    const dash = text.indexOf("-");
    if (dash < 0) {
      throw new AddressSyntaxError("Expected two dash-separated addresses", text);
    }
    const start = this.toMember(text.slice(0, dash));
    const finish = this.toMember(text.slice(dash + 1));
    if (finish < start) {
      throw new AddressSyntaxError(`Range "${text.trim()}" ends before it starts`, text);
    }
    if (finish - start + 1 > MAX_RANGE_SIZE) {
      throw new AddressSyntaxError(
        `Range "${text.trim()}" covers more than ${MAX_RANGE_SIZE} addresses`,
        text
      );
    }
    const result: string[] = [];
    for (let value = start; value <= finish; value++) {
      result.push(intToIpv4(value));
    }
    return result;
  }

  /**
   * Parse a comma-separated list of addresses and ranges.
   * @returns Unique addresses in ascending numeric order
   */
  parseAddressList(text: string): string[] {
    const values = new Set<number>();
    for (const item of text.split(",")) {
      if (item.trim() === "") {
        throw new AddressSyntaxError("Empty entry in address list", text);
      }
      if (item.includes("-")) {
        for (const address of this.parseAddressRange(item)) {
          values.add(ipv4ToInt(address));
        }
      } else {
        values.add(this.toMember(item));
      }
    }
    return Array.from(values)
      .sort((a, b) => a - b)
      .map(intToIpv4);
  }

  private toMember(text: string): number {
    const value = ipv4ToInt(text);
    if (!networkContains(this.network, value)) {
      throw new AddressSyntaxError(
        `Address "${text.trim()}" does not belong to the configured network "${this.network.cidr}"`,
        text
      );
    }
    return value;
  }
}
