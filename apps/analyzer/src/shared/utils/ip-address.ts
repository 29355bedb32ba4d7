import { isIPv4, isIPv6 } from 'net';
import { InvalidAddressError } from '../errors.js';

export type IPFamily = 4 | 6;

export interface TargetAddress {
  family: IPFamily;
  /** Canonical text form, comparable with decoded frame addresses. */
  text: string;
}

export function formatIPv4(bytes: Uint8Array, offset: number): string {
  return `${bytes[offset]}.${bytes[offset + 1]}.${bytes[offset + 2]}.${bytes[offset + 3]}`;
}

function isIPv4Mapped(groups: number[]): boolean {
  return groups.slice(0, 5).every((group) => group === 0) && groups[5] === 0xffff;
}

/**
 * RFC 5952 text for the 16 bytes at `offset`: lowercase hex, no leading
 * zeros, the longest run of two or more zero groups collapsed to "::".
 * IPv4-mapped addresses come out as plain dotted quads.
 */
export function formatIPv6(bytes: Uint8Array, offset: number): string {
  const groups: number[] = [];
  for (let i = 0; i < 8; i++) {
    groups.push(((bytes[offset + i * 2] ?? 0) << 8) | (bytes[offset + i * 2 + 1] ?? 0));
  }

  if (isIPv4Mapped(groups)) {
    return formatIPv4(bytes, offset + 12);
  }

  let bestStart = -1;
  let bestLength = 0;
  for (let i = 0; i < 8; ) {
    if (groups[i] !== 0) {
      i++;
      continue;
    }
    let end = i;
    while (end < 8 && groups[end] === 0) end++;
    if (end - i > bestLength) {
      bestStart = i;
      bestLength = end - i;
    }
    i = end;
  }

  const hex = groups.map((group) => group.toString(16));
  if (bestLength < 2) {
    return hex.join(':');
  }
  const head = hex.slice(0, bestStart).join(':');
  const tail = hex.slice(bestStart + bestLength).join(':');
  return `${head}::${tail}`;
}

function expandGroups(part: string): number[] {
  if (part === '') return [];
  const groups: number[] = [];
  for (const token of part.split(':')) {
    if (token.includes('.')) {
      const [a = 0, b = 0, c = 0, d = 0] = token.split('.').map((octet) => Number.parseInt(octet, 10));
      groups.push((a << 8) | b, (c << 8) | d);
    } else {
      groups.push(Number.parseInt(token, 16));
    }
  }
  return groups;
}

// Input must already have passed isIPv6.
export function ipv6TextToBytes(address: string): Uint8Array {
  const doubleColon = address.indexOf('::');
  const head = expandGroups(doubleColon === -1 ? address : address.slice(0, doubleColon));
  const tail = doubleColon === -1 ? [] : expandGroups(address.slice(doubleColon + 2));
  const groups = [...head, ...new Array<number>(8 - head.length - tail.length).fill(0), ...tail];

  const bytes = new Uint8Array(16);
  groups.forEach((group, i) => {
    bytes[i * 2] = group >>> 8;
    bytes[i * 2 + 1] = group & 0xff;
  });
  return bytes;
}

/**
 * Validate a caller-supplied address and bring it to the same text form the
 * frame decoder produces. Throws InvalidAddressError.
 */
export function parseTargetAddress(raw: string): TargetAddress {
  const candidate = raw.trim();
  if (isIPv4(candidate)) {
    return { family: 4, text: candidate };
  }
  // Zoned addresses (fe80::1%eth0) name a link, not a host on the wire.
  if (isIPv6(candidate) && !candidate.includes('%')) {
    const text = formatIPv6(ipv6TextToBytes(candidate), 0);
    return { family: text.includes(':') ? 6 : 4, text };
  }
  throw new InvalidAddressError(raw);
}
