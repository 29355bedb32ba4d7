import { formatIPv4, formatIPv6, type IPFamily } from '../../shared/utils/ip-address.js';
import { LinkType, type Frame } from './capture.types.js';

export interface DecodedAddresses {
  family: IPFamily;
  source: string;
  destination: string;
}

const ETHERTYPE_IPV4 = 0x0800;
const ETHERTYPE_IPV6 = 0x86dd;
const ETHERTYPE_VLAN = 0x8100;
const ETHERTYPE_QINQ = 0x88a8;
const ETHERTYPE_QINQ_LEGACY = 0x9100;
// Values at or below this are 802.3 length fields, not EtherTypes.
const ETHERNET_MAX_LENGTH_FIELD = 0x05dc;

const ETHERNET_HEADER_SIZE = 14;
const VLAN_TAG_SIZE = 4;
const LOOPBACK_HEADER_SIZE = 4;
const SLL_HEADER_SIZE = 16;
const SLL2_HEADER_SIZE = 20;
const IPV4_MIN_HEADER_SIZE = 20;
const IPV6_HEADER_SIZE = 40;

const AF_INET = 2;
// AF_INET6 differs per OS: Linux, the BSDs, FreeBSD/DragonFly and Darwin.
const AF_INET6_VALUES = new Set([10, 24, 28, 30]);

type NetworkHint = 'ipv4' | 'ipv6' | 'auto';

const readUint16be = (bytes: Uint8Array, offset: number): number | null => {
  if (offset + 2 > bytes.length) return null;
  return ((bytes[offset] ?? 0) << 8) | (bytes[offset + 1] ?? 0);
};

const readUint32 = (bytes: Uint8Array, offset: number, littleEndian: boolean): number | null => {
  if (offset + 4 > bytes.length) return null;
  return new DataView(bytes.buffer, bytes.byteOffset + offset, 4).getUint32(0, littleEndian);
};

const decodeIPv4 = (bytes: Uint8Array, offset: number): DecodedAddresses | null => {
  if (offset + IPV4_MIN_HEADER_SIZE > bytes.length) return null;
  const verIhl = bytes[offset] ?? 0;
  if (verIhl >>> 4 !== 4 || (verIhl & 0x0f) < 5) return null;
  return {
    family: 4,
    source: formatIPv4(bytes, offset + 12),
    destination: formatIPv4(bytes, offset + 16),
  };
};

const decodeIPv6 = (bytes: Uint8Array, offset: number): DecodedAddresses | null => {
  if (offset + IPV6_HEADER_SIZE > bytes.length) return null;
  if ((bytes[offset] ?? 0) >>> 4 !== 6) return null;
  return {
    family: 6,
    source: formatIPv6(bytes, offset + 8),
    destination: formatIPv6(bytes, offset + 24),
  };
};

const decodeNetwork = (bytes: Uint8Array, offset: number, hint: NetworkHint): DecodedAddresses | null => {
  if (hint === 'ipv4') return decodeIPv4(bytes, offset);
  if (hint === 'ipv6') return decodeIPv6(bytes, offset);
  const version = (bytes[offset] ?? 0) >>> 4;
  if (version === 4) return decodeIPv4(bytes, offset);
  if (version === 6) return decodeIPv6(bytes, offset);
  return null;
};

const hintFromEtherType = (etherType: number): NetworkHint | null => {
  if (etherType === ETHERTYPE_IPV4) return 'ipv4';
  if (etherType === ETHERTYPE_IPV6) return 'ipv6';
  return null;
};

const hintFromAddressFamily = (family: number): NetworkHint | null => {
  if (family === AF_INET) return 'ipv4';
  if (AF_INET6_VALUES.has(family)) return 'ipv6';
  return null;
};

const decodeEthernet = (bytes: Uint8Array): DecodedAddresses | null => {
  let etherType = readUint16be(bytes, 12);
  let payloadOffset = ETHERNET_HEADER_SIZE;
  while (
    etherType === ETHERTYPE_VLAN ||
    etherType === ETHERTYPE_QINQ ||
    etherType === ETHERTYPE_QINQ_LEGACY
  ) {
    etherType = readUint16be(bytes, payloadOffset + 2);
    payloadOffset += VLAN_TAG_SIZE;
  }
  if (etherType === null || etherType <= ETHERNET_MAX_LENGTH_FIELD) return null;
  const hint = hintFromEtherType(etherType);
  return hint ? decodeNetwork(bytes, payloadOffset, hint) : null;
};

const decodeLoopback = (bytes: Uint8Array, networkOrder: boolean): DecodedAddresses | null => {
  let family = readUint32(bytes, 0, !networkOrder);
  if (family === null) return null;
  // DLT_NULL is written in the capturing host's byte order.
  if (!networkOrder && family > 0xffff) {
    family = readUint32(bytes, 0, false);
  }
  const hint = family === null ? null : hintFromAddressFamily(family);
  return hint ? decodeNetwork(bytes, LOOPBACK_HEADER_SIZE, hint) : null;
};

const decodeCooked = (bytes: Uint8Array, protocolOffset: number, headerSize: number): DecodedAddresses | null => {
  const protocol = readUint16be(bytes, protocolOffset);
  if (protocol === null) return null;
  const hint = hintFromEtherType(protocol);
  return hint ? decodeNetwork(bytes, headerSize, hint) : null;
};

/**
 * Pull the network-layer source and destination out of one frame.
 * Returns null for anything that is not IPv4 or IPv6 (ARP, unknown
 * EtherTypes or link types, truncated headers).
 */
export function decodeFrame(frame: Pick<Frame, 'linkType' | 'data'>): DecodedAddresses | null {
  const bytes = frame.data;
  switch (frame.linkType) {
    case LinkType.ETHERNET:
      return decodeEthernet(bytes);
    case LinkType.NULL:
      return decodeLoopback(bytes, false);
    case LinkType.LOOP:
      return decodeLoopback(bytes, true);
    case LinkType.RAW:
    case LinkType.RAW_BSD_A:
    case LinkType.RAW_BSD_B:
      return decodeNetwork(bytes, 0, 'auto');
    case LinkType.IPV4:
      return decodeNetwork(bytes, 0, 'ipv4');
    case LinkType.IPV6:
      return decodeNetwork(bytes, 0, 'ipv6');
    case LinkType.LINUX_SLL:
      return decodeCooked(bytes, 14, SLL_HEADER_SIZE);
    case LinkType.LINUX_SLL2:
      return decodeCooked(bytes, 0, SLL2_HEADER_SIZE);
    default:
      return null;
  }
}
