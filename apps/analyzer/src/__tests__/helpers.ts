import { ipv6TextToBytes } from '../shared/utils/ip-address.js';
import type { Frame, FrameSource } from '../modules/capture/index.js';

export const ETHERNET_HEADER_SIZE = 14;

/**
 * Concatenate byte chunks into one Uint8Array.
 */
export function concatBytes(chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

function ipv4Bytes(address: string): number[] {
  return address.split('.').map((octet) => Number.parseInt(octet, 10));
}

/**
 * Minimal IPv4 header (no options) padded with zeros to `totalLength`.
 */
export function ipv4Packet(source: string, destination: string, totalLength = 40): Uint8Array {
  const packet = new Uint8Array(Math.max(totalLength, 20));
  packet[0] = 0x45;
  packet[2] = (packet.length >>> 8) & 0xff;
  packet[3] = packet.length & 0xff;
  packet[8] = 64;
  packet[9] = 6;
  packet.set(ipv4Bytes(source), 12);
  packet.set(ipv4Bytes(destination), 16);
  return packet;
}

export function ipv6Packet(source: string, destination: string, totalLength = 60): Uint8Array {
  const packet = new Uint8Array(Math.max(totalLength, 40));
  packet[0] = 0x60;
  const payloadLength = packet.length - 40;
  packet[4] = (payloadLength >>> 8) & 0xff;
  packet[5] = payloadLength & 0xff;
  packet[6] = 17;
  packet[7] = 64;
  packet.set(ipv6TextToBytes(source), 8);
  packet.set(ipv6TextToBytes(destination), 24);
  return packet;
}

export function ethernetFrame(etherType: number, payload: Uint8Array): Uint8Array {
  const header = new Uint8Array(ETHERNET_HEADER_SIZE);
  header.set([0x00, 0x11, 0x22, 0x33, 0x44, 0x66], 0);
  header.set([0x00, 0x11, 0x22, 0x33, 0x44, 0x55], 6);
  header[12] = (etherType >>> 8) & 0xff;
  header[13] = etherType & 0xff;
  return concatBytes([header, payload]);
}

/** Ethernet + IPv4 frame of exactly `frameLength` bytes. */
export function ipv4EthernetFrame(source: string, destination: string, frameLength = 80): Uint8Array {
  return ethernetFrame(0x0800, ipv4Packet(source, destination, frameLength - ETHERNET_HEADER_SIZE));
}

/** Ethernet + IPv6 frame of exactly `frameLength` bytes. */
export function ipv6EthernetFrame(source: string, destination: string, frameLength = 80): Uint8Array {
  return ethernetFrame(0x86dd, ipv6Packet(source, destination, frameLength - ETHERNET_HEADER_SIZE));
}

/** Ethernet ARP request, 42 bytes. */
export function arpFrame(): Uint8Array {
  const arp = new Uint8Array(28);
  arp.set([0x00, 0x01, 0x08, 0x00, 0x06, 0x04, 0x00, 0x01], 0);
  arp.set([192, 168, 1, 1], 14);
  arp.set([192, 168, 1, 5], 24);
  return ethernetFrame(0x0806, arp);
}

/**
 * Drain a frame source into an array.
 */
export function collectFrames(frames: FrameSource): Frame[] {
  const out: Frame[] = [];
  for (let next = frames.next(); !next.done; next = frames.next()) {
    out.push(next.value);
  }
  return out;
}

export interface PcapRecordInput {
  seconds: number;
  /** Microseconds, or nanoseconds when the file uses nanosecond magic. */
  fraction?: number;
  data: Uint8Array;
  originalLength?: number;
}

export interface PcapOptions {
  littleEndian?: boolean;
  nanosecond?: boolean;
  linkType?: number;
  snapLength?: number;
  versionMajor?: number;
}

/**
 * Write a classic pcap file in memory.
 */
export function buildPcap(records: PcapRecordInput[], options: PcapOptions = {}): Uint8Array {
  const {
    littleEndian = true,
    nanosecond = false,
    linkType = 1,
    snapLength = 65535,
    versionMajor = 2,
  } = options;

  const header = new Uint8Array(24);
  const hv = new DataView(header.buffer);
  hv.setUint32(0, nanosecond ? 0xa1b23c4d : 0xa1b2c3d4, littleEndian);
  hv.setUint16(4, versionMajor, littleEndian);
  hv.setUint16(6, 4, littleEndian);
  hv.setUint32(16, snapLength, littleEndian);
  hv.setUint32(20, linkType, littleEndian);

  const chunks: Uint8Array[] = [header];
  for (const record of records) {
    const recordHeader = new Uint8Array(16);
    const rv = new DataView(recordHeader.buffer);
    rv.setUint32(0, record.seconds, littleEndian);
    rv.setUint32(4, record.fraction ?? 0, littleEndian);
    rv.setUint32(8, record.data.length, littleEndian);
    rv.setUint32(12, record.originalLength ?? record.data.length, littleEndian);
    chunks.push(recordHeader, record.data);
  }
  return concatBytes(chunks);
}

export interface PcapngInterfaceInput {
  linkType?: number;
  snapLength?: number;
  /** Raw if_tsresol byte. */
  tsresol?: number;
  /** if_tsoffset, in seconds. */
  tsoffset?: bigint;
}

export interface PcapngPacketInput {
  /** Timestamp in interface units (microseconds by default). */
  timestamp: bigint;
  data: Uint8Array;
  interfaceId?: number;
  originalLength?: number;
}

export interface PcapngOptions {
  littleEndian?: boolean;
  interfaces?: PcapngInterfaceInput[];
  /** Extra raw blocks written after the interfaces, before the packets. */
  extraBlocks?: Uint8Array[];
}

const pad4 = (length: number): number => Math.ceil(length / 4) * 4;

export function pcapngBlock(type: number, body: Uint8Array, littleEndian = true): Uint8Array {
  const totalLength = 12 + pad4(body.length);
  const block = new Uint8Array(totalLength);
  const dv = new DataView(block.buffer);
  dv.setUint32(0, type, littleEndian);
  dv.setUint32(4, totalLength, littleEndian);
  block.set(body, 8);
  dv.setUint32(totalLength - 4, totalLength, littleEndian);
  return block;
}

export function sectionHeaderBlock(littleEndian = true): Uint8Array {
  const body = new Uint8Array(16);
  const dv = new DataView(body.buffer);
  dv.setUint32(0, 0x1a2b3c4d, littleEndian);
  dv.setUint16(4, 1, littleEndian);
  dv.setUint16(6, 0, littleEndian);
  dv.setBigInt64(8, -1n, littleEndian);
  return pcapngBlock(0x0a0d0d0a, body, littleEndian);
}

export function interfaceDescriptionBlock(iface: PcapngInterfaceInput, littleEndian = true): Uint8Array {
  const options: Uint8Array[] = [];
  if (iface.tsresol !== undefined) {
    const option = new Uint8Array(8);
    const dv = new DataView(option.buffer);
    dv.setUint16(0, 9, littleEndian);
    dv.setUint16(2, 1, littleEndian);
    dv.setUint8(4, iface.tsresol);
    options.push(option);
  }
  if (iface.tsoffset !== undefined) {
    const option = new Uint8Array(12);
    const dv = new DataView(option.buffer);
    dv.setUint16(0, 14, littleEndian);
    dv.setUint16(2, 8, littleEndian);
    dv.setBigInt64(4, iface.tsoffset, littleEndian);
    options.push(option);
  }
  if (options.length > 0) {
    // opt_endofopt
    options.push(new Uint8Array(4));
  }

  const header = new Uint8Array(8);
  const dv = new DataView(header.buffer);
  dv.setUint16(0, iface.linkType ?? 1, littleEndian);
  dv.setUint32(4, iface.snapLength ?? 0, littleEndian);
  return pcapngBlock(0x00000001, concatBytes([header, ...options]), littleEndian);
}

export function enhancedPacketBlock(packet: PcapngPacketInput, littleEndian = true): Uint8Array {
  const body = new Uint8Array(20 + pad4(packet.data.length));
  const dv = new DataView(body.buffer);
  dv.setUint32(0, packet.interfaceId ?? 0, littleEndian);
  dv.setUint32(4, Number(packet.timestamp >> 32n), littleEndian);
  dv.setUint32(8, Number(packet.timestamp & 0xffffffffn), littleEndian);
  dv.setUint32(12, packet.data.length, littleEndian);
  dv.setUint32(16, packet.originalLength ?? packet.data.length, littleEndian);
  body.set(packet.data, 20);
  return pcapngBlock(0x00000006, body, littleEndian);
}

export function simplePacketBlock(data: Uint8Array, originalLength = data.length, littleEndian = true): Uint8Array {
  const body = new Uint8Array(4 + pad4(data.length));
  new DataView(body.buffer).setUint32(0, originalLength, littleEndian);
  body.set(data, 4);
  return pcapngBlock(0x00000003, body, littleEndian);
}

/**
 * Write a single-section pcapng file in memory.
 */
export function buildPcapng(packets: PcapngPacketInput[], options: PcapngOptions = {}): Uint8Array {
  const { littleEndian = true, interfaces = [{ linkType: 1 }], extraBlocks = [] } = options;
  return concatBytes([
    sectionHeaderBlock(littleEndian),
    ...interfaces.map((iface) => interfaceDescriptionBlock(iface, littleEndian)),
    ...extraBlocks,
    ...packets.map((packet) => enhancedPacketBlock(packet, littleEndian)),
  ]);
}

export interface MultipartFileInput {
  fieldname: string;
  filename: string;
  content: Uint8Array;
}

/**
 * Encode a multipart/form-data body for app.inject.
 */
export function buildMultipartBody(
  fields: Record<string, string>,
  files: MultipartFileInput[] = [],
): { payload: Buffer; headers: Record<string, string> } {
  const boundary = '----pcap-lens-test-boundary';
  const chunks: Buffer[] = [];
  for (const [name, value] of Object.entries(fields)) {
    chunks.push(
      Buffer.from(`--${boundary}\r\nContent-Disposition: form-data; name="${name}"\r\n\r\n${value}\r\n`),
    );
  }
  for (const file of files) {
    chunks.push(
      Buffer.from(
        `--${boundary}\r\nContent-Disposition: form-data; name="${file.fieldname}"; filename="${file.filename}"\r\n` +
          'Content-Type: application/vnd.tcpdump.pcap\r\n\r\n',
      ),
      Buffer.from(file.content),
      Buffer.from('\r\n'),
    );
  }
  chunks.push(Buffer.from(`--${boundary}--\r\n`));
  return {
    payload: Buffer.concat(chunks),
    headers: { 'content-type': `multipart/form-data; boundary=${boundary}` },
  };
}
