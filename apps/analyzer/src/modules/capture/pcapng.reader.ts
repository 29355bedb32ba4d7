import { FormatError } from '../../shared/errors.js';
import { LinkType } from './capture.types.js';
import type { Frame, FrameSource, PcapngInterface } from './capture.types.js';

const BLOCK_SECTION_HEADER = 0x0a0d0d0a;
const BLOCK_INTERFACE_DESCRIPTION = 0x00000001;
const BLOCK_PACKET = 0x00000002;
const BLOCK_SIMPLE_PACKET = 0x00000003;
const BLOCK_ENHANCED_PACKET = 0x00000006;

const BYTE_ORDER_MAGIC = 0x1a2b3c4d;
const BYTE_ORDER_MAGIC_SWAPPED = 0x4d3c2b1a;

const MIN_BLOCK_SIZE = 12;
const SUPPORTED_VERSION_MAJOR = 1;

const OPT_END = 0;
const OPT_IF_TSRESOL = 9;
const OPT_IF_TSOFFSET = 14;

const NS_PER_SECOND = 1_000_000_000n;
const DEFAULT_UNITS_PER_SECOND = 1_000_000n;

interface Block {
  type: number;
  start: number;
  bodyStart: number;
  bodyEnd: number;
}

const parseTsResol = (value: number): bigint => {
  const exponent = BigInt(value & 0x7f);
  return (value & 0x80) === 0 ? 10n ** exponent : 2n ** exponent;
};

const readInterface = (dv: DataView, block: Block, littleEndian: boolean): PcapngInterface => {
  if (block.bodyEnd - block.bodyStart < 8) {
    throw new FormatError('interface description block too short', block.start);
  }
  const iface: PcapngInterface = {
    linkType: dv.getUint16(block.bodyStart, littleEndian),
    snapshotLength: dv.getUint32(block.bodyStart + 4, littleEndian),
    unitsPerSecond: DEFAULT_UNITS_PER_SECOND,
    offsetSeconds: 0n,
  };

  let cursor = block.bodyStart + 8;
  while (cursor + 4 <= block.bodyEnd) {
    const code = dv.getUint16(cursor, littleEndian);
    const length = dv.getUint16(cursor + 2, littleEndian);
    if (code === OPT_END) break;
    const valueStart = cursor + 4;
    if (valueStart + length > block.bodyEnd) {
      throw new FormatError(`interface option ${code} overruns its block`, cursor);
    }
    if (code === OPT_IF_TSRESOL && length >= 1) {
      const unitsPerSecond = parseTsResol(dv.getUint8(valueStart));
      if (unitsPerSecond > 0n) iface.unitsPerSecond = unitsPerSecond;
    } else if (code === OPT_IF_TSOFFSET && length >= 8) {
      iface.offsetSeconds = dv.getBigInt64(valueStart, littleEndian);
    }
    cursor = valueStart + Math.ceil(length / 4) * 4;
  }
  return iface;
};

const toNanoseconds = (iface: PcapngInterface, high: number, low: number): bigint => {
  const units = (BigInt(high) << 32n) | BigInt(low);
  return (units * NS_PER_SECOND) / iface.unitsPerSecond + iface.offsetSeconds * NS_PER_SECOND;
};

function* readPcapngBlocks(capture: Uint8Array): Generator<Frame, void, undefined> {
  const dv = new DataView(capture.buffer, capture.byteOffset, capture.byteLength);
  let littleEndian = true;
  let inSection = false;
  let interfaces: PcapngInterface[] = [];
  let offset = 0;

  const lookupInterface = (id: number, blockStart: number): PcapngInterface => {
    const iface = interfaces[id];
    if (!iface) {
      throw new FormatError(`packet refers to unknown interface ${id}`, blockStart);
    }
    return iface;
  };

  const packetFrame = (
    iface: PcapngInterface,
    block: Block,
    headerSize: number,
    tsHigh: number,
    tsLow: number,
    capturedLength: number,
    originalLength: number,
  ): Frame => {
    const dataStart = block.bodyStart + headerSize;
    if (dataStart + capturedLength > block.bodyEnd) {
      throw new FormatError(`packet data overruns its block: captured length ${capturedLength}`, block.start);
    }
    return {
      timestampNs: toNanoseconds(iface, tsHigh, tsLow),
      capturedLength,
      originalLength,
      // Interface link types are not consulted; frames decode as Ethernet.
      linkType: LinkType.ETHERNET,
      data: capture.subarray(dataStart, dataStart + capturedLength),
    };
  };

  while (offset < capture.length) {
    if (offset + MIN_BLOCK_SIZE > capture.length) {
      throw new FormatError('pcapng block header truncated', offset);
    }

    // The section header type reads the same in either byte order.
    if (dv.getUint32(offset, false) === BLOCK_SECTION_HEADER) {
      const bom = dv.getUint32(offset + 8, false);
      if (bom === BYTE_ORDER_MAGIC) littleEndian = false;
      else if (bom === BYTE_ORDER_MAGIC_SWAPPED) littleEndian = true;
      else throw new FormatError(`unknown pcapng byte-order magic 0x${bom.toString(16)}`, offset + 8);
    } else if (!inSection) {
      throw new FormatError('pcapng capture must start with a section header block', offset);
    }

    const type = dv.getUint32(offset, littleEndian);
    const totalLength = dv.getUint32(offset + 4, littleEndian);
    if (totalLength < MIN_BLOCK_SIZE || totalLength % 4 !== 0) {
      throw new FormatError(`invalid pcapng block length ${totalLength}`, offset);
    }
    if (offset + totalLength > capture.length) {
      throw new FormatError(
        `pcapng block truncated: need ${totalLength} bytes, got ${capture.length - offset}`,
        offset,
      );
    }
    const trailer = dv.getUint32(offset + totalLength - 4, littleEndian);
    if (trailer !== totalLength) {
      throw new FormatError(`pcapng block length mismatch: ${totalLength} != ${trailer}`, offset);
    }

    const block: Block = { type, start: offset, bodyStart: offset + 8, bodyEnd: offset + totalLength - 4 };
    const bodySize = block.bodyEnd - block.bodyStart;

    switch (type) {
      case BLOCK_SECTION_HEADER: {
        if (bodySize < 16) {
          throw new FormatError('section header block too short', offset);
        }
        const versionMajor = dv.getUint16(block.bodyStart + 4, littleEndian);
        if (versionMajor !== SUPPORTED_VERSION_MAJOR) {
          throw new FormatError(`unsupported pcapng version ${versionMajor}`, block.bodyStart + 4);
        }
        inSection = true;
        interfaces = [];
        break;
      }
      case BLOCK_INTERFACE_DESCRIPTION:
        interfaces.push(readInterface(dv, block, littleEndian));
        break;
      case BLOCK_ENHANCED_PACKET: {
        if (bodySize < 20) {
          throw new FormatError('enhanced packet block too short', offset);
        }
        const iface = lookupInterface(dv.getUint32(block.bodyStart, littleEndian), offset);
        yield packetFrame(
          iface,
          block,
          20,
          dv.getUint32(block.bodyStart + 4, littleEndian),
          dv.getUint32(block.bodyStart + 8, littleEndian),
          dv.getUint32(block.bodyStart + 12, littleEndian),
          dv.getUint32(block.bodyStart + 16, littleEndian),
        );
        break;
      }
      case BLOCK_PACKET: {
        if (bodySize < 20) {
          throw new FormatError('packet block too short', offset);
        }
        const iface = lookupInterface(dv.getUint16(block.bodyStart, littleEndian), offset);
        yield packetFrame(
          iface,
          block,
          20,
          dv.getUint32(block.bodyStart + 4, littleEndian),
          dv.getUint32(block.bodyStart + 8, littleEndian),
          dv.getUint32(block.bodyStart + 12, littleEndian),
          dv.getUint32(block.bodyStart + 16, littleEndian),
        );
        break;
      }
      case BLOCK_SIMPLE_PACKET: {
        if (bodySize < 4) {
          throw new FormatError('simple packet block too short', offset);
        }
        const iface = lookupInterface(0, offset);
        const originalLength = dv.getUint32(block.bodyStart, littleEndian);
        let capturedLength = Math.min(originalLength, bodySize - 4);
        if (iface.snapshotLength > 0) capturedLength = Math.min(capturedLength, iface.snapshotLength);
        // Simple packets carry no timestamp.
        yield packetFrame(iface, block, 4, 0, 0, capturedLength, originalLength);
        break;
      }
      default:
        // Statistics, name resolution, custom and unknown blocks.
        break;
    }

    offset += totalLength;
  }
}

export function openPcapng(capture: Uint8Array): { frames: FrameSource } {
  return { frames: readPcapngBlocks(capture) };
}
