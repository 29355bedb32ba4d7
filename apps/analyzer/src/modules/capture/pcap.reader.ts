import { FormatError } from '../../shared/errors.js';
import type { Frame, FrameSource, PcapFileHeader } from './capture.types.js';

const FILE_HEADER_SIZE = 24;
const RECORD_HEADER_SIZE = 16;

const PCAP_MAGIC_USEC = 0xa1b2c3d4;
const PCAP_MAGIC_NSEC = 0xa1b23c4d;
const PCAP_MAGIC_USEC_SWAPPED = 0xd4c3b2a1;
const PCAP_MAGIC_NSEC_SWAPPED = 0x4d3cb2a1;

const SUPPORTED_VERSION_MAJOR = 2;

const detectPcapMagic = (
  dv: DataView,
): { littleEndian: boolean; nanosecondResolution: boolean } | null => {
  const magic = dv.getUint32(0, false);
  if (magic === PCAP_MAGIC_USEC) return { littleEndian: false, nanosecondResolution: false };
  if (magic === PCAP_MAGIC_NSEC) return { littleEndian: false, nanosecondResolution: true };
  if (magic === PCAP_MAGIC_USEC_SWAPPED) return { littleEndian: true, nanosecondResolution: false };
  if (magic === PCAP_MAGIC_NSEC_SWAPPED) return { littleEndian: true, nanosecondResolution: true };
  return null;
};

export function readPcapHeader(capture: Uint8Array): PcapFileHeader {
  if (capture.length < FILE_HEADER_SIZE) {
    throw new FormatError(`pcap file header truncated: need ${FILE_HEADER_SIZE} bytes, got ${capture.length}`, 0);
  }
  const dv = new DataView(capture.buffer, capture.byteOffset, capture.byteLength);
  const magic = detectPcapMagic(dv);
  if (!magic) {
    throw new FormatError(`unknown pcap magic 0x${dv.getUint32(0, false).toString(16).padStart(8, '0')}`, 0);
  }

  const { littleEndian } = magic;
  const versionMajor = dv.getUint16(4, littleEndian);
  if (versionMajor !== SUPPORTED_VERSION_MAJOR) {
    throw new FormatError(`unsupported pcap version ${versionMajor}`, 4);
  }

  return {
    littleEndian,
    nanosecondResolution: magic.nanosecondResolution,
    versionMajor,
    versionMinor: dv.getUint16(6, littleEndian),
    snapshotLength: dv.getUint32(16, littleEndian),
    // Upper bits carry FCS length flags.
    linkType: dv.getUint32(20, littleEndian) & 0xffff,
  };
}

function* readPcapRecords(capture: Uint8Array, header: PcapFileHeader): Generator<Frame, void, undefined> {
  const dv = new DataView(capture.buffer, capture.byteOffset, capture.byteLength);
  const { littleEndian, snapshotLength, linkType } = header;
  const fractionToNs = header.nanosecondResolution ? 1n : 1000n;
  let offset = FILE_HEADER_SIZE;

  while (offset < capture.length) {
    if (offset + RECORD_HEADER_SIZE > capture.length) {
      throw new FormatError('pcap record header truncated', offset);
    }
    const seconds = dv.getUint32(offset, littleEndian);
    const fraction = dv.getUint32(offset + 4, littleEndian);
    const capturedLength = dv.getUint32(offset + 8, littleEndian);
    const originalLength = dv.getUint32(offset + 12, littleEndian);

    if (capturedLength > originalLength) {
      throw new FormatError(
        `capture length exceeds original packet length: ${capturedLength} > ${originalLength}`,
        offset,
      );
    }
    if (snapshotLength > 0 && capturedLength > snapshotLength) {
      throw new FormatError(`capture length exceeds snap length: ${capturedLength} > ${snapshotLength}`, offset);
    }

    const dataStart = offset + RECORD_HEADER_SIZE;
    if (dataStart + capturedLength > capture.length) {
      throw new FormatError(
        `pcap record data truncated: need ${capturedLength} bytes, got ${capture.length - dataStart}`,
        dataStart,
      );
    }

    yield {
      timestampNs: BigInt(seconds) * 1_000_000_000n + BigInt(fraction) * fractionToNs,
      capturedLength,
      originalLength,
      linkType,
      data: capture.subarray(dataStart, dataStart + capturedLength),
    };
    offset = dataStart + capturedLength;
  }
}

/**
 * Parse the classic file header up front and return a lazy record reader.
 * Header problems throw here; record problems throw from `next()`.
 */
export function openPcap(capture: Uint8Array): { header: PcapFileHeader; frames: FrameSource } {
  const header = readPcapHeader(capture);
  return { header, frames: readPcapRecords(capture, header) };
}
