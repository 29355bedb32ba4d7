export type CaptureFormat = 'pcap' | 'pcapng';

// Link-layer header types (tcpdump.org/linktypes)
export const LinkType = {
  NULL: 0,
  ETHERNET: 1,
  RAW_BSD_A: 12,
  RAW_BSD_B: 14,
  RAW: 101,
  LOOP: 108,
  LINUX_SLL: 113,
  IPV4: 228,
  IPV6: 229,
  LINUX_SLL2: 276,
} as const;

/**
 * One record pulled out of a capture container.
 * `data` is a view into the caller's buffer, never a copy.
 */
export interface Frame {
  /** Capture time in nanoseconds since the Unix epoch. */
  timestampNs: bigint;
  capturedLength: number;
  originalLength: number;
  linkType: number;
  data: Uint8Array;
}

export interface PcapFileHeader {
  littleEndian: boolean;
  nanosecondResolution: boolean;
  versionMajor: number;
  versionMinor: number;
  snapshotLength: number;
  linkType: number;
}

export interface PcapngInterface {
  linkType: number;
  snapshotLength: number;
  /** Timestamp units per second, from if_tsresol. */
  unitsPerSecond: bigint;
  /** Seconds added to every timestamp, from if_tsoffset. */
  offsetSeconds: bigint;
}

/** Lazy, finite and not restartable. */
export type FrameSource = Iterator<Frame, void, undefined>;
