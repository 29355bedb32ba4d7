import { FormatError } from '../../shared/errors.js';
import type { CaptureFormat } from './capture.types.js';

const PCAPNG_MAGIC = [0x0a, 0x0d, 0x0d, 0x0a] as const;

/**
 * Only the section header magic is checked. Everything else is handed to
 * the classic reader, which sorts out byte order from its own magic.
 */
export function detectCaptureFormat(capture: Uint8Array): CaptureFormat {
  if (capture.length < PCAPNG_MAGIC.length) {
    throw new FormatError(`failed to read magic bytes: need 4 bytes, got ${capture.length}`, 0);
  }
  const isPcapng = PCAPNG_MAGIC.every((byte, i) => capture[i] === byte);
  return isPcapng ? 'pcapng' : 'pcap';
}
