import { detectCaptureFormat } from './format.detector.js';
import { openPcap } from './pcap.reader.js';
import { openPcapng } from './pcapng.reader.js';
import type { CaptureFormat, FrameSource } from './capture.types.js';

export type {
  CaptureFormat,
  Frame,
  FrameSource,
  PcapFileHeader,
  PcapngInterface,
} from './capture.types.js';
export { LinkType } from './capture.types.js';
export { detectCaptureFormat } from './format.detector.js';
export { openPcap, readPcapHeader } from './pcap.reader.js';
export { openPcapng } from './pcapng.reader.js';
export { decodeFrame, type DecodedAddresses } from './frame.decoder.js';

export function openCapture(capture: Uint8Array): { format: CaptureFormat; frames: FrameSource } {
  const format = detectCaptureFormat(capture);
  const { frames } = format === 'pcapng' ? openPcapng(capture) : openPcap(capture);
  return { format, frames };
}
