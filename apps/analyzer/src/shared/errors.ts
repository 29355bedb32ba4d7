export class AnalysisError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AnalysisError';
  }
}

/**
 * The target address given by the caller is not an IPv4 or IPv6 address.
 * Raised before any capture bytes are read.
 */
export class InvalidAddressError extends AnalysisError {
  readonly address: string;

  constructor(address: string) {
    super(`invalid target IP: ${address}`);
    this.name = 'InvalidAddressError';
    this.address = address;
  }
}

/**
 * The capture container is malformed or truncated.
 * `offset` is the byte position where parsing stopped, when known.
 */
export class FormatError extends AnalysisError {
  readonly offset: number | null;

  constructor(message: string, offset: number | null = null) {
    super(offset === null ? message : `${message} (at byte ${offset})`);
    this.name = 'FormatError';
    this.offset = offset;
  }
}
