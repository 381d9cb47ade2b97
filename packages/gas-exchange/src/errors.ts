// ---------------------------------------------------------------------------
// Gas-exchange error kinds
// ---------------------------------------------------------------------------

export type GasExchangeErrorKind =
  | 'InvalidDimension'
  | 'NegativeVolume'
  | 'InvalidMeasurement'
  | 'DegenerateInterval'
  | 'AcquisitionFailure'
  | 'SourceUnavailable';

/**
 * Error raised by the gas-exchange core.
 *
 * InvalidDimension and NegativeVolume are configuration errors and abort
 * startup. InvalidMeasurement and DegenerateInterval are recorded per sample.
 * AcquisitionFailure is absorbed per tick. SourceUnavailable ends a session.
 */
export class GasExchangeError extends Error {
  readonly kind: GasExchangeErrorKind;

  constructor(kind: GasExchangeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GasExchangeError';
    this.kind = kind;
  }
}

export function isGasExchangeError<K extends GasExchangeErrorKind = GasExchangeErrorKind>(
  err: unknown,
  kind?: K,
): err is GasExchangeError & { readonly kind: K } {
  return err instanceof GasExchangeError && (kind === undefined || err.kind === kind);
}
