import type { ContentfulStatusCode } from 'hono/utils/http-status'
import { isGasExchangeError, type GasExchangeErrorKind } from '@lunchbox/gas-exchange'

const STATUS_BY_KIND: Record<GasExchangeErrorKind, ContentfulStatusCode> = {
  InvalidDimension: 400,
  NegativeVolume: 400,
  InvalidMeasurement: 422,
  DegenerateInterval: 422,
  AcquisitionFailure: 502,
  SourceUnavailable: 503,
}

export interface ErrorReply {
  status: ContentfulStatusCode
  body: { error: string; kind?: GasExchangeErrorKind }
}

/** Map a thrown value to an HTTP status and JSON body. */
export function toErrorReply(err: unknown): ErrorReply {
  if (isGasExchangeError(err)) {
    return { status: STATUS_BY_KIND[err.kind], body: { error: err.message, kind: err.kind } }
  }
  return { status: 500, body: { error: 'Internal server error.' } }
}
