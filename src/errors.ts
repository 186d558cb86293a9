export type ScanErrorCode =
  | 'InvalidPortToken'
  | 'InvalidRange'
  | 'PortOutOfBounds'
  | 'NoTargets'
  | 'InvalidAddress'
  | 'InvalidConfig'

/**
 * Input or setup failure. Always raised before any socket is opened.
 */
export class ScanError extends Error {
  readonly code: ScanErrorCode
  readonly token?: string

  constructor(code: ScanErrorCode, message: string, token?: string) {
    super(message)
    this.name = 'ScanError'
    this.code = code
    this.token = token
  }
}

export function isScanError(value: unknown): value is ScanError {
  return value instanceof ScanError
}
