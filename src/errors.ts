export type ConversionErrorCode =
  | 'FileNotFound'
  | 'UnsupportedFormat'
  | 'InvalidDimensions'
  | 'DecodeFailed'
  | 'IoError'
  | 'UnknownMode';

export class ConversionError extends Error {
  readonly code: ConversionErrorCode;

  constructor(code: ConversionErrorCode, message: string) {
    super(message);
    this.name = 'ConversionError';
    this.code = code;
  }
}
