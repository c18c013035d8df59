/** Raised when the underlying stream fails or a closed reader is used */
export class LineReadError extends Error {
  constructor(
    message: string,
    public readonly line?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'LineReadError';
  }
}
