export class StoreError extends Error {
  constructor(
    message: string,
    public readonly query: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StoreError';
  }
}
