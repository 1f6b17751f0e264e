export abstract class BaseError extends Error {
  constructor(
    public code: string,
    public status: number,
    message?: string,
    public data?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}
