export abstract class BaseError extends Error {
  constructor(
    public readonly code: string,
    public readonly status: number,
    message?: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}
