import type { ErrorResponse } from "./models/product.js";

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }

  toResponse(): ErrorResponse {
    return { code: this.status, message: this.message };
  }
}
