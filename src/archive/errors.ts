export class AuthenticationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthenticationError";
  }
}

export class DigestUrlError extends Error {
  constructor(url: string) {
    super(`URL does not point at a monthly digest page: ${url}`);
    this.name = "DigestUrlError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
