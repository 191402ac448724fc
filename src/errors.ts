export class FontInstallError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FetchError extends FontInstallError {
  constructor(
    public readonly url: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Failed to download ${url}: ${reason}`, options);
  }
}

/** The downloaded bytes are not the pinned font. */
export class IntegrityError extends FontInstallError {
  constructor(
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(`Downloaded font does not match expected SHA-256. Expected ${expected}, got ${actual}.`);
  }
}

export class WriteError extends FontInstallError {
  constructor(
    public readonly target: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Failed to write ${target}: ${reason}`, options);
  }
}

export class VerificationError extends FontInstallError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
