export type EngineErrorCode =
  | "invalid_proof"
  | "access_denied"
  | "ciphertext_not_found"
  | "engine_overflow"
  | "engine_unavailable";

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Proof is empty, malformed, or does not attest the ciphertext for this caller. */
export class InvalidProofError extends EngineError {
  constructor(message = "Integrity proof is empty or could not be verified") {
    super("invalid_proof", message);
  }
}

export class AccessDeniedError extends EngineError {
  constructor(message = "Principal holds no capability on this ciphertext") {
    super("access_denied", message);
  }
}

export class CiphertextNotFoundError extends EngineError {
  constructor(message: string) {
    super("ciphertext_not_found", message);
  }
}

export class EngineOverflowError extends EngineError {
  constructor(message = "Homomorphic addition overflows the u64 domain") {
    super("engine_overflow", message);
  }
}

export class EngineUnavailableError extends EngineError {
  constructor(message: string) {
    super("engine_unavailable", message);
  }
}

const ENGINE_ERROR_FACTORIES: Record<EngineErrorCode, (message: string) => EngineError> = {
  invalid_proof: (message) => new InvalidProofError(message),
  access_denied: (message) => new AccessDeniedError(message),
  ciphertext_not_found: (message) => new CiphertextNotFoundError(message),
  engine_overflow: (message) => new EngineOverflowError(message),
  engine_unavailable: (message) => new EngineUnavailableError(message),
};

export function isEngineErrorCode(value: unknown): value is EngineErrorCode {
  return typeof value === "string" && Object.hasOwn(ENGINE_ERROR_FACTORIES, value);
}

/** Rebuilds an engine error from its wire form ({ error, message }). */
export function engineErrorFromCode(code: EngineErrorCode, message: string): EngineError {
  return ENGINE_ERROR_FACTORIES[code](message);
}

export function engineErrorStatus(error: EngineError): number {
  switch (error.code) {
    case "invalid_proof":
      return 400;
    case "access_denied":
      return 403;
    case "ciphertext_not_found":
      return 404;
    case "engine_overflow":
      return 422;
    case "engine_unavailable":
      return 502;
  }
}
