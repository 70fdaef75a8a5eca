import {
  EngineUnavailableError,
  buildServiceAuthHeaders,
  engineErrorFromCode,
  internalCiphertext,
  isCiphertextHandle,
  isEngineErrorCode,
  type CiphertextHandle,
  type EncryptionEngine,
  type Identity,
  type InternalCiphertext,
  type IntegrityProof,
} from "@cxt/shared";

const DEFAULT_TIMEOUT_MS = 5000;

export interface HttpEncryptionEngineOptions {
  baseUrl: string;
  processor: Identity;
  serviceAuthToken?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) return null;
  try {
    return JSON.parse(text);
  } catch {
    throw new EngineUnavailableError(
      `Coprocessor replied ${response.status} with a non-JSON body`,
    );
  }
}

/** Engine interface over the coprocessor HTTP API. Bound to one processor identity. */
export class HttpEncryptionEngine implements EncryptionEngine {
  private readonly baseUrl: string;
  private readonly processor: Identity;
  private readonly serviceAuthToken?: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpEncryptionEngineOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.processor = options.processor;
    this.serviceAuthToken = options.serviceAuthToken;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async verifyAndDecode(
    externalCiphertext: CiphertextHandle,
    proof: IntegrityProof,
    caller: Identity,
  ): Promise<InternalCiphertext> {
    return this.ciphertext("/inputs/verify", {
      handle: externalCiphertext,
      proof,
      owner: caller,
      processor: this.processor,
    });
  }

  async encryptZero(): Promise<InternalCiphertext> {
    return this.ciphertext("/ciphertexts/zero", { processor: this.processor });
  }

  async add(a: InternalCiphertext, b: InternalCiphertext): Promise<InternalCiphertext> {
    return this.ciphertext("/ciphertexts/add", {
      a: a.handle,
      b: b.handle,
      processor: this.processor,
    });
  }

  toExternalHandle(value: InternalCiphertext): CiphertextHandle {
    return value.handle;
  }

  async grantProcessingAuthority(handle: CiphertextHandle): Promise<void> {
    await this.post("/acl/grant", { handle, grantee: this.processor, processor: this.processor });
  }

  async grantDecryptRights(handle: CiphertextHandle, identity: Identity): Promise<void> {
    await this.post("/acl/grant", { handle, grantee: identity, processor: this.processor });
  }

  async grantPublicDecrypt(handle: CiphertextHandle): Promise<void> {
    await this.post("/acl/public", { handle, processor: this.processor });
  }

  private async ciphertext(path: string, body: Record<string, unknown>): Promise<InternalCiphertext> {
    const json = await this.post(path, body);
    if (!isObject(json) || !isCiphertextHandle(json.handle)) {
      throw new EngineUnavailableError(`Coprocessor ${path} returned no ciphertext handle`);
    }
    return internalCiphertext(json.handle);
  }

  private async post(path: string, body: Record<string, unknown>): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: "POST",
        headers: {
          ...buildServiceAuthHeaders(this.serviceAuthToken),
          "content-type": "application/json",
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new EngineUnavailableError(
        `Coprocessor ${path} unreachable: ${error instanceof Error ? error.message : "unknown_error"}`,
      );
    }

    const json = await readJson(response);
    if (response.ok) {
      return json;
    }
    if (isObject(json) && isEngineErrorCode(json.error)) {
      const message = typeof json.message === "string" ? json.message : json.error;
      throw engineErrorFromCode(json.error, message);
    }
    throw new EngineUnavailableError(`Coprocessor ${path} replied ${response.status}`);
  }
}
