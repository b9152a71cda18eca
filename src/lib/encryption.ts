import { createCipheriv, createDecipheriv, createHash, randomBytes } from "node:crypto";

const ALGORITHM = "aes-256-gcm";
const IV_BYTES = 12;
const PAYLOAD_VERSION = "v1";

export class CacheDecryptError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CacheDecryptError";
  }
}

/**
 * Accepts a 32-byte key as 64 hex characters or base64. Any other secret is
 * stretched with SHA-256 so local setups can use a plain passphrase.
 */
export function deriveKey(secret: string): Buffer {
  const trimmed = secret.trim();
  if (!trimmed) {
    throw new Error("Encryption key must not be empty.");
  }

  if (/^[0-9a-f]{64}$/i.test(trimmed)) {
    return Buffer.from(trimmed, "hex");
  }

  const decoded = Buffer.from(trimmed, "base64");
  if (decoded.length === 32 && decoded.toString("base64").replace(/=+$/, "") === trimmed.replace(/=+$/, "")) {
    return decoded;
  }

  return createHash("sha256").update(trimmed, "utf8").digest();
}

export class StateCipher {
  private readonly key: Buffer;

  constructor(secret: string) {
    this.key = deriveKey(secret);
  }

  encrypt(plain: string): string {
    const iv = randomBytes(IV_BYTES);
    const cipher = createCipheriv(ALGORITHM, this.key, iv);
    const ciphertext = Buffer.concat([cipher.update(plain, "utf8"), cipher.final()]);
    const tag = cipher.getAuthTag();

    return [PAYLOAD_VERSION, iv.toString("base64"), tag.toString("base64"), ciphertext.toString("base64")].join(".");
  }

  decrypt(payload: string): string {
    const parts = payload.split(".");
    if (parts.length !== 4 || parts[0] !== PAYLOAD_VERSION) {
      throw new CacheDecryptError("Unrecognized encrypted payload format.");
    }

    const [, ivRaw, tagRaw, dataRaw] = parts;

    try {
      const decipher = createDecipheriv(ALGORITHM, this.key, Buffer.from(ivRaw, "base64"));
      decipher.setAuthTag(Buffer.from(tagRaw, "base64"));
      return Buffer.concat([decipher.update(Buffer.from(dataRaw, "base64")), decipher.final()]).toString("utf8");
    } catch (error) {
      throw new CacheDecryptError(error instanceof Error ? error.message : "Decryption failed.");
    }
  }
}
