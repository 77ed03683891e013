import { randomBytes } from 'crypto';
import { ConfigurationError } from '../errors/gateway-error.js';

/** 32 bytes gives 256 bits of entropy before encoding. */
export const MIN_TOKEN_BYTES = 32;

export interface TokenGenerator {
  generate(): string;
}

export interface RandomTokenGeneratorOptions {
  /** Raw bytes drawn per token. Must be at least {@link MIN_TOKEN_BYTES}. */
  byteLength?: number;
}

/** Draws tokens from Node's CSPRNG and encodes them as base64url. */
export class RandomTokenGenerator implements TokenGenerator {
  private readonly byteLength: number;

  constructor({
    byteLength = MIN_TOKEN_BYTES,
  }: RandomTokenGeneratorOptions = {}) {
    if (!Number.isInteger(byteLength) || byteLength < MIN_TOKEN_BYTES) {
      throw new ConfigurationError(
        `Token byte length must be an integer of at least ${MIN_TOKEN_BYTES}`,
      );
    }
    this.byteLength = byteLength;
  }

  generate(): string {
    return randomBytes(this.byteLength).toString('base64url');
  }
}
