/**
 * PasswordService - Argon2id password hashing
 */

import * as argon2 from "argon2";
import { AppError, ErrorCode, ValidationError } from "../../../shared/errors";
import { logger } from "../../../shared/logger";

/**
 * Port the credential service hashes and verifies passwords through.
 */
export interface IPasswordHasher {
  hash(plainPassword: string): Promise<string>;
  verify(plainPassword: string, hashedPassword: string): Promise<boolean>;
}

/**
 * Password hashing configuration
 */
export interface HashingConfig {
  /** Memory cost in KiB (default: 65536 = 64MB) */
  memoryCost?: number;
  /** Time cost / iterations (default: 3) */
  timeCost?: number;
  parallelism?: number;
  /** Hash length in bytes (default: 32) */
  hashLength?: number;
}

const DEFAULT_HASHING_CONFIG: Required<HashingConfig> = {
  memoryCost: 2 ** 16,
  timeCost: 3,
  parallelism: 1,
  hashLength: 32,
};

const MAX_PASSWORD_LENGTH = 1000;

export class PasswordService implements IPasswordHasher {
  private config: Required<HashingConfig>;

  constructor(config?: HashingConfig) {
    this.config = { ...DEFAULT_HASHING_CONFIG, ...config };
  }

  /**
   * Hash a password using Argon2id. The result embeds salt and parameters.
   */
  async hash(plainPassword: string): Promise<string> {
    if (!plainPassword) {
      throw new ValidationError("Password is required");
    }
    if (plainPassword.length > MAX_PASSWORD_LENGTH) {
      throw new ValidationError("Password is too long");
    }

    try {
      return await argon2.hash(plainPassword, {
        type: argon2.argon2id,
        memoryCost: this.config.memoryCost,
        timeCost: this.config.timeCost,
        parallelism: this.config.parallelism,
        hashLength: this.config.hashLength,
      });
    } catch (error) {
      logger.error("Password hashing failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      throw AppError.fromErrorCode(
        ErrorCode.INTERNAL_SERVER_ERROR,
        "Failed to process password",
      );
    }
  }

  /**
   * Verify a password against a stored hash. A malformed hash verifies
   * as false.
   */
  async verify(
    plainPassword: string,
    hashedPassword: string,
  ): Promise<boolean> {
    if (!plainPassword || !hashedPassword) {
      return false;
    }
    if (plainPassword.length > MAX_PASSWORD_LENGTH) {
      return false;
    }

    try {
      return await argon2.verify(hashedPassword, plainPassword);
    } catch (error) {
      logger.debug("Password verification failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  getConfig(): Readonly<Required<HashingConfig>> {
    return { ...this.config };
  }
}
