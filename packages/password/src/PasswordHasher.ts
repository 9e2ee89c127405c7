import * as argon2 from "argon2";
import { LatchkeyError, parseOptions } from "@latchkey/core";
import { z } from "zod";

const ARGON2_VERSION = 19;

const hasherOptionsSchema = z.object({
  /** KiB */
  memoryCost: z.number().int().min(1024).default(19456),
  timeCost: z.number().int().min(2).default(2),
  parallelism: z.number().int().min(1).max(255).default(1),
});

export type PasswordHasherOptions = z.input<typeof hasherOptionsSchema>;

/**
 * Fields of an argon2 PHC string,
 * `$argon2id$v=19$m=19456,t=2,p=1$<salt>$<hash>`.
 */
export type PasswordRecord = {
  algorithm: "argon2id" | "argon2i" | "argon2d";
  version: number;
  memoryCost: number;
  timeCost: number;
  parallelism: number;
  salt: string;
  hash: string;
};

// records without a version field predate argon2 1.3 (0x13)
const PHC_PATTERN =
  /^\$(argon2id|argon2i|argon2d)\$(?:v=(\d+)\$)?m=(\d+),t=(\d+),p=(\d+)\$([A-Za-z0-9+/]+)\$([A-Za-z0-9+/]+)$/;

/**
 * Splits an argon2 PHC string. Anything else throws `INVALID_RECORD`.
 */
export function parsePasswordRecord(record: string): PasswordRecord {
  const match = PHC_PATTERN.exec(record);
  if (!match) {
    throw new LatchkeyError("INVALID_RECORD", "Stored password hash is not an argon2 PHC string.");
  }

  const [, algorithm, version, memoryCost, timeCost, parallelism, salt, hash] = match;
  if (
    (algorithm !== "argon2id" && algorithm !== "argon2i" && algorithm !== "argon2d") ||
    memoryCost === undefined ||
    timeCost === undefined ||
    parallelism === undefined ||
    salt === undefined ||
    hash === undefined
  ) {
    throw new LatchkeyError("INVALID_RECORD", "Stored password hash is not an argon2 PHC string.");
  }

  return {
    algorithm,
    version: version === undefined ? 16 : Number(version),
    memoryCost: Number(memoryCost),
    timeCost: Number(timeCost),
    parallelism: Number(parallelism),
    salt,
    hash,
  };
}

/**
 * Hashes and verifies passwords with argon2id.
 */
export class PasswordHasher {
  private readonly params: z.output<typeof hasherOptionsSchema>;

  constructor(options?: PasswordHasherOptions) {
    this.params = parseOptions(hasherOptionsSchema, options, "password hasher options");
  }

  /**
   * Salted argon2id hash in PHC form.
   */
  async hash(password: string): Promise<string> {
    return argon2.hash(password, {
      type: argon2.argon2id,
      memoryCost: this.params.memoryCost,
      timeCost: this.params.timeCost,
      parallelism: this.params.parallelism,
    });
  }

  /**
   * Constant-time check of `password` against a stored record. A record that
   * cannot be verified at all is `INVALID_RECORD`, never a plain mismatch.
   */
  async verify(password: string, record: string): Promise<boolean> {
    parsePasswordRecord(record);
    try {
      return await argon2.verify(record, password);
    } catch (error) {
      throw new LatchkeyError("INVALID_RECORD", "Stored password hash could not be verified.", error);
    }
  }

  /**
   * Whether a record was produced with weaker settings than the current ones
   * and should be replaced after the next successful login.
   */
  needsRehash(record: string): boolean {
    const parsed = parsePasswordRecord(record);
    return (
      parsed.algorithm !== "argon2id" ||
      parsed.version < ARGON2_VERSION ||
      parsed.memoryCost < this.params.memoryCost ||
      parsed.timeCost < this.params.timeCost ||
      parsed.parallelism < this.params.parallelism
    );
  }
}
