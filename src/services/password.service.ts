/**
 * Password Hashing
 *
 * argon2id behind a two-method interface so the auth service never touches
 * the algorithm directly.
 */

import * as argon2 from 'argon2';
import { logger } from '@/utils/logger';

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  /** False for a wrong password or an unreadable digest, never throws */
  verify(password: string, digest: string): Promise<boolean>;
}

export interface Argon2Options {
  /** KiB */
  memoryCost: number;
  timeCost: number;
}

export function createArgon2Hasher(options: Argon2Options): PasswordHasher {
  const hashOptions = {
    type: argon2.argon2id,
    memoryCost: options.memoryCost,
    timeCost: options.timeCost,
    parallelism: 1,
  };

  return {
    hash(password) {
      return argon2.hash(password, hashOptions);
    },

    async verify(password, digest) {
      try {
        return await argon2.verify(digest, password);
      } catch (error) {
        logger.error('Password digest could not be verified', { error: String(error) });
        return false;
      }
    },
  };
}
