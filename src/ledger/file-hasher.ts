/**
 * Streamed content hashing for the incremental ledger.
 *
 * Reads in fixed-size blocks so memory stays constant regardless of
 * file size.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';

export type HashAlgorithm = 'md5' | 'sha256';

/** Block size for streamed reads */
export const HASH_BLOCK_SIZE = 64 * 1024;

/**
 * Compute the hex digest of a file.
 *
 * @throws If the file cannot be read
 */
export async function hashFile(
  filePath: string,
  algorithm: HashAlgorithm = 'md5'
): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const hash = crypto.createHash(algorithm);
    const stream = fs.createReadStream(filePath, { highWaterMark: HASH_BLOCK_SIZE });

    stream.on('data', (chunk: string | Buffer) => {
      hash.update(chunk);
    });

    stream.on('end', () => {
      resolve(hash.digest('hex'));
    });

    stream.on('error', (err: Error) => {
      reject(new Error(`Failed to hash file ${filePath}: ${err.message}`));
    });
  });
}
