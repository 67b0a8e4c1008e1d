/**
 * Verificación de integridad del archivo ensamblado.
 *
 * computeDigest lee el archivo con un buffer acotado (config.verifier.bufferSize) y
 * devuelve el hash en hex. verifyFile siempre calcula el digest; si hay uno esperado
 * lo compara (sin distinguir mayúsculas) y si no, el resultado es 'unverified'.
 *
 * @module engines/Verifier
 */

import crypto from 'crypto';
import { promises as fs } from 'fs';
import config from '../config';
import { logger } from '../utils';

const log = logger.child('Verifier');

export type VerifyStatus = 'passed' | 'failed' | 'unverified';

export interface VerifyFileResult {
  status: VerifyStatus;
  digest: string;
  expectedDigest: string | null;
  size: number;
}

export class Verifier {
  private readonly bufferSize: number;
  private readonly algorithm: string;

  constructor(algorithm: string = config.downloads.digestAlgorithm, bufferSize = config.verifier.bufferSize) {
    this.algorithm = algorithm;
    this.bufferSize = bufferSize;
  }

  async computeDigest(
    filePath: string,
    onProgress: ((_progress: number) => void) | null = null
  ): Promise<string> {
    const hash = crypto.createHash(this.algorithm);
    const fileHandle = await fs.open(filePath, 'r');
    try {
      const { size } = await fileHandle.stat();
      const buffer = Buffer.allocUnsafe(Math.max(1, Math.min(this.bufferSize, size)));
      let bytesRead = 0;
      while (bytesRead < size) {
        const toRead = Math.min(buffer.length, size - bytesRead);
        const { bytesRead: read } = await fileHandle.read(buffer, 0, toRead, bytesRead);
        if (read === 0) break;
        hash.update(buffer.subarray(0, read));
        bytesRead += read;
        if (onProgress) onProgress(bytesRead / size);
      }
      return hash.digest('hex');
    } finally {
      await fileHandle.close();
    }
  }

  /** true si el digest del archivo coincide con expectedDigest. */
  async verify(filePath: string, expectedDigest: string): Promise<boolean> {
    const actual = await this.computeDigest(filePath);
    return actual === expectedDigest.toLowerCase();
  }

  async verifyFile(filePath: string, expectedDigest: string | null = null): Promise<VerifyFileResult> {
    const { size } = await fs.stat(filePath);
    const digest = await this.computeDigest(filePath);
    const expected = expectedDigest ? expectedDigest.toLowerCase() : null;

    if (expected === null) {
      log.info(`[verifyFile] ${filePath}: ${this.algorithm} ${digest} (sin digest esperado)`);
      return { status: 'unverified', digest, expectedDigest: null, size };
    }
    if (digest !== expected) {
      log.error(`[verifyFile] Hash incorrecto en ${filePath}: ${digest} !== ${expected}`);
      return { status: 'failed', digest, expectedDigest: expected, size };
    }
    log.info(`[verifyFile] ${filePath} verificado (${this.algorithm})`);
    return { status: 'passed', digest, expectedDigest: expected, size };
  }
}

const verifier = new Verifier();
export default verifier;
