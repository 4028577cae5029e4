/**
 * RSA key pair used for the login challenge and for password encryption.
 *
 * Keys are stored as PKCS#1 DER (`RSAPublicKey` / `RSAPrivateKey`), the
 * encoding the vault server keeps for each user. Encryption and decryption use
 * PKCS#1 v1.5 padding, which the server's challenge is encrypted with.
 *
 * Node's `privateDecrypt` refuses PKCS#1 v1.5 padding on Node 20, so decryption
 * goes through node-forge; generation, import, export and encryption stay on
 * `node:crypto`.
 */

import {
  constants,
  createPrivateKey,
  createPublicKey,
  generateKeyPairSync,
  publicEncrypt,
} from 'node:crypto';
import type { KeyObject } from 'node:crypto';
import * as fs from 'node:fs';

import forge from 'node-forge';
import type { pki } from 'node-forge';

import { RSA_MODULUS_BITS } from '@/constants.js';
import { CryptoError } from '@/protocol/errors.js';
import { createLogger } from '@/ui/logging/index.js';
import { AtomicFileWriter } from '@/utils/atomicFile.js';
import { getErrorCode, getErrorMessage } from '@/utils/errors.js';

const log = createLogger('keys');

/** Bytes of padding overhead in a PKCS#1 v1.5 encryption block */
const PKCS1_OVERHEAD = 11;

const PRIVATE_KEY_MODE = 0o600;
const PUBLIC_KEY_MODE = 0o644;

export interface KeyMaterial {
  /** PKCS#1 DER public key */
  publicKey?: Buffer;
  /** PKCS#1 DER private key */
  privateKey?: Buffer;
}

function exportPkcs1(key: KeyObject): Buffer {
  return key.export({ format: 'der', type: 'pkcs1' });
}

async function readOptional(filePath: string): Promise<Buffer | undefined> {
  try {
    return await fs.promises.readFile(filePath);
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return undefined;
    }
    throw new CryptoError(`Cannot read key file ${filePath}: ${getErrorMessage(error)}`, error);
  }
}

/**
 * RSA key pair; the private half may be absent for an encrypt-only pair.
 */
export class RsaKeyPair {
  private forgePrivateKey: pki.rsa.PrivateKey | null = null;

  private constructor(
    private readonly publicKey: KeyObject,
    private readonly privateKey: KeyObject | null
  ) {}

  /**
   * Generate a fresh 2048-bit key pair.
   */
  static generate(): RsaKeyPair {
    const { publicKey, privateKey } = generateKeyPairSync('rsa', {
      modulusLength: RSA_MODULUS_BITS,
    });
    log.debug(`Generated ${RSA_MODULUS_BITS}-bit RSA key pair`);
    return new RsaKeyPair(publicKey, privateKey);
  }

  /**
   * Import PKCS#1 DER key material.
   *
   * A missing public key is derived from the private key. When both are given
   * they must belong to the same pair.
   *
   * @throws CryptoError when nothing is given, a key does not parse, or the halves mismatch
   */
  static fromDer(material: KeyMaterial): RsaKeyPair {
    let privateKey: KeyObject | null = null;
    let publicKey: KeyObject | null = null;
    try {
      if (material.privateKey) {
        privateKey = createPrivateKey({ key: material.privateKey, format: 'der', type: 'pkcs1' });
      }
      if (material.publicKey) {
        publicKey = createPublicKey({ key: material.publicKey, format: 'der', type: 'pkcs1' });
      } else if (privateKey) {
        publicKey = createPublicKey(privateKey);
      }
    } catch (error) {
      throw new CryptoError(`Cannot import RSA key: ${getErrorMessage(error)}`, error);
    }
    if (!publicKey) {
      throw new CryptoError('No key material to import');
    }

    if (privateKey && material.publicKey) {
      const derived = exportPkcs1(createPublicKey(privateKey));
      if (!derived.equals(exportPkcs1(publicKey))) {
        throw new CryptoError('Public and private key do not belong to the same key pair');
      }
    }
    return new RsaKeyPair(publicKey, privateKey);
  }

  /**
   * Load a key pair from its two files. Either file may be missing, not both.
   *
   * @throws CryptoError when neither file exists or a file cannot be read or parsed
   */
  static async load(publicKeyPath: string, privateKeyPath: string): Promise<RsaKeyPair> {
    const [publicKey, privateKey] = await Promise.all([
      readOptional(publicKeyPath),
      readOptional(privateKeyPath),
    ]);
    if (!publicKey && !privateKey) {
      throw new CryptoError(`No key files found at ${publicKeyPath} or ${privateKeyPath}`);
    }
    log.debug(
      `Loaded ${publicKey ? 'public' : 'derived public'} key${privateKey ? ' and private key' : ''}`
    );
    return RsaKeyPair.fromDer({
      ...(publicKey ? { publicKey } : {}),
      ...(privateKey ? { privateKey } : {}),
    });
  }

  /**
   * Write both halves as PKCS#1 DER; the private file is readable by the owner only.
   *
   * @throws CryptoError when the pair has no private key or a write fails
   */
  async save(publicKeyPath: string, privateKeyPath: string): Promise<void> {
    if (!this.privateKey) {
      throw new CryptoError('Cannot save a key pair without its private key');
    }
    try {
      await AtomicFileWriter.writeAsync(publicKeyPath, this.exportPublicKey(), {
        mode: PUBLIC_KEY_MODE,
      });
      await AtomicFileWriter.writeAsync(privateKeyPath, exportPkcs1(this.privateKey), {
        mode: PRIVATE_KEY_MODE,
      });
    } catch (error) {
      throw new CryptoError(`Cannot write key files: ${getErrorMessage(error)}`, error);
    }
    log.debug(`Wrote key pair to ${publicKeyPath} and ${privateKeyPath}`);
  }

  get hasPrivateKey(): boolean {
    return this.privateKey !== null;
  }

  get modulusBits(): number {
    return this.publicKey.asymmetricKeyDetails?.modulusLength ?? RSA_MODULUS_BITS;
  }

  /**
   * Longest plaintext one PKCS#1 v1.5 block can carry.
   */
  get maxPlaintextLength(): number {
    return this.modulusBits / 8 - PKCS1_OVERHEAD;
  }

  /**
   * PKCS#1 DER encoding of the public key, as registered with the server.
   */
  exportPublicKey(): Buffer {
    return exportPkcs1(this.publicKey);
  }

  /**
   * Encrypt with the public key (PKCS#1 v1.5).
   *
   * @throws CryptoError when the plaintext does not fit one block
   */
  encrypt(plaintext: Uint8Array): Buffer {
    if (plaintext.length > this.maxPlaintextLength) {
      throw new CryptoError(
        `Plaintext of ${plaintext.length} bytes exceeds the ${this.maxPlaintextLength}-byte RSA block limit`
      );
    }
    try {
      return publicEncrypt({ key: this.publicKey, padding: constants.RSA_PKCS1_PADDING }, plaintext);
    } catch (error) {
      throw new CryptoError(`RSA encryption failed: ${getErrorMessage(error)}`, error);
    }
  }

  /**
   * Decrypt with the private key (PKCS#1 v1.5).
   *
   * @throws CryptoError when no private key is loaded or the ciphertext does not match the key
   */
  decrypt(ciphertext: Uint8Array): Buffer {
    const key = this.getForgePrivateKey();
    try {
      const plaintext = key.decrypt(Buffer.from(ciphertext).toString('binary'), 'RSAES-PKCS1-V1_5');
      return Buffer.from(plaintext, 'binary');
    } catch (error) {
      throw new CryptoError(`RSA decryption failed: ${getErrorMessage(error)}`, error);
    }
  }

  private getForgePrivateKey(): pki.rsa.PrivateKey {
    if (!this.privateKey) {
      throw new CryptoError('No private key loaded; cannot decrypt');
    }
    if (!this.forgePrivateKey) {
      const pem = this.privateKey.export({ format: 'pem', type: 'pkcs1' }).toString();
      this.forgePrivateKey = forge.pki.privateKeyFromPem(pem);
    }
    return this.forgePrivateKey;
  }
}
