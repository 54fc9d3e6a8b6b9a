import { createPrivateKey, X509Certificate } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { normalizeError } from '@control-plane/utils';
import { AuthError } from '../errors';

const PRIVATE_KEY_BLOCK =
  /-----BEGIN ([A-Z ]*)PRIVATE KEY-----[\s\S]+?-----END \1PRIVATE KEY-----/;
const CERTIFICATE_BLOCK = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

export interface CertificateCredential {
  /** Unencrypted PKCS#8 PEM. */
  privateKey: string;
  /** Hex SHA-256 fingerprint of the leaf certificate, without separators. */
  thumbprintSha256: string;
  /** Every certificate block in the file, leaf first. */
  x5c: string;
}

/**
 * Reads a PEM bundle holding a private key and its certificate chain and
 * returns what MSAL needs for a certificate credential.
 */
export async function loadCertificateCredential(
  certificatePath: string,
  password?: string,
): Promise<CertificateCredential> {
  let pem: string;
  try {
    pem = await readFile(certificatePath, 'utf-8');
  } catch (error) {
    throw new AuthError(
      `Failed to read certificate ${certificatePath}: ${normalizeError(error).message}`,
      { cause: error, details: { certificatePath } },
    );
  }

  const keyBlock = PRIVATE_KEY_BLOCK.exec(pem)?.[0];
  if (!keyBlock) {
    throw new AuthError(`No private key found in ${certificatePath}`, {
      details: { certificatePath },
    });
  }

  const certificates = pem.match(CERTIFICATE_BLOCK) ?? [];
  const [leaf] = certificates;
  if (!leaf) {
    throw new AuthError(`No certificate found in ${certificatePath}`, {
      details: { certificatePath },
    });
  }

  try {
    const privateKey = createPrivateKey({ key: keyBlock, format: 'pem', passphrase: password })
      .export({ format: 'pem', type: 'pkcs8' })
      .toString();
    const thumbprintSha256 = new X509Certificate(leaf).fingerprint256.replaceAll(':', '');

    return { privateKey, thumbprintSha256, x5c: certificates.join('\n') };
  } catch (error) {
    throw new AuthError(
      `Failed to load certificate ${certificatePath}: ${normalizeError(error).message}`,
      { cause: error, details: { certificatePath } },
    );
  }
}
