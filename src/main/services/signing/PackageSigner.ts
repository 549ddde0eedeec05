import crypto from 'node:crypto';

/** Assinatura destacada RSA-SHA256 (PKCS#1 v1.5), codificada em base64. */
export function signArtifact(bytes: Buffer, privateKeyPem: string): string {
  return crypto.sign('sha256', bytes, privateKeyPem).toString('base64');
}

export function parseBase64Signature(value: string | null | undefined): Buffer | null {
  if (typeof value !== 'string') {
    return null;
  }

  const normalized = value.replace(/\s+/g, '');
  if (!normalized || !/^[A-Za-z0-9+/]+={0,2}$/.test(normalized)) {
    return null;
  }

  const bytes = Buffer.from(normalized, 'base64');
  return bytes.length > 0 ? bytes : null;
}

export function verifyArtifactSignature(bytes: Buffer, signatureBase64: string, certificatePem: string): boolean {
  const signature = parseBase64Signature(signatureBase64);
  if (!signature) {
    return false;
  }

  try {
    const certificate = new crypto.X509Certificate(certificatePem);
    return crypto.verify('sha256', bytes, certificate.publicKey, signature);
  } catch {
    return false;
  }
}
