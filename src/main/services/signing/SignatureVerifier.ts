import crypto from 'node:crypto';
import fs from 'node:fs';
import type { VerificationResult } from '@shared/contracts';
import type { LogSink } from '@main/services/logging/Logger';
import { digestBuffer, normalizeHex } from '@main/services/signing/digest';
import { parseBase64Signature } from '@main/services/signing/PackageSigner';

export interface SignatureVerificationInput {
  artifactPath: string;
  expectedChecksum: string;
  signatureBase64: string | null;
  /** PEMs confiaveis; mais de um quando houve rotacao de chave. */
  certificates: string[];
}

export class SignatureVerifier {
  constructor(private readonly logger?: LogSink) {}

  async verify(input: SignatureVerificationInput): Promise<VerificationResult> {
    const bytes = await fs.promises.readFile(input.artifactPath);
    const actualChecksum = digestBuffer(bytes, 'sha256');
    const checksumOk = actualChecksum === normalizeHex(input.expectedChecksum);

    const signature = parseBase64Signature(input.signatureBase64);
    const signaturePresent = typeof input.signatureBase64 === 'string' && input.signatureBase64.trim().length > 0;
    if (!signature) {
      return {
        checksumOk,
        actualChecksum,
        signaturePresent,
        signatureOk: false,
        certificateSubject: null
      };
    }

    for (const pem of input.certificates) {
      const certificate = this.parseCertificate(pem);
      if (!certificate) {
        continue;
      }

      if (crypto.verify('sha256', bytes, certificate.publicKey, signature)) {
        return {
          checksumOk,
          actualChecksum,
          signaturePresent,
          signatureOk: true,
          certificateSubject: certificate.subject
        };
      }
    }

    return {
      checksumOk,
      actualChecksum,
      signaturePresent,
      signatureOk: false,
      certificateSubject: null
    };
  }

  private parseCertificate(pem: string): crypto.X509Certificate | null {
    try {
      const certificate = new crypto.X509Certificate(pem);
      if (Date.parse(certificate.validTo) < Date.now()) {
        // expiracao nao invalida releases antigas assinadas com este certificado
        this.logger?.warn('signature.certificate.expired', {
          subject: certificate.subject,
          validTo: certificate.validTo
        });
      }
      return certificate;
    } catch (error) {
      this.logger?.warn('signature.certificate.invalid', {
        reason: error instanceof Error ? error.message : String(error)
      });
      return null;
    }
  }
}
