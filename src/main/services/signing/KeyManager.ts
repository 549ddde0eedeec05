import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { promisify } from 'node:util';
import forge from 'node-forge';
import type { KeyMaterial, KeyMaterialPaths } from '@shared/contracts';
import { PipelineError } from '@main/services/errors/PipelineError';
import { FileLock } from '@main/services/installation/FileLock';
import type { LogSink } from '@main/services/logging/Logger';

export const MIN_SIGNING_KEY_BITS = 4096;

export interface CertificateSubject {
  country: string;
  state: string;
  locality: string;
  organization: string;
  commonName: string;
}

export interface GeneratedKeyPair {
  privateKeyPem: string;
  publicKeyPem: string;
}

interface KeyManagerOptions {
  keysDir: string;
  identity: string;
  keyBits: number;
  validityDays: number;
  subject: CertificateSubject;
  logger: LogSink;
  lockTimeoutMs?: number;
  generateKeyPair?: (bits: number) => Promise<GeneratedKeyPair>;
  now?: () => Date;
}

const generateKeyPairAsync = promisify(crypto.generateKeyPair);

export class KeyManager {
  private readonly keysDir: string;
  private readonly identity: string;
  private readonly keyBits: number;
  private readonly validityDays: number;
  private readonly subject: CertificateSubject;
  private readonly logger: LogSink;
  private readonly lockTimeoutMs: number;
  private readonly generateKeyPair: (bits: number) => Promise<GeneratedKeyPair>;
  private readonly now: () => Date;
  private readonly lock: FileLock;

  constructor(options: KeyManagerOptions) {
    if (!Number.isInteger(options.keyBits) || options.keyBits < MIN_SIGNING_KEY_BITS) {
      throw new PipelineError('config_invalid', `Chave de assinatura exige no minimo ${MIN_SIGNING_KEY_BITS} bits.`);
    }

    this.keysDir = options.keysDir;
    this.identity = options.identity;
    this.keyBits = options.keyBits;
    this.validityDays = Math.max(1, Math.trunc(options.validityDays));
    this.subject = options.subject;
    this.logger = options.logger;
    this.lockTimeoutMs = options.lockTimeoutMs ?? 120_000;
    this.generateKeyPair = options.generateKeyPair ?? generateRsaKeyPair;
    this.now = options.now ?? (() => new Date());
    this.lock = new FileLock(path.join(this.keysDir, `.${this.identity}-keygen.lock`));
  }

  paths(): KeyMaterialPaths {
    return {
      privateKeyPath: path.join(this.keysDir, `${this.identity}-private.pem`),
      publicKeyPath: path.join(this.keysDir, `${this.identity}-public.pem`),
      certificatePath: path.join(this.keysDir, `${this.identity}-cert.pem`)
    };
  }

  hasKeyMaterial(): boolean {
    const paths = this.paths();
    return fs.existsSync(paths.privateKeyPath) && fs.existsSync(paths.publicKeyPath) && fs.existsSync(paths.certificatePath);
  }

  /** Certificado publico sem tocar na chave privada; usado por quem so verifica. */
  readCertificate(): string {
    const { certificatePath } = this.paths();
    if (!fs.existsSync(certificatePath)) {
      throw new PipelineError('key_material_unavailable', `Certificado nao encontrado: ${certificatePath}`);
    }
    return fs.readFileSync(certificatePath, 'utf-8');
  }

  async ensureKeyMaterial(): Promise<KeyMaterial> {
    if (this.hasKeyMaterial()) {
      return this.load(false);
    }

    fs.mkdirSync(this.keysDir, { recursive: true, mode: 0o700 });
    const handle = await this.lock.acquire(`keygen:${this.identity}`, { timeoutMs: this.lockTimeoutMs });
    try {
      // outro processo pode ter gerado enquanto esperavamos o lock
      if (this.hasKeyMaterial()) {
        return this.load(false);
      }

      return await this.createOrRepair();
    } finally {
      handle.release();
    }
  }

  private async createOrRepair(): Promise<KeyMaterial> {
    const paths = this.paths();

    if (fs.existsSync(paths.privateKeyPath)) {
      const privateKeyPem = fs.readFileSync(paths.privateKeyPath, 'utf-8');
      if (!fs.existsSync(paths.publicKeyPath)) {
        writePemAtomically(paths.publicKeyPath, derivePublicKeyPem(privateKeyPem), 0o644);
      }
      const publicKeyPem = fs.readFileSync(paths.publicKeyPath, 'utf-8');
      if (!fs.existsSync(paths.certificatePath)) {
        writePemAtomically(paths.certificatePath, this.issueCertificate({ privateKeyPem, publicKeyPem }), 0o644);
      }

      this.logger.warn('signing.keys.repaired', {
        identity: this.identity,
        keysDir: this.keysDir
      });
      return this.load(false);
    }

    this.logger.info('signing.keys.generate.start', {
      identity: this.identity,
      keyBits: this.keyBits
    });

    let pair: GeneratedKeyPair;
    let certificatePem: string;
    try {
      pair = await this.generateKeyPair(this.keyBits);
      certificatePem = this.issueCertificate(pair);
    } catch (error) {
      throw new PipelineError('signing_failure', `Falha ao gerar material de assinatura: ${describe(error)}`, {
        cause: error
      });
    }

    // chave privada por ultimo: sua presenca marca o material como completo para outros leitores
    writePemAtomically(paths.publicKeyPath, pair.publicKeyPem, 0o644);
    writePemAtomically(paths.certificatePath, certificatePem, 0o644);
    writePemAtomically(paths.privateKeyPath, pair.privateKeyPem, 0o600);

    this.logger.info('signing.keys.generate.finish', {
      identity: this.identity,
      certificatePath: paths.certificatePath
    });

    return this.load(true);
  }

  private load(created: boolean): KeyMaterial {
    const paths = this.paths();
    let material: KeyMaterial;
    try {
      material = {
        privateKeyPem: fs.readFileSync(paths.privateKeyPath, 'utf-8'),
        publicKeyPem: fs.readFileSync(paths.publicKeyPath, 'utf-8'),
        certificatePem: fs.readFileSync(paths.certificatePath, 'utf-8'),
        paths,
        created
      };
    } catch (error) {
      throw new PipelineError('key_material_unavailable', `Material de assinatura ilegivel: ${describe(error)}`, {
        cause: error
      });
    }

    try {
      crypto.createPrivateKey(material.privateKeyPem);
    } catch (error) {
      throw new PipelineError('key_material_unavailable', `Chave privada invalida em ${paths.privateKeyPath}: ${describe(error)}`, {
        cause: error
      });
    }

    return material;
  }

  private issueCertificate(pair: GeneratedKeyPair): string {
    const privateKey = forge.pki.privateKeyFromPem(pair.privateKeyPem);
    const certificate = forge.pki.createCertificate();
    certificate.publicKey = forge.pki.publicKeyFromPem(pair.publicKeyPem);
    // serial positivo: primeiro octeto fixo abaixo de 0x80
    certificate.serialNumber = `01${crypto.randomBytes(15).toString('hex')}`;

    const notBefore = this.now();
    certificate.validity.notBefore = notBefore;
    certificate.validity.notAfter = new Date(notBefore.getTime() + this.validityDays * 24 * 60 * 60 * 1000);

    const attributes = [
      { shortName: 'C', value: this.subject.country },
      { shortName: 'ST', value: this.subject.state },
      { shortName: 'L', value: this.subject.locality },
      { shortName: 'O', value: this.subject.organization },
      { shortName: 'CN', value: this.subject.commonName }
    ];
    certificate.setSubject(attributes);
    certificate.setIssuer(attributes);
    certificate.setExtensions([
      { name: 'basicConstraints', cA: false },
      { name: 'keyUsage', critical: true, digitalSignature: true },
      { name: 'subjectKeyIdentifier' }
    ]);
    certificate.sign(privateKey, forge.md.sha256.create());

    return forge.pki.certificateToPem(certificate);
  }
}

async function generateRsaKeyPair(bits: number): Promise<GeneratedKeyPair> {
  const { privateKey, publicKey } = await generateKeyPairAsync('rsa', {
    modulusLength: bits,
    publicExponent: 0x10001,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' }
  });

  return {
    privateKeyPem: privateKey,
    publicKeyPem: publicKey
  };
}

function writePemAtomically(filePath: string, pem: string, mode: number): void {
  const pending = `${filePath}.tmp-${process.pid}`;
  try {
    fs.writeFileSync(pending, pem, { encoding: 'utf-8', mode });
    fs.renameSync(pending, filePath);
  } catch (error) {
    fs.rmSync(pending, { force: true });
    throw error;
  }
}

function derivePublicKeyPem(privateKeyPem: string): string {
  return crypto.createPublicKey(privateKeyPem).export({ type: 'spki', format: 'pem' }).toString();
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
