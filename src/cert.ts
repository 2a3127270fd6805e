import { generateKeyPair, randomBytes } from 'node:crypto';
import { promisify } from 'node:util';
import forge, { type pki } from 'node-forge';

const generateKeyPairAsync = promisify(generateKeyPair);

const DEFAULT_VALIDITY_DAYS = 365;
const DEFAULT_ORGANIZATION = 'lanshare';
const RSA_MODULUS_BITS = 2048;

export interface SelfSignedCertificate {
  cert: string;
  key: string;
}

export interface CertificateOptions {
  organization?: string;
  commonName?: string;
  validityDays?: number;
  now?: Date;
}

function randomSerialNumber(): string {
  const bytes = randomBytes(16);
  // DER integers are signed; keep the serial positive and non-zero.
  bytes[0] = (bytes[0] & 0x7f) | 0x01;
  return bytes.toString('hex');
}

export async function generateSelfSignedCertificate(options: CertificateOptions = {}): Promise<SelfSignedCertificate> {
  const commonName = options.commonName ?? 'localhost';
  const validityDays = options.validityDays ?? DEFAULT_VALIDITY_DAYS;
  const notBefore = options.now ?? new Date();
  const notAfter = new Date(notBefore.getTime() + validityDays * 24 * 60 * 60 * 1000);

  const { publicKey, privateKey } = await generateKeyPairAsync('rsa', {
    modulusLength: RSA_MODULUS_BITS,
    publicExponent: 0x10001,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs1', format: 'pem' }
  });

  const attrs: pki.CertificateField[] = [
    { name: 'countryName', value: 'US' },
    { shortName: 'ST', value: 'State' },
    { name: 'localityName', value: 'City' },
    { name: 'organizationName', value: options.organization ?? DEFAULT_ORGANIZATION },
    { name: 'commonName', value: commonName }
  ];

  const cert = forge.pki.createCertificate();
  cert.publicKey = forge.pki.publicKeyFromPem(publicKey);
  cert.serialNumber = randomSerialNumber();
  cert.validity.notBefore = notBefore;
  cert.validity.notAfter = notAfter;
  cert.setSubject(attrs);
  cert.setIssuer(attrs);
  cert.setExtensions([
    { name: 'basicConstraints', cA: false },
    {
      name: 'subjectAltName',
      altNames: [
        { type: 2, value: 'localhost' },
        { type: 7, ip: '127.0.0.1' }
      ]
    }
  ]);
  cert.sign(forge.pki.privateKeyFromPem(privateKey), forge.md.sha256.create());

  return {
    cert: forge.pki.certificateToPem(cert),
    key: privateKey
  };
}
