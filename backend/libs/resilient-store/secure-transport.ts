import { X509Certificate } from 'crypto';
import { readFileSync } from 'fs';
import {
  checkServerIdentity,
  type ConnectionOptions,
  type PeerCertificate,
} from 'tls';
import type { VerifyMode } from './connection-descriptor';
import { TransportConfigError, describeError } from './resilient-store.errors';

export interface SecureTransportConfig {
  readonly verifyMode: VerifyMode;
  readonly tls: ConnectionOptions;
}

const PEM_CERTIFICATE =
  /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

/**
 * Build TLS options for the store and sentinel sockets.
 *
 * - none: no certificate or hostname verification
 * - optional: chain verified; hostname checked only when the peer presented
 *   a certificate
 * - required: chain and hostname verification mandatory
 *
 * @throws TransportConfigError when the CA bundle is unreadable or malformed
 */
export function buildSecureTransport(
  verifyMode: VerifyMode = 'required',
  caPath?: string,
): SecureTransportConfig {
  const tls: ConnectionOptions = {};

  switch (verifyMode) {
    case 'none':
      tls.rejectUnauthorized = false;
      tls.checkServerIdentity = () => undefined;
      break;
    case 'optional':
      tls.rejectUnauthorized = true;
      tls.checkServerIdentity = (hostname, certificate) =>
        isPresented(certificate)
          ? checkServerIdentity(hostname, certificate)
          : undefined;
      break;
    case 'required':
      tls.rejectUnauthorized = true;
      break;
  }

  if (caPath) {
    tls.ca = loadCertificateBundle(caPath);
  }

  return { verifyMode, tls };
}

function isPresented(certificate: PeerCertificate): boolean {
  return Object.keys(certificate).length > 0;
}

/**
 * Read a PEM bundle and make sure every certificate in it parses
 */
export function loadCertificateBundle(caPath: string): string {
  let pem: string;
  try {
    pem = readFileSync(caPath, 'utf8');
  } catch (error) {
    throw new TransportConfigError(
      `Cannot read CA bundle ${caPath}: ${describeError(error)}`,
      { cause: error },
    );
  }

  const blocks = pem.match(PEM_CERTIFICATE) ?? [];
  if (blocks.length === 0) {
    throw new TransportConfigError(`No PEM certificate found in ${caPath}`);
  }

  for (const block of blocks) {
    try {
      new X509Certificate(block);
    } catch (error) {
      throw new TransportConfigError(
        `Malformed certificate in ${caPath}: ${describeError(error)}`,
        { cause: error },
      );
    }
  }

  return pem;
}
