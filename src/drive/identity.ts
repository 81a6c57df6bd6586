// Drive identifiers: `<protocol>://<id>` where the id is a single flat token.

import { DriveInvalidIdentifierError } from './errors.js';

export const SUPPORTED_PROTOCOLS = ['lit://'] as const;

export type DriveProtocol = (typeof SUPPORTED_PROTOCOLS)[number];

export interface DriveIdentity {
  readonly protocol: DriveProtocol;
  readonly id: string;
}

export function isSupportedProtocol(value: string): value is DriveProtocol {
  return SUPPORTED_PROTOCOLS.some((protocol) => protocol === value);
}

/**
 * Parse a raw drive identifier into its protocol and id.
 * Pure: no storage is touched.
 *
 * @throws DriveInvalidIdentifierError when the protocol is unsupported or the id
 * is empty, hierarchical (`name/extra`), or a relative path segment.
 */
export function parseDriveIdentifier(raw: string): DriveIdentity {
  const protocol = SUPPORTED_PROTOCOLS.find((candidate) => raw.startsWith(candidate));
  if (!protocol) {
    throw new DriveInvalidIdentifierError(
      `The Drive id needs to start with one of the following protocols: ${SUPPORTED_PROTOCOLS.join(', ')}. Found \`${raw}\`.`
    );
  }

  const id = raw.slice(protocol.length);
  if (id.length === 0 || id === '.' || id === '..') {
    throw new DriveInvalidIdentifierError(`The Drive id is missing after ${protocol}. Found \`${raw}\`.`);
  }
  if (id.includes('/') || id.includes('\\')) {
    throw new DriveInvalidIdentifierError(
      `The id should be unique to identify your drive. Found \`${id}\`.`
    );
  }

  return Object.freeze({ protocol, id });
}

export function formatDriveIdentifier(identity: DriveIdentity): string {
  return `${identity.protocol}${identity.id}`;
}

/** Protocol without its `://` suffix, e.g. `lit`. Used as a storage path segment. */
export function protocolScheme(protocol: DriveProtocol): string {
  return protocol.slice(0, -'://'.length);
}

export function sameIdentity(a: DriveIdentity, b: DriveIdentity): boolean {
  return a.protocol === b.protocol && a.id === b.id;
}
