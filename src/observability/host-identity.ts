import os from 'os';
import { isMainThread, threadId } from 'worker_threads';

import { describeError, ResolutionFailedError } from './errors';
import { createDiagnosticsLogger } from './logger';

export const UNKNOWN_HOST = 'unknown-host';
export const UNKNOWN_IP = 'unknown-ip';

export interface HostIdentity {
  readonly name: string;
  readonly ip: string;
}

export interface HostIdentityResolver {
  hostname(): string;
  addresses(): NodeJS.Dict<os.NetworkInterfaceInfo[]>;
}

const systemResolver: HostIdentityResolver = {
  hostname: () => os.hostname(),
  addresses: () => os.networkInterfaces(),
};

const log = createDiagnosticsLogger('host-identity');

/**
 * First external IPv4 address, else the first IPv4 address of any kind
 */
const pickAddress = (interfaces: NodeJS.Dict<os.NetworkInterfaceInfo[]>): string | undefined => {
  const ipv4 = Object.values(interfaces)
    .flatMap((entries) => entries ?? [])
    .filter((entry) => entry.family === 'IPv4');

  return (ipv4.find((entry) => !entry.internal) ?? ipv4[0])?.address;
};

const attempt = (what: string, lookup: () => string | undefined, sentinel: string): string => {
  try {
    const value = lookup();
    if (value === undefined || value.trim().length === 0) {
      throw new ResolutionFailedError(`No ${what} available`);
    }
    return value;
  } catch (error) {
    log.warn({ reason: describeError(error), sentinel }, `Could not resolve ${what}`);
    return sentinel;
  }
};

/**
 * Resolve host name and IP without throwing; each part degrades to its sentinel
 * independently.
 */
export const resolveHostIdentity = (resolver: HostIdentityResolver = systemResolver): HostIdentity =>
  Object.freeze({
    name: attempt('host name', () => resolver.hostname(), UNKNOWN_HOST),
    ip: attempt('host IP address', () => pickAddress(resolver.addresses()), UNKNOWN_IP),
  });

let cached: HostIdentity | undefined;

/**
 * Process-wide host identity, resolved on first use and cached
 */
export const getHostIdentity = (): HostIdentity => {
  if (!cached) {
    cached = resolveHostIdentity();
  }
  return cached;
};

export const currentThreadName = (): string => (isMainThread ? 'main' : `worker-${threadId}`);
