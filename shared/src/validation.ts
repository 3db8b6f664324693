/**
 * Input Validation Utilities
 * Shared validation helpers for seedsweep packages
 */

import type { ListenAddress } from './types.js';

/**
 * Validates a string against an allowed list
 */
export function validateEnum<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  defaultValue: T
): T {
  if (!value) {
    return defaultValue;
  }
  return allowed.find((candidate) => candidate === value) ?? defaultValue;
}

/**
 * Parses a boolean flag from an environment-style string.
 * Accepts true/false, 1/0, yes/no (case-insensitive).
 */
export function parseBooleanFlag(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      return defaultValue;
  }
}

/**
 * Parses a `host:port` listen address. `:9100` binds every interface and
 * IPv6 hosts are written in brackets (`[::1]:9100`).
 * Returns null when the text is not a usable address.
 */
export function parseListenAddress(text: string): ListenAddress | null {
  const match = text.trim().match(/^(?:\[([^\]]+)\]|([^:]*)):(\d+)$/);
  if (!match) {
    return null;
  }

  const [, ipv6Host, plainHost, portText] = match;
  const port = parseInt(portText, 10);
  if (port < 1 || port > 65535) {
    return null;
  }

  const host = ipv6Host ?? plainHost;
  return { host: host === undefined || host === '' ? '0.0.0.0' : host, port };
}
