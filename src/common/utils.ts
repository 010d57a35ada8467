import { randomBytes } from 'crypto';
import { NetworkAddress } from '../types';

/**
 * Generate a random ID using crypto random bytes
 */
export function createId(): string {
  return randomBytes(8).toString('hex');
}

/**
 * Validate if a string is a valid address (IP or hostname)
 */
export function isValidAddress(address: string): boolean {
  // IPv4 pattern
  const ipv4Pattern = /^(\d{1,3}\.){3}\d{1,3}$/;
  // Basic hostname pattern
  const hostnamePattern = /^[a-zA-Z0-9.-]+$/;

  if (ipv4Pattern.test(address)) {
    // Validate IPv4 ranges
    const parts = address.split('.').map(Number);
    return parts.every(part => part >= 0 && part <= 255);
  }

  return hostnamePattern.test(address) && address.length > 0;
}

/**
 * Split a `host:port` string into its parts
 */
export function parseAddress(value: string): NetworkAddress {
  const separator = value.lastIndexOf(':');
  if (separator <= 0) {
    throw new Error(`Address must be in host:port form, got "${value}"`);
  }

  const host = value.slice(0, separator);
  const portText = value.slice(separator + 1);
  const port = Number(portText);

  if (!isValidAddress(host)) {
    throw new Error(`Invalid host "${host}"`);
  }
  if (!/^\d+$/.test(portText) || port < 1 || port > 65535) {
    throw new Error(`Invalid port "${portText}"`);
  }

  return { host, port };
}

export function formatAddress(address: NetworkAddress): string {
  return `${address.host}:${address.port}`;
}

/**
 * Narrow an unknown value to a plain object record
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
