// src/utils/utils.ts

import { networkInterfaces } from 'node:os';

const COLUMN_WIDTH = 30;

/**
 * Canonical form of a model key: trimmed, lower case, and with the first
 * underscore read as the manufacturer separator when no slash is present.
 * @example normalizeModelKey('McIntosh_MX160') // 'mcintosh/mx160'
 */
export function normalizeModelKey(key: string): string {
  const lowered = key.trim().toLowerCase();
  if (lowered.includes('/')) return lowered;
  return lowered.replace('_', '/');
}

/** Underscore spelling of a canonical key, as accepted on the command line. */
export function underscoreModelKey(key: string): string {
  return key.replace('/', '_');
}

/**
 * Lays entries out in fixed-width columns that fit the terminal.
 * @param width - Available width; falls back to 80 when unknown
 */
export function formatDataIntoColumns(data: readonly string[], width: number = 80): string {
  if (data.length === 0) return '';

  const perRow = Math.max(1, Math.floor(width / COLUMN_WIDTH));
  const lines: string[] = [];
  for (let i = 0; i < data.length; i += perRow) {
    lines.push(
      data
        .slice(i, i + perRow)
        .map(entry => entry.padEnd(COLUMN_WIDTH))
        .join('')
    );
  }
  return lines.join('\n');
}

/** Non-loopback IPv4 addresses of this host. */
export function hostIp4Addresses(): string[] {
  const addresses: string[] = [];
  for (const entries of Object.values(networkInterfaces())) {
    for (const entry of entries ?? []) {
      if (entry.family === 'IPv4' && !entry.internal) addresses.push(entry.address);
    }
  }
  return addresses;
}

/**
 * Formats a value for logs, showing control characters.
 */
export function printable(text: string): string {
  return JSON.stringify(text);
}
