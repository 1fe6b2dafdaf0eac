import dns from 'node:dns/promises';
import net from 'node:net';
import os from 'node:os';
import { logger } from './logger.js';

export interface LocalAddress {
  address: string;
  family: 'IPv4' | 'IPv6';
  interfaceName: string;
}

function stripBrackets(host: string): string {
  return host.startsWith('[') && host.endsWith(']') ? host.slice(1, -1) : host;
}

function stripZone(host: string): string {
  const index = host.indexOf('%');
  return index === -1 ? host : host.slice(0, index);
}

export function isValidIPv4(ip: string): boolean {
  return net.isIPv4(ip);
}

export function isValidIPv6(ip: string): boolean {
  return net.isIPv6(stripZone(stripBrackets(ip)));
}

export function isValidIp(ip: string): boolean {
  return isValidIPv4(ip) || isValidIPv6(ip);
}

/** Brackets IPv6 literals for use inside a URI; other hosts pass through. */
export function formatHostForUrl(host: string): string {
  if (isValidIPv6(host)) {
    return `[${stripBrackets(host)}]`;
  }
  return host;
}

/** Removes URI brackets so the host can be handed to a socket bind. */
export function hostForBind(host: string): string {
  return stripBrackets(host);
}

export function isWildcardAddress(host: string): boolean {
  const bare = stripBrackets(host);
  return bare === '0.0.0.0' || bare === '::' || bare === '';
}

/**
 * Splits `host:port`, `[v6]:port`, or a bare host.
 *
 *   parseAddress('192.168.1.1:8080') // { host: '192.168.1.1', port: 8080 }
 *   parseAddress('[::1]:8080')       // { host: '::1', port: 8080 }
 *   parseAddress('::1')              // { host: '::1', port: null }
 */
export function parseAddress(address: string): { host: string; port: number | null } {
  const trimmed = address.trim();

  if (trimmed.startsWith('[')) {
    const end = trimmed.indexOf(']');
    if (end !== -1) {
      const host = trimmed.slice(1, end);
      const rest = trimmed.slice(end + 1);
      if (rest.startsWith(':')) {
        const port = toPort(rest.slice(1));
        if (port !== null) return { host, port };
      }
      return { host, port: null };
    }
  }

  // A bare IPv6 literal has several colons and no port.
  if (isValidIPv6(trimmed)) {
    return { host: trimmed, port: null };
  }

  const separator = trimmed.lastIndexOf(':');
  if (separator > 0) {
    const port = toPort(trimmed.slice(separator + 1));
    if (port !== null) {
      return { host: trimmed.slice(0, separator), port };
    }
  }

  return { host: trimmed, port: null };
}

function toPort(text: string): number | null {
  if (!/^\d+$/.test(text)) return null;
  const port = Number(text);
  return port >= 0 && port <= 65535 ? port : null;
}

/** Non-loopback, non-link-local addresses of every interface. */
export function getLocalAddresses(): LocalAddress[] {
  const result: LocalAddress[] = [];
  const interfaces = os.networkInterfaces();
  for (const [interfaceName, entries] of Object.entries(interfaces)) {
    for (const entry of entries ?? []) {
      if (entry.internal) continue;
      if (entry.family === 'IPv4') {
        result.push({ address: entry.address, family: 'IPv4', interfaceName });
      } else if (entry.family === 'IPv6') {
        const address = stripZone(entry.address);
        if (address.toLowerCase().startsWith('fe80:')) continue;
        result.push({ address, family: 'IPv6', interfaceName });
      }
    }
  }
  return result;
}

function isGlobalIPv6(address: string): boolean {
  const lower = address.toLowerCase();
  // fc00::/7 is unique-local
  return !(lower.startsWith('fc') || lower.startsWith('fd') || lower === '::1');
}

/**
 * Address to advertise to viewers. With `preferIpv6`, a global IPv6 address
 * wins, then any IPv6; otherwise IPv4 comes first. Falls back to loopback.
 */
export function getLocalIp(preferIpv6 = true, addresses = getLocalAddresses()): string {
  const v6 = addresses.filter((entry) => entry.family === 'IPv6').map((entry) => entry.address);
  const v4 = addresses.filter((entry) => entry.family === 'IPv4').map((entry) => entry.address);

  if (preferIpv6) {
    const global = v6.find(isGlobalIPv6);
    if (global) return global;
    if (v6[0]) return v6[0];
  }
  return v4[0] ?? v6[0] ?? '127.0.0.1';
}

export async function resolveHostname(hostname: string, preferIpv6 = true): Promise<string | null> {
  try {
    const records = await dns.lookup(hostname, { all: true });
    const v6 = records.find((record) => record.family === 6);
    const v4 = records.find((record) => record.family === 4);
    const chosen = preferIpv6 ? (v6 ?? v4) : (v4 ?? v6);
    return chosen?.address ?? null;
  } catch (error) {
    logger.warn({ err: error, hostname }, 'hostname_resolve_failed');
    return null;
  }
}
