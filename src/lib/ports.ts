import net from 'node:net';
import { logger } from './logger.js';

const MAX_PORT = 65535;

// Errors meaning the address family itself is missing on this host, not that
// the port is taken.
const FAMILY_UNSUPPORTED = new Set(['EAFNOSUPPORT', 'EADDRNOTAVAIL', 'EPROTONOSUPPORT']);

export type ProbeResult = 'free' | 'busy' | 'unsupported';

export interface PortProbeOptions {
  /**
   * Judge the port on IPv4 alone when the host has no IPv6 stack. Off by
   * default: a failed `::` probe of any kind rejects the port.
   */
  allowMissingIpv6?: boolean;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function probe(host: '0.0.0.0' | '::', port: number): Promise<ProbeResult> {
  return new Promise((resolve) => {
    const server = net.createServer();
    server.unref();
    server.once('error', (error) => {
      const code = errorCode(error);
      if (host === '::' && code && FAMILY_UNSUPPORTED.has(code)) {
        resolve('unsupported');
        return;
      }
      resolve('busy');
    });
    server.listen({ host, port, ipv6Only: host === '::', exclusive: true, backlog: 1 }, () => {
      server.close(() => resolve('free'));
    });
  });
}

export function judgeProbes(v4: ProbeResult, v6: ProbeResult, options: PortProbeOptions = {}): boolean {
  if (v4 !== 'free') return false;
  if (v6 === 'free') return true;
  return v6 === 'unsupported' && options.allowMissingIpv6 === true;
}

/** A port is available when a test listen succeeds on both 0.0.0.0 and :: (v6-only). */
export async function isPortAvailable(port: number, options: PortProbeOptions = {}): Promise<boolean> {
  if (!Number.isInteger(port) || port < 1 || port > MAX_PORT) return false;
  const v4 = await probe('0.0.0.0', port);
  if (v4 !== 'free') return false;
  return judgeProbes(v4, await probe('::', port), options);
}

/**
 * Probes `start`, `start + 1`, ... and returns the first available port, or
 * null once `maxAttempts` ports have been tried. Nothing is reserved: the
 * caller has to bind the returned port right away.
 */
export async function findAvailablePort(
  start: number,
  maxAttempts = 100,
  isExcluded: (port: number) => boolean = () => false,
  options: PortProbeOptions = {},
): Promise<number | null> {
  for (let i = 0; i < maxAttempts; i += 1) {
    const port = start + i;
    if (port > MAX_PORT) break;
    if (isExcluded(port)) continue;
    if (await isPortAvailable(port, options)) {
      return port;
    }
  }
  logger.debug({ start, maxAttempts }, 'port_search_exhausted');
  return null;
}

export type PortFinder = typeof findAvailablePort;
