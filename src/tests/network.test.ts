import { describe, expect, it } from 'vitest';
import {
  formatHostForUrl,
  getLocalIp,
  hostForBind,
  isValidIPv4,
  isValidIPv6,
  isValidIp,
  isWildcardAddress,
  parseAddress,
  type LocalAddress,
} from '../lib/network.js';

describe('address validation', () => {
  it('accepts dotted quads and rejects out-of-range octets', () => {
    expect(isValidIPv4('192.168.1.20')).toBe(true);
    expect(isValidIPv4('256.1.1.1')).toBe(false);
    expect(isValidIPv4('example.com')).toBe(false);
  });

  it('accepts IPv6 literals with brackets or a zone', () => {
    expect(isValidIPv6('2001:db8::1')).toBe(true);
    expect(isValidIPv6('[2001:db8::1]')).toBe(true);
    expect(isValidIPv6('fe80::1%eth0')).toBe(true);
    expect(isValidIPv6('192.168.1.20')).toBe(false);
    expect(isValidIp('::1')).toBe(true);
    expect(isValidIp('localhost')).toBe(false);
  });
});

describe('formatHostForUrl', () => {
  it('brackets IPv6 literals once', () => {
    expect(formatHostForUrl('2001:db8::1')).toBe('[2001:db8::1]');
    expect(formatHostForUrl('[2001:db8::1]')).toBe('[2001:db8::1]');
  });

  it('leaves IPv4 addresses and hostnames alone', () => {
    expect(formatHostForUrl('10.0.0.5')).toBe('10.0.0.5');
    expect(formatHostForUrl('party.local')).toBe('party.local');
  });

  it('is undone by hostForBind', () => {
    expect(hostForBind(formatHostForUrl('::'))).toBe('::');
  });
});

describe('isWildcardAddress', () => {
  it('recognises the any-addresses of both families', () => {
    expect(isWildcardAddress('0.0.0.0')).toBe(true);
    expect(isWildcardAddress('::')).toBe(true);
    expect(isWildcardAddress('[::]')).toBe(true);
    expect(isWildcardAddress('127.0.0.1')).toBe(false);
  });
});

describe('parseAddress', () => {
  it('splits host and port', () => {
    expect(parseAddress('192.168.1.1:8080')).toEqual({ host: '192.168.1.1', port: 8080 });
    expect(parseAddress('party.local:10086')).toEqual({ host: 'party.local', port: 10086 });
  });

  it('handles bracketed and bare IPv6', () => {
    expect(parseAddress('[::1]:8080')).toEqual({ host: '::1', port: 8080 });
    expect(parseAddress('[2001:db8::1]')).toEqual({ host: '2001:db8::1', port: null });
    expect(parseAddress('2001:db8::1')).toEqual({ host: '2001:db8::1', port: null });
  });

  it('returns a null port when there is none or it is invalid', () => {
    expect(parseAddress('10.0.0.5')).toEqual({ host: '10.0.0.5', port: null });
    expect(parseAddress('10.0.0.5:99999')).toEqual({ host: '10.0.0.5:99999', port: null });
  });
});

describe('getLocalIp', () => {
  const addresses: LocalAddress[] = [
    { address: 'fd00::5', family: 'IPv6', interfaceName: 'eth0' },
    { address: '192.168.1.20', family: 'IPv4', interfaceName: 'eth0' },
    { address: '2001:db8::20', family: 'IPv6', interfaceName: 'eth0' },
  ];

  it('prefers a global IPv6 address', () => {
    expect(getLocalIp(true, addresses)).toBe('2001:db8::20');
  });

  it('falls back to unique-local IPv6 before IPv4 when preferring IPv6', () => {
    expect(getLocalIp(true, addresses.slice(0, 2))).toBe('fd00::5');
  });

  it('picks IPv4 first when IPv6 is not preferred', () => {
    expect(getLocalIp(false, addresses)).toBe('192.168.1.20');
  });

  it('falls back to loopback with no interfaces', () => {
    expect(getLocalIp(true, [])).toBe('127.0.0.1');
  });
});
