import dns from 'dns/promises';
import net from 'net';
import { DiagnosticsError } from '../utils/errors.js';
import type {
  AddressFamily,
  LookupAddress,
  LookupFunction,
  Target,
  TargetResolverOptions,
} from '../types/target.js';

const HOSTNAME_LABEL = /^[a-z0-9_](?:[a-z0-9_-]{0,61}[a-z0-9_])?$/;
const DOTTED_NUMERIC = /^[0-9.]+$/;
const BRACKETED = /^\[(.+)\]$/;
const MAX_HOSTNAME_LENGTH = 253;

// IPv4 first, whatever order the OS returns
const systemLookup: LookupFunction = (hostname) => dns.lookup(hostname, { verbatim: false });

export function isValidHostname(hostname: string): boolean {
  if (hostname.length === 0 || hostname.length > MAX_HOSTNAME_LENGTH) return false;
  return hostname.split('.').every((label) => HOSTNAME_LABEL.test(label));
}

function familyOf(address: string): AddressFamily | null {
  const version = net.isIP(address);
  if (version === 4) return 'IPv4';
  if (version === 6) return 'IPv6';
  return null;
}

/**
 * Turns raw user text into a connectable {@link Target}.
 *
 * Literal addresses are parsed without any I/O. Hostnames get exactly one
 * lookup, bounded by `resolveTimeoutMs`.
 */
export class TargetResolver {
  private readonly maxHostLength: number;
  private readonly resolveTimeoutMs: number;
  private readonly lookup: LookupFunction;

  constructor(options: TargetResolverOptions = {}) {
    this.maxHostLength = options.maxHostLength ?? 255;
    this.resolveTimeoutMs = options.resolveTimeoutMs ?? 3000;
    this.lookup = options.lookup ?? systemLookup;
  }

  async resolve(input: string, signal?: AbortSignal): Promise<Target> {
    const host = this.normalize(input);
    const literalFamily = familyOf(host);

    if (literalFamily) {
      return Object.freeze({
        originalInput: input,
        resolvedAddress: host,
        addressFamily: literalFamily,
        hostname: null,
      });
    }

    if (DOTTED_NUMERIC.test(host) || host.includes(':')) {
      throw DiagnosticsError.invalidInput('malformed-ip', input);
    }

    if (!isValidHostname(host)) {
      throw DiagnosticsError.invalidInput('malformed-hostname', input);
    }

    const { address } = await this.lookupWithTimeout(host, input, signal);
    const family = familyOf(address);

    if (!family) {
      throw DiagnosticsError.unresolvableHost('not-found', input);
    }

    return Object.freeze({
      originalInput: input,
      resolvedAddress: address,
      addressFamily: family,
      hostname: host,
    });
  }

  // Strips URL scheme/path, IPv6 brackets and a trailing root dot
  private normalize(input: string): string {
    let host = input.trim();

    if (host.length === 0) {
      throw DiagnosticsError.invalidInput('empty', input);
    }
    if (host.length > this.maxHostLength) {
      throw DiagnosticsError.invalidInput('too-long', input);
    }

    if (host.includes('://')) {
      try {
        host = new URL(host).hostname;
      } catch {
        throw DiagnosticsError.invalidInput('malformed-hostname', input);
      }
    }

    const bracketed = host.match(BRACKETED);
    if (bracketed?.[1]) {
      host = bracketed[1];
    }

    host = host.toLowerCase();
    if (host.length > 1 && host.endsWith('.')) {
      host = host.slice(0, -1);
    }

    if (host.length === 0) {
      throw DiagnosticsError.invalidInput('empty', input);
    }

    return host;
  }

  private async lookupWithTimeout(
    hostname: string,
    input: string,
    signal: AbortSignal | undefined
  ): Promise<LookupAddress> {
    if (signal?.aborted) {
      throw DiagnosticsError.unresolvableHost('lookup-cancelled', input);
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    let detach = (): void => {};

    const stopped = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(DiagnosticsError.unresolvableHost('lookup-timeout', input));
      }, this.resolveTimeoutMs);

      if (signal) {
        const source: AbortSignal = signal;
        const onAbort = (): void => reject(DiagnosticsError.unresolvableHost('lookup-cancelled', input));
        source.addEventListener('abort', onAbort, { once: true });
        detach = () => source.removeEventListener('abort', onAbort);
      }
    });

    const lookup = this.lookup(hostname).catch((): never => {
      throw DiagnosticsError.unresolvableHost('not-found', input);
    });

    try {
      return await Promise.race([lookup, stopped]);
    } finally {
      clearTimeout(timer);
      detach();
    }
  }
}
