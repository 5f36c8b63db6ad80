import { DiagnosticsError } from '../utils/errors.js';
import { getPortsForProfile, isValidProfile } from './port-profiles.js';

export const MIN_PORT = 1;
export const MAX_PORT = 65535;

// "80" or "8000-8010"
const PORT_ENTRY = /^(\d{1,5})(?:-(\d{1,5}))?$/;

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= MIN_PORT && port <= MAX_PORT;
}

/**
 * Parses user text such as `22,80 443 8000-8010` or a profile name
 * (`quick`, `web`, `standard`, `full`) into a port list. The list may contain
 * duplicates; see {@link normalizePorts}.
 */
export function parsePortSpec(spec: string): number[] {
  const trimmed = spec.trim().toLowerCase();

  if (isValidProfile(trimmed)) {
    return getPortsForProfile(trimmed);
  }

  const entries = trimmed.split(/[\s,]+/).filter((entry) => entry.length > 0);
  if (entries.length === 0) {
    throw DiagnosticsError.invalidInput('malformed-ports', spec);
  }

  const ports: number[] = [];

  for (const entry of entries) {
    const match = entry.match(PORT_ENTRY);
    if (!match?.[1]) {
      throw DiagnosticsError.invalidInput('malformed-ports', spec);
    }

    const start = Number(match[1]);
    const end = match[2] ? Number(match[2]) : start;

    if (!isValidPort(start) || !isValidPort(end)) {
      throw DiagnosticsError.invalidInput('port-out-of-range', spec);
    }
    if (end < start) {
      throw DiagnosticsError.invalidInput('malformed-ports', spec);
    }

    for (let port = start; port <= end; port++) {
      ports.push(port);
    }
  }

  return ports;
}

export function dedupePorts(ports: readonly number[]): number[] {
  return [...new Set(ports)].sort((a, b) => a - b);
}

/**
 * Range-checks, de-duplicates and sorts a port list, rejecting lists that are
 * still larger than `maxPorts` afterwards.
 */
export function normalizePorts(ports: readonly number[], maxPorts = MAX_PORT): number[] {
  const invalid = ports.find((port) => !isValidPort(port));
  if (invalid !== undefined) {
    throw DiagnosticsError.invalidInput('port-out-of-range', String(invalid));
  }

  const unique = dedupePorts(ports);
  if (unique.length > maxPorts) {
    throw DiagnosticsError.invalidInput('too-many-ports', `${unique.length} ports`);
  }

  return unique;
}
