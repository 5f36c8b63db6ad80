import { describe, it, expect } from 'vitest';
import { dedupePorts, isValidPort, normalizePorts, parsePortSpec } from './port-spec.js';
import { PORT_PROFILES, getAvailableProfiles, getPortsForProfile } from './port-profiles.js';
import { DiagnosticsError } from '../utils/errors.js';

function thrownBy(fn: () => unknown): DiagnosticsError {
  try {
    fn();
  } catch (error) {
    if (error instanceof DiagnosticsError) return error;
    throw error;
  }
  throw new Error('Expected a DiagnosticsError');
}

describe('scanner/port-spec', () => {
  describe('parsePortSpec', () => {
    it('parses comma and space separated ports', () => {
      expect(parsePortSpec('22,80 443')).toEqual([22, 80, 443]);
    });

    it('expands inclusive ranges', () => {
      expect(parsePortSpec('8000-8003')).toEqual([8000, 8001, 8002, 8003]);
      expect(parsePortSpec('53, 8080-8081')).toEqual([53, 8080, 8081]);
    });

    it('keeps duplicates for normalizePorts to remove', () => {
      expect(parsePortSpec('80,80')).toEqual([80, 80]);
    });

    it('resolves profile names case-insensitively', () => {
      expect(parsePortSpec('quick')).toEqual([...PORT_PROFILES.quick]);
      expect(parsePortSpec(' WEB ')).toEqual([...PORT_PROFILES.web]);
    });

    it.each(['0', '70000', '1-65536'])('rejects out-of-range spec %s', (spec) => {
      const error = thrownBy(() => parsePortSpec(spec));
      expect(error.kind).toBe('InvalidInput');
      expect(error.reason).toBe('port-out-of-range');
      expect(error.input).toBe(spec);
    });

    it.each(['', 'abc', '90-80', '1-2-3', '80;443', '-5'])('rejects malformed spec "%s"', (spec) => {
      const error = thrownBy(() => parsePortSpec(spec));
      expect(error.kind).toBe('InvalidInput');
      expect(error.reason).toBe('malformed-ports');
    });
  });

  describe('normalizePorts', () => {
    it('de-duplicates and sorts', () => {
      expect(normalizePorts([443, 22, 443, 80, 22])).toEqual([22, 80, 443]);
    });

    it('accepts an empty list', () => {
      expect(normalizePorts([])).toEqual([]);
    });

    it('rejects values outside 1-65535', () => {
      const error = thrownBy(() => normalizePorts([80, 0]));
      expect(error.reason).toBe('port-out-of-range');
      expect(error.input).toBe('0');

      expect(thrownBy(() => normalizePorts([65536])).reason).toBe('port-out-of-range');
      expect(thrownBy(() => normalizePorts([1.5])).reason).toBe('port-out-of-range');
    });

    it('counts ports after de-duplication against the limit', () => {
      expect(normalizePorts([1, 1, 2, 2], 2)).toEqual([1, 2]);

      const error = thrownBy(() => normalizePorts([1, 2, 3], 2));
      expect(error.reason).toBe('too-many-ports');
      expect(error.input).toBe('3 ports');
    });
  });

  it('dedupePorts sorts numerically', () => {
    expect(dedupePorts([1000, 9, 100, 9])).toEqual([9, 100, 1000]);
  });

  it('isValidPort checks integer range', () => {
    expect(isValidPort(1)).toBe(true);
    expect(isValidPort(65535)).toBe(true);
    expect(isValidPort(0)).toBe(false);
    expect(isValidPort(80.5)).toBe(false);
  });

  describe('port profiles', () => {
    it('lists every profile', () => {
      expect(getAvailableProfiles()).toEqual(['quick', 'web', 'standard', 'full']);
    });

    it('hands out copies', () => {
      const ports = getPortsForProfile('quick');
      ports.push(1);

      expect(getPortsForProfile('quick')).toEqual([...PORT_PROFILES.quick]);
    });

    it('only contains valid ports', () => {
      for (const profile of getAvailableProfiles()) {
        expect(getPortsForProfile(profile).every(isValidPort)).toBe(true);
      }
    });
  });
});
