export type DiagnosticsErrorKind = 'InvalidInput' | 'UnresolvableHost';

export type InvalidInputReason =
  | 'empty'
  | 'too-long'
  | 'malformed-ip'
  | 'malformed-hostname'
  | 'malformed-ports'
  | 'port-out-of-range'
  | 'too-many-ports'
  | 'invalid-timeout';

export type UnresolvableHostReason = 'not-found' | 'lookup-timeout' | 'lookup-cancelled';

export type DiagnosticsErrorReason = InvalidInputReason | UnresolvableHostReason;

export interface DiagnosticsFailure {
  kind: DiagnosticsErrorKind;
  reason: DiagnosticsErrorReason;
  input: string;
}

/**
 * Raised before any port is scanned. Everything that happens during a scan
 * is recorded per port instead.
 */
export class DiagnosticsError extends Error {
  readonly kind: DiagnosticsErrorKind;
  readonly reason: DiagnosticsErrorReason;
  readonly input: string;

  private constructor(kind: DiagnosticsErrorKind, reason: DiagnosticsErrorReason, input: string) {
    super(`${kind}: ${reason} (${input})`);
    this.name = 'DiagnosticsError';
    this.kind = kind;
    this.reason = reason;
    this.input = input;
  }

  static invalidInput(reason: InvalidInputReason, input: string): DiagnosticsError {
    return new DiagnosticsError('InvalidInput', reason, input);
  }

  static unresolvableHost(reason: UnresolvableHostReason, input: string): DiagnosticsError {
    return new DiagnosticsError('UnresolvableHost', reason, input);
  }

  toFailure(): DiagnosticsFailure {
    return { kind: this.kind, reason: this.reason, input: this.input };
  }
}

export function isDiagnosticsError(error: unknown): error is DiagnosticsError {
  return error instanceof DiagnosticsError;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
