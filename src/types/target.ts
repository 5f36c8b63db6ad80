// Target types

export type AddressFamily = 'IPv4' | 'IPv6';

export interface Target {
  readonly originalInput: string;
  readonly resolvedAddress: string;
  readonly addressFamily: AddressFamily;
  readonly hostname: string | null;
}

export interface LookupAddress {
  address: string;
  family: number;
}

export type LookupFunction = (hostname: string) => Promise<LookupAddress>;

export interface TargetResolverOptions {
  maxHostLength?: number | undefined;
  resolveTimeoutMs?: number | undefined;
  lookup?: LookupFunction | undefined;
}
