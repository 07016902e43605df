import { getAddress, keccak256, toHex, zeroAddress, type Address } from 'viem';

// Deterministic address for an in-process account or contract, e.g. labelAddress('token:USDC').
export function labelAddress(label: string): Address {
  return getAddress(keccak256(toHex(label)).slice(0, 42));
}

export function addressKey(address: Address): string {
  return address.toLowerCase();
}

export function sameAddress(a: Address | null | undefined, b: Address | null | undefined): boolean {
  if (!a || !b) return false;
  return addressKey(a) === addressKey(b);
}

export function isZeroAddress(address: Address | null | undefined): boolean {
  return !address || sameAddress(address, zeroAddress);
}

export function dedupeAddresses(addresses: readonly Address[]): Address[] {
  const seen = new Set<string>();
  const out: Address[] = [];
  for (const a of addresses) {
    const key = addressKey(a);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(a);
  }
  return out;
}

export function includesAddress(list: readonly Address[], address: Address): boolean {
  return list.some((a) => sameAddress(a, address));
}
