import { askValidated, DEFAULT_RETRY_LIMIT, type Validator } from '../prompts/menu.js';
import type { Prompter } from '../prompts/prompter.js';

export const DEFAULT_VNET_ADDRESS_PREFIX = '10.10.0.0/16';
export const DEFAULT_SUBNET_ADDRESS_PREFIX = '10.10.1.0/24';

export interface Cidr {
  address: number;
  bits: number;
}

const CIDR_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/;

function maskFor(bits: number): number {
  return bits === 0 ? 0 : (0xffffffff << (32 - bits)) >>> 0;
}

export function parseCidr(value: string): Cidr | null {
  const match = CIDR_PATTERN.exec(value.trim());
  if (!match) return null;

  const octets = match.slice(1, 5).map(o => parseInt(o, 10));
  const bits = parseInt(match[5], 10);
  if (octets.some(o => o > 255) || bits > 32) return null;

  const address = octets.reduce((acc, o) => ((acc << 8) | o) >>> 0, 0);
  return { address, bits };
}

export function validateCidr(value: string): string | null {
  const cidr = parseCidr(value);
  if (!cidr) return `"${value}" is not a valid IPv4 CIDR range (e.g. 10.10.0.0/16)`;
  if (cidr.bits < 8 || cidr.bits > 29) return 'Prefix length must be between /8 and /29';
  if ((cidr.address & maskFor(cidr.bits)) >>> 0 !== cidr.address) {
    return `"${value}" is not a network address for a /${cidr.bits}`;
  }
  return null;
}

/**
 * True when `inner` lies entirely inside `outer`
 */
export function cidrContains(outer: string, inner: string): boolean {
  const a = parseCidr(outer);
  const b = parseCidr(inner);
  if (!a || !b || b.bits < a.bits) return false;
  const mask = maskFor(a.bits);
  return (a.address & mask) >>> 0 === (b.address & mask) >>> 0;
}

export function subnetValidator(vnetAddressPrefix: string): Validator {
  return value => {
    const problem = validateCidr(value);
    if (problem) return problem;
    if (!cidrContains(vnetAddressPrefix, value)) {
      return `Subnet ${value} is not inside the virtual network range ${vnetAddressPrefix}`;
    }
    return null;
  };
}

export interface NetworkRanges {
  vnetAddressPrefix: string;
  subnetAddressPrefix: string;
}

export async function collectNetworkRanges(
  prompter: Prompter,
  defaults: Partial<NetworkRanges> = {},
  retryLimit = DEFAULT_RETRY_LIMIT
): Promise<NetworkRanges> {
  const vnetAddressPrefix = await askValidated(prompter, 'Virtual network address range', validateCidr, {
    default: defaults.vnetAddressPrefix ?? DEFAULT_VNET_ADDRESS_PREFIX,
    retryLimit,
  });

  const subnetDefault = defaults.subnetAddressPrefix && cidrContains(vnetAddressPrefix, defaults.subnetAddressPrefix)
    ? defaults.subnetAddressPrefix
    : cidrContains(vnetAddressPrefix, DEFAULT_SUBNET_ADDRESS_PREFIX)
      ? DEFAULT_SUBNET_ADDRESS_PREFIX
      : undefined;

  const subnetAddressPrefix = await askValidated(
    prompter,
    'Subnet address range',
    subnetValidator(vnetAddressPrefix),
    { default: subnetDefault, retryLimit }
  );

  return { vnetAddressPrefix, subnetAddressPrefix };
}
