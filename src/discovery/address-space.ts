import { networkInterfaces, type NetworkInterfaceInfo } from 'node:os';
import type { Subnet } from './types.js';

/**
 * Hostnames probed on every discovery in addition to the subnet sweep.
 */
export const WELL_KNOWN_HOSTNAMES: readonly string[] = [
  'raspberrypi.local',
  'raspberrypi',
  'voicerecog.local',
  'voice-pi.local',
  'pi.local',
];

export type InterfaceTable = NodeJS.Dict<NetworkInterfaceInfo[]>;

function parseOctets(address: string): number[] {
  const parts = address.split('.');
  if (parts.length !== 4) {
    throw new Error(`Not an IPv4 address: ${address}`);
  }
  return parts.map((part) => {
    const value = Number(part);
    if (part === '' || !Number.isInteger(value) || value < 0 || value > 255) {
      throw new Error(`Not an IPv4 address: ${address}`);
    }
    return value;
  });
}

function popcount(byte: number): number {
  let count = 0;
  let value = byte;
  while (value) {
    count += value & 1;
    value >>= 1;
  }
  return count;
}

/**
 * CIDR prefix length of a dotted netmask (sum of set bits per byte).
 */
export function prefixLength(netmask: string): number {
  return parseOctets(netmask).reduce((sum, byte) => sum + popcount(byte), 0);
}

/**
 * Network containing `address` under `netmask`, by bytewise AND.
 */
export function subnetOf(address: string, netmask: string): Subnet {
  const addressBytes = parseOctets(address);
  const maskBytes = parseOctets(netmask);
  const network = addressBytes.map((byte, i) => byte & maskBytes[i]).join('.');
  const prefix = prefixLength(netmask);
  return { network, prefix, cidr: `${network}/${prefix}` };
}

/**
 * Parse "a.b.c.d/nn" into a Subnet.
 */
export function parseCidr(cidr: string): Subnet {
  const [address, prefixText] = cidr.split('/');
  const prefix = Number(prefixText);
  if (!address || !Number.isInteger(prefix) || prefix < 0 || prefix > 32) {
    throw new Error(`Invalid CIDR: ${cidr}`);
  }
  const mask = prefix === 0 ? 0 : (0xffffffff << (32 - prefix)) >>> 0;
  const netmask = [24, 16, 8, 0].map((shift) => (mask >>> shift) & 0xff).join('.');
  return subnetOf(address, netmask);
}

/**
 * IPv4 subnets of every non-internal interface, each listed once.
 */
export function enumerateSubnets(interfaces: InterfaceTable = networkInterfaces()): Subnet[] {
  const subnets = new Map<string, Subnet>();

  for (const [name, infos] of Object.entries(interfaces)) {
    for (const info of infos ?? []) {
      if (info.family !== 'IPv4' || info.internal) {
        continue;
      }
      const subnet = subnetOf(info.address, info.netmask);
      if (!subnets.has(subnet.cidr)) {
        subnets.set(subnet.cidr, { ...subnet, interfaceName: name });
      }
    }
  }

  return Array.from(subnets.values());
}

/**
 * The 254 host candidates {first three octets}.1 … .254 of a subnet.
 * Wider or narrower prefixes are still swept as a /24 around the network address.
 */
export function hostCandidates(subnet: Subnet): string[] {
  const [a, b, c] = parseOctets(subnet.network);
  const candidates: string[] = [];
  for (let host = 1; host <= 254; host++) {
    candidates.push(`${a}.${b}.${c}.${host}`);
  }
  return candidates;
}
