// IPv4 helpers for picking the local endpoint that can reach a device.

export type Subnet = { network: number; prefix: number };

export function parseIPv4(address: string): number | null {
  const parts = address.trim().split(".");
  if (parts.length !== 4) return null;
  let value = 0;
  for (const part of parts) {
    if (!/^\d{1,3}$/.test(part)) return null;
    const octet = Number(part);
    if (octet > 255) return null;
    value = value * 256 + octet;
  }
  return value;
}

function octets(value: number): [number, number, number, number] {
  return [(value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff];
}

function maskBits(prefix: number): number {
  return prefix === 0 ? 0 : (0xffffffff << (32 - prefix)) >>> 0;
}

/**
 * Accepts "/24", "24" or a contiguous dotted mask such as "255.255.254.0".
 * Returns the prefix length, or null when the mask cannot be used.
 */
export function parseNetworkMask(mask: string): number | null {
  const trimmed = mask.trim();
  const cidr = /^\/?(\d{1,2})$/.exec(trimmed);
  if (cidr) {
    const prefix = Number(cidr[1]);
    return prefix <= 32 ? prefix : null;
  }

  const value = parseIPv4(trimmed);
  if (value === null) return null;
  const inverted = ~value >>> 0;
  if ((inverted & (inverted + 1)) !== 0) return null;
  let hostBits = 0;
  for (let rest = inverted; rest !== 0; rest >>>= 1) hostBits++;
  return 32 - hostBits;
}

export function subnetOf(address: string, mask: string): Subnet | null {
  const ip = parseIPv4(address);
  const prefix = parseNetworkMask(mask);
  if (ip === null || prefix === null) return null;
  return { network: (ip & maskBits(prefix)) >>> 0, prefix };
}

export function inSubnet(address: string, subnet: Subnet): boolean {
  const ip = parseIPv4(address);
  if (ip === null) return false;
  return (ip & maskBits(subnet.prefix)) >>> 0 === subnet.network;
}

/**
 * Approximate private-network match used only when no masks are configured:
 * same /24, both in 192.168.0.0/16, or both in 10.0.0.0/8. Other layouts
 * (172.16/12, routed subnets) need explicit masks.
 */
export function likelySameNetwork(local: string, destination: string): boolean {
  const a = parseIPv4(local);
  const b = parseIPv4(destination);
  if (a === null || b === null) return false;
  const [a0, a1, a2] = octets(a);
  const [b0, b1, b2] = octets(b);
  if (a0 === b0 && a1 === b1 && a2 === b2) return true;
  if (a0 === 192 && a1 === 168 && b0 === 192 && b1 === 168) return true;
  return a0 === 10 && b0 === 10;
}

export function isMulticast(address: string): boolean {
  const ip = parseIPv4(address);
  if (ip === null) return false;
  const first = octets(ip)[0];
  return first >= 224 && first <= 239;
}
