import { ConfigurationError } from '../errors/ErrorHandling.js';

export const ETHERTYPE_IPV4 = 0x0800;
export const IP_PROTOCOL_UDP = 17;

const ETHERNET_HEADER_LENGTH = 14;
const IPV4_HEADER_LENGTH = 20;
const UDP_HEADER_LENGTH = 8;
const DEFAULT_TTL = 64;

export interface UdpPacketSpec {
  srcMac: string;
  dstMac: string;
  srcIp: string;
  dstIp: string;
  srcPort: number;
  dstPort: number;
  payload?: Buffer;
}

export function parseMac(mac: string): Buffer {
  if (!/^[0-9a-f]{2}(:[0-9a-f]{2}){5}$/i.test(mac)) {
    throw new ConfigurationError(`Invalid MAC address "${mac}"`);
  }
  return Buffer.from(mac.split(':').map((octet) => parseInt(octet, 16)));
}

export function parseIpv4(address: string): Buffer {
  const octets = address.split('.');
  if (octets.length !== 4 || !octets.every((octet) => /^\d{1,3}$/.test(octet))) {
    throw new ConfigurationError(`Invalid IPv4 address "${address}"`);
  }
  const values = octets.map(Number);
  if (values.some((value) => value > 255)) {
    throw new ConfigurationError(`Invalid IPv4 address "${address}"`);
  }
  return Buffer.from(values);
}

function parsePort(port: number): number {
  if (!Number.isInteger(port) || port < 0 || port > 0xffff) {
    throw new ConfigurationError(`Invalid UDP port ${port}`);
  }
  return port;
}

/**
 * RFC 1071 ones' complement sum over the given buffers, taken as one stream
 * of 16-bit words (odd total lengths are zero padded).
 */
export function internetChecksum(...parts: Buffer[]): number {
  const data = Buffer.concat(parts);
  let sum = 0;
  for (let i = 0; i < data.length; i += 2) {
    const high = data[i];
    const low = i + 1 < data.length ? data[i + 1] : 0;
    sum += (high << 8) | low;
  }
  while (sum > 0xffff) {
    sum = (sum & 0xffff) + (sum >>> 16);
  }
  return ~sum & 0xffff;
}

/**
 * Encodes one Ethernet II / IPv4 / UDP frame with valid IPv4 and UDP checksums
 */
export function buildUdpFrame(spec: UdpPacketSpec): Buffer {
  const payload = spec.payload ?? Buffer.alloc(0);
  const srcIp = parseIpv4(spec.srcIp);
  const dstIp = parseIpv4(spec.dstIp);
  const udpLength = UDP_HEADER_LENGTH + payload.length;

  const ethernet = Buffer.alloc(ETHERNET_HEADER_LENGTH);
  parseMac(spec.dstMac).copy(ethernet, 0);
  parseMac(spec.srcMac).copy(ethernet, 6);
  ethernet.writeUInt16BE(ETHERTYPE_IPV4, 12);

  const ip = Buffer.alloc(IPV4_HEADER_LENGTH);
  ip.writeUInt8(0x45, 0); // version 4, IHL 5
  ip.writeUInt16BE(IPV4_HEADER_LENGTH + udpLength, 2);
  ip.writeUInt16BE(1, 4); // identification
  ip.writeUInt8(DEFAULT_TTL, 8);
  ip.writeUInt8(IP_PROTOCOL_UDP, 9);
  srcIp.copy(ip, 12);
  dstIp.copy(ip, 16);
  ip.writeUInt16BE(internetChecksum(ip), 10);

  const udp = Buffer.alloc(UDP_HEADER_LENGTH);
  udp.writeUInt16BE(parsePort(spec.srcPort), 0);
  udp.writeUInt16BE(parsePort(spec.dstPort), 2);
  udp.writeUInt16BE(udpLength, 4);

  const pseudoHeader = Buffer.alloc(12);
  srcIp.copy(pseudoHeader, 0);
  dstIp.copy(pseudoHeader, 4);
  pseudoHeader.writeUInt8(IP_PROTOCOL_UDP, 9);
  pseudoHeader.writeUInt16BE(udpLength, 10);
  const udpChecksum = internetChecksum(pseudoHeader, udp, payload);
  // Zero means "no checksum" in UDP over IPv4
  udp.writeUInt16BE(udpChecksum === 0 ? 0xffff : udpChecksum, 6);

  return Buffer.concat([ethernet, ip, udp, payload]);
}
