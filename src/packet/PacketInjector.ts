import type { Logger } from 'winston';
import { ConfigurationError } from '../errors/ErrorHandling.js';
import { FrameSender } from './FrameSender.js';
import { buildUdpFrame, UdpPacketSpec } from './frame.js';

export interface PacketSelection {
  interfaceName: string;
  packet: UdpPacketSpec;
}

const HOST_A_MAC = '00:11:11:00:00:00';
const HOST_B_MAC = '00:22:22:00:00:00';

const COMMON_FIELDS = {
  srcIp: '0.0.0.0',
  dstIp: '1.2.3.4',
  srcPort: 1234,
  dstPort: 2345,
} as const;

/**
 * Selector "0" sends from host A out of veth0; "1" sends the mirror-image
 * frame from host B out of veth2.
 */
export const PACKET_SELECTIONS: Readonly<Record<'0' | '1', PacketSelection>> = {
  '0': {
    interfaceName: 'veth0',
    packet: { ...COMMON_FIELDS, srcMac: HOST_A_MAC, dstMac: HOST_B_MAC },
  },
  '1': {
    interfaceName: 'veth2',
    packet: { ...COMMON_FIELDS, srcMac: HOST_B_MAC, dstMac: HOST_A_MAC },
  },
};

export function selectPacket(selector: string): PacketSelection {
  if (selector === '0' || selector === '1') {
    return PACKET_SELECTIONS[selector];
  }
  throw new ConfigurationError(`Invalid packet selector "${selector}" (expected 0 or 1)`, {
    selector,
  });
}

/**
 * Builds the selected frame and sends it exactly once
 */
export async function injectPacket(
  selector: string,
  sender: FrameSender,
  logger: Logger,
): Promise<void> {
  const { interfaceName, packet } = selectPacket(selector);
  const frame = buildUdpFrame(packet);
  logger.verbose(
    `Sending ${frame.length} byte frame ${packet.srcMac} -> ${packet.dstMac} on ${interfaceName}`,
  );
  await sender.send(interfaceName, frame);
  logger.info(`Sent UDP ${packet.srcPort} -> ${packet.dstIp}:${packet.dstPort} on ${interfaceName}`);
}
