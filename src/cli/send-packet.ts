#!/usr/bin/env node
import path from 'path';
import type { Logger } from 'winston';
import { toRunnerError } from '../errors/ErrorHandling.js';
import { FrameSender, PcapFrameSender } from '../packet/FrameSender.js';
import { injectPacket } from '../packet/PacketInjector.js';
import { createLogger } from '../utils/Logger.js';

export const SEND_PACKET_BIN = 'p4test-send-packet';
export const SEND_PACKET_USAGE = `Usage: ${SEND_PACKET_BIN} <0|1>`;

export interface SendPacketOptions {
  sender?: FrameSender;
  logger?: Logger;
}

/**
 * Sends one test frame; resolves to the process exit status
 */
export async function sendPacketMain(
  argv: string[],
  options: SendPacketOptions = {},
): Promise<number> {
  const logger = options.logger ?? createLogger();

  if (argv.length !== 1) {
    logger.error(SEND_PACKET_USAGE);
    return 1;
  }

  try {
    await injectPacket(argv[0], options.sender ?? new PcapFrameSender(), logger);
    return 0;
  } catch (error) {
    const runnerError = toRunnerError(error);
    logger.error(runnerError.message, { code: runnerError.code });
    return 1;
  }
}

/**
 * True when `mainFile` is this script, run directly or through the installed
 * bin link (npm keeps the link's name in argv[1]).
 */
export function isMainModule(mainFile: string | undefined = process.argv[1]): boolean {
  if (!mainFile) return false;
  const base = path.basename(mainFile);
  return (
    base === SEND_PACKET_BIN ||
    base === 'send-packet.js' ||
    base === 'send-packet.ts'
  );
}

if (isMainModule()) {
  sendPacketMain(process.argv.slice(2))
    .then((status) => {
      process.exitCode = status;
    })
    .catch((error) => {
      console.error('Unhandled error:', error);
      process.exitCode = 1;
    });
}
