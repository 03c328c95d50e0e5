import { TransmitError } from '../errors/ErrorHandling.js';

export interface FrameSender {
  send(interfaceName: string, frame: Buffer): Promise<void>;
}

type CapBinding = typeof import('cap');

/** Capture buffer handed to libpcap when the device is opened */
const CAPTURE_BUFFER_SIZE = 10 * 1024 * 1024;
const SNAPSHOT_LENGTH = 65535;

function loadCapBinding(): CapBinding {
  // Optional native dependency, loaded on first use only
  return require('cap');
}

/**
 * Puts raw link-layer frames on an interface through libpcap. Needs the
 * optional `cap` package and the privileges to open the device.
 */
export class PcapFrameSender implements FrameSender {
  constructor(private readonly loadBinding: () => CapBinding = loadCapBinding) {}

  async send(interfaceName: string, frame: Buffer): Promise<void> {
    let binding: CapBinding;
    try {
      binding = this.loadBinding();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransmitError('The libpcap binding (package "cap") is not available', {
        cause: message,
      });
    }

    const cap = new binding.Cap();
    let opened = false;
    try {
      cap.open(interfaceName, '', CAPTURE_BUFFER_SIZE, Buffer.alloc(SNAPSHOT_LENGTH));
      opened = true;
      cap.send(frame, frame.length);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransmitError(`Failed to send frame on ${interfaceName}: ${message}`, {
        interfaceName,
      });
    } finally {
      if (opened) {
        cap.close();
      }
    }
  }
}
