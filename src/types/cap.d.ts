// The libpcap binding ships no type declarations; only the calls made here are declared.
declare module 'cap' {
  export class Cap {
    open(device: string, filter: string, bufSize: number, buffer: Buffer): string;
    send(buffer: Buffer, nBytes?: number): void;
    close(): void;
  }
}
