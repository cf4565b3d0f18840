/**
 * In-process stand-in for a serial port
 */

import type { LinkPort, OpenPortFn } from "../../src/serial/connection";

export class FakePort implements LinkPort {
  readonly written: Uint8Array[] = [];
  closed = false;
  failWrite: Error | null = null;
  private dataListeners: Array<(data: Uint8Array) => void> = [];
  private errorListeners: Array<(err: Error) => void> = [];
  private closeListeners: Array<() => void> = [];

  constructor(readonly path: string) {}

  onData(listener: (data: Uint8Array) => void): void {
    this.dataListeners.push(listener);
  }

  onError(listener: (err: Error) => void): void {
    this.errorListeners.push(listener);
  }

  onClose(listener: () => void): void {
    this.closeListeners.push(listener);
  }

  async write(data: Uint8Array): Promise<void> {
    if (this.failWrite) throw this.failWrite;
    this.written.push(Uint8Array.from(data));
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  emitData(data: Uint8Array): void {
    for (const listener of this.dataListeners) listener(data);
  }

  emitError(err: Error): void {
    for (const listener of this.errorListeners) listener(err);
  }

  emitClose(): void {
    for (const listener of this.closeListeners) listener();
  }
}

/**
 * OpenPortFn that hands out FakePorts and remembers them
 */
export function fakeOpener() {
  const opened: FakePort[] = [];
  const calls: Array<{ path: string; baudRate: number }> = [];
  const openPort: OpenPortFn = async (path, baudRate) => {
    calls.push({ path, baudRate });
    const port = new FakePort(path);
    opened.push(port);
    return port;
  };
  return { openPort, opened, calls };
}
