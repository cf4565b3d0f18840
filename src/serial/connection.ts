/**
 * Ball-in-Tube Serial Connection
 * Owns one LinkReader and one SampleWindow per open link
 */

import { SerialPort } from "serialport";
import { LinkReader } from "./link-reader";
import { LinkError } from "./errors";
import { SampleWindow, clampRetention } from "../telemetry/sample-window";
import { createDiscovery } from "../discovery";
import { createLogger } from "../logger";
import { PROTOCOL, RETENTION, type LinkHealth, type Sample } from "../state/types";

const log = createLogger("link");

/**
 * Byte-stream port as seen by the connection (USB-serial or Bluetooth SPP)
 */
export interface LinkPort {
  readonly path: string;
  onData(listener: (data: Uint8Array) => void): void;
  onError(listener: (err: Error) => void): void;
  onClose(listener: () => void): void;
  write(data: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

export type OpenPortFn = (path: string, baudRate: number) => Promise<LinkPort>;
export type FindPortFn = () => Promise<string | null>;

export type SampleListener = (sample: Sample) => void;
export type ErrorListener = (error: LinkError) => void;

export interface TubeConnectionOptions {
  port?: string;                 // Auto-detect if not specified
  baudRate?: number;
  retentionSeconds?: number;
  frameGapMs?: number;
  openPort?: OpenPortFn;
  findPort?: FindPortFn;
  clock?: () => number;
  onSample?: SampleListener;
  onError?: ErrorListener;
  onConnect?: () => void;
  onDisconnect?: () => void;
}

interface Session {
  port: LinkPort;
  reader: LinkReader;
  window: SampleWindow;
  connectedAt: number;
}

const EMPTY_HEALTH: LinkHealth = {
  framesDecoded: 0,
  droppedBytes: 0,
  garbledFrames: 0,
  resyncs: 0,
  lastSampleAt: null,
};

/**
 * Open a real serial port (8N1, no flow control)
 */
export const openSerialPort: OpenPortFn = (path, baudRate) =>
  new Promise((resolve, reject) => {
    const serial = new SerialPort(
      {
        path,
        baudRate,
        dataBits: 8,
        parity: "none",
        stopBits: 1,
        rtscts: false,
        xon: false,
        xoff: false,
        xany: false,
      },
      (err) => {
        if (err) {
          reject(err);
          return;
        }
        resolve({
          path,
          onData(listener) {
            serial.on("data", (data: Buffer) => listener(new Uint8Array(data)));
          },
          onError(listener) {
            serial.on("error", listener);
          },
          onClose(listener) {
            serial.on("close", () => listener());
          },
          write(data) {
            return new Promise((res, rej) => {
              serial.write(Buffer.from(data), (writeErr) => {
                if (writeErr) {
                  rej(writeErr);
                  return;
                }
                // Drain to ensure data is sent
                serial.drain((drainErr) => (drainErr ? rej(drainErr) : res()));
              });
            });
          },
          close() {
            return new Promise((res) => {
              if (!serial.isOpen) {
                res();
                return;
              }
              serial.close(() => res());
            });
          },
        });
      }
    );
  });

/**
 * First USB-serial or Bluetooth SPP port found, or null
 */
export async function findLinkDevice(): Promise<string | null> {
  const result = await createDiscovery().findSerial();
  return result.device?.path ?? null;
}

export class TubeConnection {
  private session: Session | null = null;
  private connecting: Promise<void> | null = null;
  private lastHealth: LinkHealth = EMPTY_HEALTH;
  private retention: number;
  private port: string;
  private readonly baudRate: number;
  private readonly frameGapMs: number;
  private readonly openPort: OpenPortFn;
  private readonly findPort: FindPortFn;
  private readonly clock: () => number;
  private readonly listeners: {
    onSample: SampleListener;
    onError: ErrorListener;
    onConnect: () => void;
    onDisconnect: () => void;
  };

  constructor(options: TubeConnectionOptions = {}) {
    this.port = options.port ?? "";
    this.baudRate = options.baudRate ?? PROTOCOL.BAUD_RATE;
    this.retention = clampRetention(options.retentionSeconds ?? RETENTION.DEFAULT_SECONDS);
    this.frameGapMs = options.frameGapMs ?? PROTOCOL.FRAME_GAP_MS;
    this.openPort = options.openPort ?? openSerialPort;
    this.findPort = options.findPort ?? findLinkDevice;
    this.clock = options.clock ?? Date.now;
    this.listeners = {
      onSample: options.onSample ?? (() => {}),
      onError: options.onError ?? ((err) => log.error(err.message)),
      onConnect: options.onConnect ?? (() => {}),
      onDisconnect: options.onDisconnect ?? (() => {}),
    };
  }

  /**
   * Open the link (auto-detects the port if none set).
   * Builds a fresh reader and window; nothing carries over from a previous link.
   * @throws LinkError("Open") if no port is found or it fails to open
   */
  connect(): Promise<void> {
    if (this.session) {
      return Promise.resolve();
    }
    // Overlapping callers share one open
    if (!this.connecting) {
      this.connecting = this.open().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async open(): Promise<void> {
    let path = this.port;
    if (!path) {
      path = (await this.findPort()) ?? "";
      if (!path) {
        throw new LinkError("Open", "No serial port found");
      }
      this.port = path;
    }

    let port: LinkPort;
    try {
      port = await this.openPort(path, this.baudRate);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new LinkError("Open", `Failed to open ${path}: ${message}`, { cause: err });
    }

    const sampleWindow = new SampleWindow({ retentionSeconds: this.retention });
    const reader = new LinkReader({
      clock: this.clock,
      frameGapMs: this.frameGapMs,
      onSample: (sample) => sampleWindow.append(sample),
    });
    const session: Session = { port, reader, window: sampleWindow, connectedAt: this.clock() };
    this.session = session;

    port.onData((data) => this.handleData(session, data));
    port.onError((err) => {
      this.fail(session, new LinkError("Read", `Read failed on ${path}: ${err.message}`, { cause: err }));
    });
    port.onClose(() => {
      this.fail(session, new LinkError("Closed", `Link ${path} closed`));
    });

    log.info(`Connected to ${path} @ ${this.baudRate} bps`);
    this.listeners.onConnect();
  }

  private handleData(session: Session, data: Uint8Array): void {
    if (this.session !== session) return;

    session.reader.feed(data);
    for (const sample of session.reader.poll()) {
      this.listeners.onSample(sample);
    }
  }

  /**
   * Read error or unexpected close: fatal to this reader, no retry
   */
  private fail(session: Session, error: LinkError): void {
    if (this.session !== session) return;

    this.teardown(session);
    this.listeners.onError(error);
    session.port.close().catch((err: unknown) => {
      log.debug("Close after failure:", err);
    });
  }

  private teardown(session: Session): void {
    this.lastHealth = session.reader.health();
    session.reader.close();
    session.window.clear();
    this.session = null;
    log.info(`Disconnected from ${session.port.path}`);
    this.listeners.onDisconnect();
  }

  /**
   * Close the link and clear the window
   */
  async disconnect(): Promise<void> {
    if (this.connecting) {
      await this.connecting.catch((err: unknown) => {
        log.debug("Pending connect failed before disconnect:", err);
      });
    }

    const session = this.session;
    if (!session) return;

    this.teardown(session);
    await session.port.close();
  }

  /**
   * Write an encoded command frame
   * @throws LinkError("NotConnected" | "Write")
   */
  async send(frame: Uint8Array): Promise<void> {
    const session = this.session;
    if (!session) {
      throw new LinkError("NotConnected", "Not connected");
    }

    try {
      await session.port.write(frame);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new LinkError("Write", `Write failed: ${message}`, { cause: err });
    }
  }

  /**
   * Frozen copy of the current window (empty when disconnected)
   */
  snapshot(): readonly Sample[] {
    return this.session ? this.session.window.snapshot() : Object.freeze([]);
  }

  since(t: number): readonly Sample[] {
    return this.session ? this.session.window.since(t) : Object.freeze([]);
  }

  latest(): Sample | null {
    return this.session?.window.latest() ?? null;
  }

  /**
   * Change the retention window (kept for later connections too)
   */
  setRetention(seconds: number): number {
    if (this.session) {
      this.retention = this.session.window.setRetention(seconds);
    } else {
      this.retention = clampRetention(seconds);
    }
    return this.retention;
  }

  getRetention(): number {
    return this.session?.window.retentionSeconds ?? this.retention;
  }

  /**
   * Link-health counters of the current reader (or the last one)
   */
  health(): LinkHealth {
    return this.session ? this.session.reader.health() : { ...this.lastHealth };
  }

  getConnectedAt(): number | null {
    return this.session?.connectedAt ?? null;
  }

  isConnected(): boolean {
    return this.session !== null;
  }

  getPort(): string {
    return this.port;
  }

  /**
   * Set port for the next connect()
   */
  setPort(port: string): void {
    this.port = port;
  }
}
