import { log } from "./log";
import {
  ConnectionError,
  HandshakeAbortedError,
  ProtocolStallError,
  describeError,
} from "./errors";
import type { Batch, HandshakeToken, LogEntryType, MessageCallback } from "@shared/types";

/**
 * A line-oriented duplex channel to the table controller.
 * Implemented over a serial port by `SerialConnection`.
 */
export interface LineConnection {
  isOpen(): boolean;
  write(data: string): Promise<void>;
  /** Returns an unsubscribe function. */
  onLine(listener: (line: string) => void): () => void;
  onClose(listener: (error?: Error) => void): () => void;
}

export interface ProtocolOptions {
  /** 0 waits forever. */
  readyTimeoutMs: number;
  /** 0 waits forever. */
  commandTimeoutMs: number;
}

export const MAX_PENDING_LINES = 1000;

interface LineConsumer {
  onLine(line: string): void;
  onError(error: Error): void;
}

/**
 * Holds controller lines nobody is waiting for yet, so a READY sent between
 * two runs is still there for the next batch.
 */
export class InboundLineQueue {
  private pending: string[] = [];
  private consumer: LineConsumer | null = null;
  private closedWith: Error | null = null;

  constructor(private readonly limit: number = MAX_PENDING_LINES) {}

  get size(): number {
    return this.pending.length;
  }

  get isClosed(): boolean {
    return this.closedWith !== null;
  }

  push(line: string): void {
    // A line after a close means a new session has started
    this.closedWith = null;

    if (this.consumer) {
      this.consumer.onLine(line);
      return;
    }

    this.pending.push(line);
    if (this.pending.length > this.limit) {
      const dropped = this.pending.shift();
      log(`Inbound buffer full, dropping: ${dropped}`, "protocol");
    }
  }

  close(error: Error): void {
    this.closedWith = error;
    this.pending = [];
    const consumer = this.consumer;
    this.consumer = null;
    consumer?.onError(error);
  }

  reset(): void {
    this.closedWith = null;
    this.pending = [];
  }

  attach(consumer: LineConsumer): void {
    if (this.consumer) {
      throw new Error("Inbound lines already have a consumer");
    }
    if (this.closedWith) {
      consumer.onError(this.closedWith);
      return;
    }

    this.consumer = consumer;
    // Drain what arrived earlier; the consumer may detach part way through
    while (this.consumer === consumer) {
      const line = this.pending.shift();
      if (line === undefined) break;
      consumer.onLine(line);
    }
  }

  detach(consumer: LineConsumer): void {
    if (this.consumer === consumer) {
      this.consumer = null;
    }
  }
}

/**
 * Fixed three-decimal text with exact halfway values rounded to even and
 * the sign of negative zero kept, e.g. 0.0625 -> "0.062", -0 -> "-0.000".
 */
export function formatCoordinate(value: number): string {
  const negative = value < 0 || Object.is(value, -0);
  const magnitude = Math.abs(value);

  // Halfway at the third decimal only when magnitude * 16 is an odd integer
  const sixteenths = magnitude * 16;
  let text: string;
  if (Number.isInteger(sixteenths) && sixteenths % 2 === 1) {
    const lower = Math.floor(magnitude * 1000);
    const thousandths = lower % 2 === 0 ? lower : lower + 1;
    text = (thousandths / 1000).toFixed(3);
  } else {
    text = magnitude.toFixed(3);
  }

  return negative ? `-${text}` : text;
}

/**
 * Encode a batch for the wire: `theta,rho` pairs joined and terminated by
 * `;`, three decimals each, newline at the end.
 */
export function encodeBatch(batch: Batch): string {
  return batch
    .map(({ theta, rho }) => `${formatCoordinate(theta)},${formatCoordinate(rho)};`)
    .join("") + "\n";
}

export class ProtocolDriver {
  private readonly inbound = new InboundLineQueue();
  private messageCallback: MessageCallback | null = null;
  private disposed = false;
  private readonly unsubscribe: Array<() => void>;

  constructor(
    private readonly connection: LineConnection,
    private readonly options: ProtocolOptions
  ) {
    this.unsubscribe = [
      connection.onLine((line) => {
        this.notify("received", line);
        this.inbound.push(line);
      }),
      connection.onClose((error) => {
        const reason = error ? `: ${error.message}` : "";
        this.inbound.close(new ConnectionError(`Connection closed${reason}`, { cause: error }));
      }),
    ];
  }

  public setMessageCallback(callback: MessageCallback | null): void {
    this.messageCallback = callback;
  }

  /**
   * Wait for the controller to ask for work, then send one batch.
   * Rejects with HandshakeAbortedError if `signal` fires during the wait.
   */
  public async sendBatch(batch: Batch, signal?: AbortSignal): Promise<void> {
    this.ensureOpen();
    await this.awaitToken("READY", this.options.readyTimeoutMs, signal);
    await this.write(encodeBatch(batch), `batch of ${batch.length} points`);
  }

  /**
   * Send a bare command and wait for the controller's DONE.
   */
  public async sendCommand(command: string): Promise<void> {
    this.ensureOpen();
    await this.write(`${command}\n`, command);
    await this.awaitToken("DONE", this.options.commandTimeoutMs);
    log(`Command ${command} completed`, "protocol");
  }

  /** Detach from the connection; a pending wait rejects with ConnectionError. */
  public dispose(): void {
    this.disposed = true;
    this.unsubscribe.forEach((unsubscribe) => unsubscribe());
    this.inbound.close(new ConnectionError("Protocol driver disposed"));
  }

  private ensureOpen(): void {
    if (this.disposed) {
      throw new ConnectionError("Protocol driver disposed");
    }
    if (!this.connection.isOpen()) {
      throw new ConnectionError("Not connected to the table controller");
    }
    if (this.inbound.isClosed) {
      // Reconnected since the last close; earlier lines belong to the old session
      this.inbound.reset();
    }
  }

  private async write(data: string, description: string): Promise<void> {
    try {
      await this.connection.write(data);
    } catch (error) {
      this.notify("error", `Failed to send ${description}: ${describeError(error)}`);
      if (error instanceof ConnectionError) throw error;
      throw new ConnectionError(`Failed to send ${description}: ${describeError(error)}`, { cause: error });
    }
    this.notify("sent", data.trimEnd());
  }

  private awaitToken(token: HandshakeToken, timeoutMs: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new HandshakeAbortedError(token));
    }

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const finish = (error?: Error) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        this.inbound.detach(consumer);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const onAbort = () => finish(new HandshakeAbortedError(token));

      const consumer: LineConsumer = {
        onLine: (line) => {
          if (line === token) {
            finish();
            return;
          }
          log(`Ignoring controller line while awaiting ${token}: ${line}`, "protocol");
        },
        onError: (error) => finish(error),
      };

      // May settle synchronously from buffered lines, or throw if another wait is active
      this.inbound.attach(consumer);
      if (settled) return;

      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          log(`Timed out after ${timeoutMs} ms waiting for ${token}`, "protocol");
          finish(new ProtocolStallError(token, timeoutMs));
        }, timeoutMs);
      }
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private notify(type: LogEntryType, message: string): void {
    if (this.messageCallback) {
      this.messageCallback({ type, message, timestamp: new Date() });
    }
  }
}
