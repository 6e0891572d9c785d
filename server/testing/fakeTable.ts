import { ConnectionError } from "../errors";
import type { LineConnection } from "../protocol";

export interface FakeTableOptions {
  /** Answer every batch with READY, like firmware with a free buffer. */
  autoReady?: boolean;
  /** Answer every command with DONE. */
  autoDone?: boolean;
}

/**
 * In-process stand-in for the table controller on the other end of the
 * serial line. Records everything the host writes.
 */
export class FakeTable implements LineConnection {
  readonly written: string[] = [];
  private open = true;
  private readonly lineListeners = new Set<(line: string) => void>();
  private readonly closeListeners = new Set<(error?: Error) => void>();

  constructor(private readonly options: FakeTableOptions = {}) {}

  isOpen(): boolean {
    return this.open;
  }

  async write(data: string): Promise<void> {
    if (!this.open) {
      throw new ConnectionError("Fake table is closed");
    }
    this.written.push(data);

    const isBatch = data.includes(",");
    if (isBatch && this.options.autoReady) {
      setImmediate(() => this.emit("READY"));
    } else if (!isBatch && this.options.autoDone) {
      setImmediate(() => this.emit("DONE"));
    }
  }

  emit(line: string): void {
    this.lineListeners.forEach((listener) => listener(line));
  }

  close(error?: Error): void {
    this.open = false;
    this.closeListeners.forEach((listener) => listener(error));
  }

  reopen(): void {
    this.open = true;
  }

  onLine(listener: (line: string) => void): () => void {
    this.lineListeners.add(listener);
    return () => {
      this.lineListeners.delete(listener);
    };
  }

  onClose(listener: (error?: Error) => void): () => void {
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }
}
