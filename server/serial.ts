import type { Duplex } from 'node:stream';
import { setTimeout as delay } from 'node:timers/promises';
import { SerialPort } from 'serialport';
import { ReadlineParser } from '@serialport/parser-readline';
import { log } from './log';
import { ConnectionError } from './errors';
import type { LineConnection } from './protocol';

export interface SerialConnectionOptions {
  openTimeoutMs?: number;
  settleMs?: number;
}

export class SerialConnection implements LineConnection {
  private port: SerialPort | null = null;
  private stream: Duplex | null = null;
  private parser: ReadlineParser | null = null;
  private lastPath: string | null = null;
  private lastBaudRate = 115200;
  private readonly lineListeners = new Set<(line: string) => void>();
  private readonly closeListeners = new Set<(error?: Error) => void>();
  private readonly openTimeoutMs: number;
  private readonly settleMs: number;

  constructor(options: SerialConnectionOptions = {}) {
    this.openTimeoutMs = options.openTimeoutMs ?? 1000;
    this.settleMs = options.settleMs ?? 2000;
  }

  /**
   * Open a serial port and wait for the board to come out of its reset
   */
  public async connect(portPath: string, baudRate: number = 115200): Promise<void> {
    if (this.stream) {
      await this.disconnect();
    }

    const port = await this.openPort(portPath, baudRate);
    this.port = port;
    this.lastPath = portPath;
    this.lastBaudRate = baudRate;
    this.attach(port);

    log(`Connected to ${portPath} at ${baudRate} baud`, 'serial');

    if (this.settleMs > 0) {
      await delay(this.settleMs);
    }
  }

  /**
   * Bind an already open stream; inbound bytes are split into trimmed lines
   */
  public attach(stream: Duplex): void {
    const parser = stream.pipe(new ReadlineParser({ delimiter: '\n' }));
    this.stream = stream;
    this.parser = parser;

    stream.on('error', (err: Error) => {
      log(`Serial port error: ${err.message}`, 'serial');
      this.handleClosed(stream, err);
    });

    stream.on('close', () => {
      this.handleClosed(stream);
    });

    parser.on('data', (data: string) => {
      const message = data.toString().trim();
      if (!message) return;
      log(`Received: ${message}`, 'serial');
      this.lineListeners.forEach((listener) => listener(message));
    });
  }

  public async disconnect(): Promise<void> {
    const port = this.port;
    const stream = this.stream;
    if (!stream) {
      log('No open port to disconnect from', 'serial');
      return;
    }

    this.handleClosed(stream);

    if (port && port.isOpen) {
      await new Promise<void>((resolve, reject) => {
        port.close((err) => {
          if (err) {
            log(`Error closing serial port: ${err.message}`, 'serial');
            reject(new ConnectionError(`Failed to close serial port: ${err.message}`, { cause: err }));
            return;
          }
          log('Serial port closed', 'serial');
          resolve();
        });
      });
    } else if (!port) {
      stream.destroy();
    }
  }

  /**
   * Close and reopen the last port
   */
  public async restart(): Promise<void> {
    if (!this.lastPath) {
      throw new ConnectionError('Cannot restart: no port has been connected');
    }
    const path = this.lastPath;
    await this.disconnect();
    await this.connect(path, this.lastBaudRate);
  }

  public isOpen(): boolean {
    if (!this.stream || this.stream.destroyed) return false;
    return this.port === null || this.port.isOpen;
  }

  public write(data: string): Promise<void> {
    const stream = this.stream;
    if (!stream || !this.isOpen()) {
      return Promise.reject(new ConnectionError('Cannot write: not connected to a port'));
    }

    return new Promise<void>((resolve, reject) => {
      stream.write(data, (err) => {
        if (err) {
          log(`Error sending data: ${err.message}`, 'serial');
          reject(new ConnectionError(`Write failed: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }

  public onLine(listener: (line: string) => void): () => void {
    this.lineListeners.add(listener);
    return () => {
      this.lineListeners.delete(listener);
    };
  }

  public onClose(listener: (error?: Error) => void): () => void {
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  private openPort(portPath: string, baudRate: number): Promise<SerialPort> {
    return new Promise((resolve, reject) => {
      const port = new SerialPort({
        path: portPath,
        baudRate,
        autoOpen: false,
      });

      let timedOut = false;
      const openTimer = setTimeout(() => {
        timedOut = true;
        log(`Timeout opening port ${portPath}`, 'serial');
        reject(new ConnectionError(`Timeout opening serial port ${portPath}`));
      }, this.openTimeoutMs);

      port.open((err) => {
        clearTimeout(openTimer);

        if (timedOut) {
          // Opened too late; nobody is waiting for this port any more
          if (!err) port.close();
          return;
        }

        if (err) {
          log(`Error opening serial port: ${err.message}`, 'serial');
          reject(new ConnectionError(`Failed to open ${portPath}: ${err.message}`, { cause: err }));
          return;
        }

        resolve(port);
      });
    });
  }

  // Runs once per attached stream, whichever of error/close/disconnect comes first
  private handleClosed(stream: Duplex, error?: Error): void {
    if (this.stream !== stream) return;

    if (this.parser) {
      stream.unpipe(this.parser);
    }
    this.port = null;
    this.stream = null;
    this.parser = null;

    log(error ? `Connection lost: ${error.message}` : 'Connection closed', 'serial');
    this.closeListeners.forEach((listener) => listener(error));
  }
}
