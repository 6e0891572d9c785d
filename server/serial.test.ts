import { Duplex } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import { SerialConnection } from "./serial";
import { ConnectionError } from "./errors";

function createLoopback() {
  const written: string[] = [];
  const stream = new Duplex({
    read() {},
    write(chunk: Buffer | string, _encoding, callback) {
      written.push(chunk.toString());
      callback();
    },
  });
  return { stream, written };
}

describe("SerialConnection", () => {
  it("splits inbound data into trimmed lines", async () => {
    const { stream } = createLoopback();
    const connection = new SerialConnection();
    const lines: string[] = [];
    connection.onLine((line) => lines.push(line));

    connection.attach(stream);
    stream.push("READY\r\nDO");
    stream.push("NE\n\n");

    await vi.waitFor(() => expect(lines).toEqual(["READY", "DONE"]));
  });

  it("writes data to the stream", async () => {
    const { stream, written } = createLoopback();
    const connection = new SerialConnection();
    connection.attach(stream);

    await connection.write("HOME\n");

    expect(written).toEqual(["HOME\n"]);
    expect(connection.isOpen()).toBe(true);
  });

  it("rejects writes before anything is attached", async () => {
    const connection = new SerialConnection();

    await expect(connection.write("HOME\n")).rejects.toBeInstanceOf(ConnectionError);
    expect(connection.isOpen()).toBe(false);
  });

  it("notifies close listeners once when the stream closes", async () => {
    const { stream } = createLoopback();
    const connection = new SerialConnection();
    const onClose = vi.fn();
    connection.onClose(onClose);
    connection.attach(stream);

    stream.destroy();

    await vi.waitFor(() => expect(onClose).toHaveBeenCalledTimes(1));
    expect(connection.isOpen()).toBe(false);
  });

  it("passes stream errors to close listeners", async () => {
    const { stream } = createLoopback();
    const connection = new SerialConnection();
    const onClose = vi.fn();
    connection.onClose(onClose);
    connection.attach(stream);

    stream.destroy(new Error("device unplugged"));

    await vi.waitFor(() => expect(onClose).toHaveBeenCalledTimes(1));
    expect(onClose.mock.calls[0][0]).toBeInstanceOf(Error);
    expect(connection.isOpen()).toBe(false);
  });

  it("disconnects an attached stream", async () => {
    const { stream } = createLoopback();
    const connection = new SerialConnection();
    const onClose = vi.fn();
    connection.onClose(onClose);
    connection.attach(stream);

    await connection.disconnect();

    expect(onClose).toHaveBeenCalledTimes(1);
    expect(connection.isOpen()).toBe(false);
    await vi.waitFor(() => expect(stream.destroyed).toBe(true));
  });

  it("cannot restart before a port was connected", async () => {
    const connection = new SerialConnection();

    await expect(connection.restart()).rejects.toThrow("Cannot restart: no port has been connected");
  });
});
