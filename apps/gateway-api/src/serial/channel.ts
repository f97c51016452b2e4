import { SerialPort } from "serialport";

/** One open conversation with a tty; the transport owns at most one at a time. */
export type SerialChannel = {
  readonly path: string;
  write: (data: string) => Promise<void>;
  /** Drops whatever the device sent since the last exchange. */
  discardInput: () => Promise<void>;
  onData: (handler: (chunk: string) => void) => () => void;
  /** Fires once when the device goes away or reports an I/O error. */
  onFailure: (handler: (error: Error) => void) => () => void;
  close: () => Promise<void>;
};

export type ChannelOpener = (path: string, baudRate: number) => Promise<SerialChannel>;

const callback =
  (resolve: () => void, reject: (error: Error) => void) => (error?: Error | null) => {
    if (error) {
      reject(error);
      return;
    }
    resolve();
  };

export const openSerialChannel: ChannelOpener = async (path, baudRate) => {
  const port = new SerialPort({ path, baudRate, autoOpen: false });
  await new Promise<void>((resolve, reject) => port.open(callback(resolve, reject)));

  const failureHandlers = new Set<(error: Error) => void>();
  let failed = false;
  const fail = (error: Error) => {
    if (failed) return;
    failed = true;
    failureHandlers.forEach((handler) => handler(error));
  };
  port.on("error", (error: Error) => fail(error));
  port.on("close", (error?: Error | null) => fail(error ?? new Error(`${path} closed.`)));

  return {
    path,
    write: (data) =>
      new Promise<void>((resolve, reject) => {
        port.write(data, (error?: Error | null) => {
          if (error) {
            reject(error);
            return;
          }
          port.drain(callback(resolve, reject));
        });
      }),
    discardInput: () => new Promise<void>((resolve, reject) => port.flush(callback(resolve, reject))),
    onData: (handler) => {
      const listener = (chunk: Buffer) => handler(chunk.toString("utf8"));
      port.on("data", listener);
      return () => {
        port.off("data", listener);
      };
    },
    onFailure: (handler) => {
      failureHandlers.add(handler);
      return () => {
        failureHandlers.delete(handler);
      };
    },
    close: () =>
      new Promise<void>((resolve, reject) => {
        failed = true;
        if (!port.isOpen) {
          resolve();
          return;
        }
        port.close(callback(resolve, reject));
      }),
  };
};
