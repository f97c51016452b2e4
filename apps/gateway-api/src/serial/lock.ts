/**
 * FIFO mutex: tasks run one at a time in the order `run` was called.
 */
export type ChannelLock = {
  run: <T>(task: () => Promise<T>) => Promise<T>;
};

export const createChannelLock = (): ChannelLock => {
  let tail: Promise<void> = Promise.resolve();

  const run = <T>(task: () => Promise<T>): Promise<T> => {
    const result = tail.then(task);
    tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  };

  return { run };
};
