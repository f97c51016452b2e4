import { Transform } from "stream";
import { upstreamTimeout, type IdleLimit } from "./upstream";

/**
 * Pass-through that fails with an upstream timeout when no chunk arrives within
 * `timeoutMs`. Placed between an upstream body and the client so a stalled body
 * tears the pipeline down.
 */
export const createIdleGuard = (limit: IdleLimit) => {
  const guard = new Transform({
    transform(chunk, _encoding, callback) {
      timer.refresh();
      callback(null, chunk);
    },
    flush(callback) {
      clearTimeout(timer);
      callback();
    },
    destroy(error, callback) {
      clearTimeout(timer);
      callback(error);
    },
  });
  const timer = setTimeout(() => guard.destroy(upstreamTimeout(limit)), limit.timeoutMs);
  return guard;
};
