/**
 * Producer/consumer pair joined by an in-process pipe.
 */

import type { Readable, Writable } from 'node:stream';
import type { ProgressSink } from '../checksum/types.js';
import { progressTap } from '../repository/upload-form.js';
import { toError } from '../errors.js';

/**
 * Connect `producer` (writes into the pipe and ends it) to `consumer`
 * (reads the pipe to its end). Bytes crossing the pipe are reported to
 * `progress`. The first failure on either side destroys the pipe, which
 * releases the other side, and is what this call rejects with.
 */
export async function runPipePair(
  producer: (sink: Writable) => Promise<void>,
  consumer: (source: Readable) => Promise<void>,
  progress?: ProgressSink
): Promise<void> {
  const channel = progressTap(progress);
  const state: { failure: Error | null } = { failure: null };

  const guard = (task: Promise<void>): Promise<void> =>
    task.catch((err: unknown) => {
      if (state.failure === null) {
        state.failure = toError(err);
        channel.destroy(state.failure);
      }
    });

  await Promise.all([guard(producer(channel)), guard(consumer(channel))]);

  if (state.failure !== null) {
    throw state.failure;
  }
}
