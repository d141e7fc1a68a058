/**
 * Body streaming
 *
 * Pipes the inbound request body into the outbound request while the
 * request is being dispatched.
 *
 * @module lib/proxy/store
 */

import type { ReadableStreamDefaultController } from 'stream/web';

/**
 * Destination of a piped stream
 */
export interface BodySink<T> {
  add(chunk: T): void;
  addError(error: unknown): void;
  close(): void;
}

export interface StoreOptions {
  /** Stop piping after the first error (default: true) */
  cancelOnError?: boolean;
  /** Close the sink when piping ends (default: true) */
  closeSink?: boolean;
}

/**
 * Pipe all data and errors from `source` into `sink`.
 *
 * When `source` is done the returned promise resolves, after closing `sink`
 * if `closeSink` is set.
 *
 * An error from `source` is passed to `sink.addError` and is not rethrown:
 * the promise still resolves. With `cancelOnError` no more data is read, and
 * `sink` is closed when `closeSink` is also set. A web stream cannot produce
 * data after an error, so without `cancelOnError` the error ends the source
 * and the done path runs.
 */
export async function store<T>(
  source: ReadableStream<T>,
  sink: BodySink<T>,
  { cancelOnError = true, closeSink = true }: StoreOptions = {}
): Promise<void> {
  const reader = source.getReader();

  for (;;) {
    let result: Awaited<ReturnType<typeof reader.read>>;
    try {
      result = await reader.read();
    } catch (error) {
      sink.addError(error);
      if (cancelOnError) {
        if (closeSink) sink.close();
        return;
      }
      break;
    }

    if (result.done) {
      break;
    }
    sink.add(result.value);
  }

  if (closeSink) sink.close();
}

/**
 * Body of an outbound request, written through `sink` and read through `stream`.
 *
 * Writes after close, after an error, or after the reader cancelled are dropped.
 */
export class StreamedBody implements BodySink<Uint8Array> {
  readonly stream: ReadableStream<Uint8Array>;

  private controller: ReadableStreamDefaultController<Uint8Array> | undefined;
  private finished = false;

  constructor() {
    this.stream = new ReadableStream<Uint8Array>({
      start: (controller) => {
        this.controller = controller;
      },
      cancel: () => {
        this.finished = true;
      },
    });
  }

  get sink(): BodySink<Uint8Array> {
    return this;
  }

  add(chunk: Uint8Array): void {
    if (!this.finished) {
      this.controller?.enqueue(chunk);
    }
  }

  addError(error: unknown): void {
    if (!this.finished) {
      this.finished = true;
      this.controller?.error(error);
    }
  }

  close(): void {
    if (!this.finished) {
      this.finished = true;
      this.controller?.close();
    }
  }
}
