import { diagnose } from "../analyzer";
import { DEFAULT_MAX_READINGS } from "../constants";
import { ParseError } from "../errors";
import { createServiceLogger, Logger } from "../logger";
import { decodeReading } from "../protocol";
import { Reading, ThresholdConfig } from "../types";
import { RingBuffer } from "./ring-buffer";

export type IngestResult =
  | { ok: true; reading: Reading }
  | { ok: false; error: ParseError };

/**
 * Latest reading plus bounded history.
 *
 * Both fields change only inside {@link TelemetryStore.ingest}, which runs
 * to completion without awaiting, so readers always see `latest` equal to
 * the last history entry.
 */
export class TelemetryStore {
  private readonly history: RingBuffer<Reading>;
  private current: Reading | undefined;

  constructor(
    private readonly thresholds: ThresholdConfig,
    capacity: number = DEFAULT_MAX_READINGS,
    private readonly log: Logger = createServiceLogger("monitor"),
  ) {
    this.history = new RingBuffer<Reading>(capacity);
  }

  get capacity(): number {
    return this.history.capacity;
  }

  ingest(raw: string | Buffer): IngestResult {
    let reading: Reading;
    try {
      const snapshot = decodeReading(raw);
      reading = Object.freeze({ ...snapshot, diagnosis: diagnose(snapshot, this.thresholds) });
    } catch (err) {
      if (err instanceof ParseError) {
        this.log.warn(`⚠️ Dropped malformed reading: ${err.message}`);
        return { ok: false, error: err };
      }
      throw err;
    }

    this.current = reading;
    this.history.push(reading);
    return { ok: true, reading };
  }

  latest(): Reading | undefined {
    return this.current;
  }

  /** Most recent `min(limit, size)` readings, newest last, as a new array. */
  recent(limit: number): Reading[] {
    return this.history.tail(limit);
  }

  size(): number {
    return this.history.size;
  }
}
