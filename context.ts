import { evaluateAlerts } from "./analyzer";
import { describeError, PersistenceFailure } from "./errors";
import { Dispatcher } from "./executor";
import { createServiceLogger, Logger } from "./logger";
import { IngestResult, TelemetryStore } from "./monitor/telemetry-store";
import { RecordSink } from "./recorder/csv-recorder";
import { Alert, ControlCommand, Reading, ThresholdConfig } from "./types";

export interface AlertReport {
  alerts: Alert[];
  diagnosis: string;
}

export interface SystemStatus {
  mqtt_broker: string;
  mqtt_connected: boolean;
  total_readings: number;
  has_data: boolean;
  last_reading_time: string | null;
  thresholds: ThresholdConfig;
}

export interface ContextOptions {
  brokerUrl: string;
  thresholds: ThresholdConfig;
  store: TelemetryStore;
  dispatcher: Dispatcher;
  recorder?: RecordSink;
  log?: Logger;
}

/**
 * Everything the manager shares between the ingestion path and the HTTP
 * handlers. Built once in manager.ts and passed down explicitly.
 */
export class AquaponicsContext {
  readonly brokerUrl: string;
  readonly thresholds: Readonly<ThresholdConfig>;
  private readonly store: TelemetryStore;
  private readonly dispatcher: Dispatcher;
  private readonly recorder?: RecordSink;
  private readonly log: Logger;

  constructor(options: ContextOptions) {
    this.brokerUrl = options.brokerUrl;
    this.thresholds = Object.freeze({ ...options.thresholds });
    this.store = options.store;
    this.dispatcher = options.dispatcher;
    this.recorder = options.recorder;
    this.log = options.log ?? createServiceLogger("manager");
  }

  ingest(raw: string | Buffer): IngestResult {
    const result = this.store.ingest(raw);
    if (!result.ok) return result;

    const { reading } = result;
    this.log.info(`📥 Received reading #${reading.reading_id}: ${reading.diagnosis}`);
    this.record(reading);
    return result;
  }

  private record(reading: Reading): void {
    if (!this.recorder) return;
    try {
      this.recorder.appendRecord(reading);
    } catch (err) {
      const failure = new PersistenceFailure(describeError(err), { cause: err });
      this.log.error(`❌ Could not record reading #${reading.reading_id}: ${failure.message}`);
    }
  }

  latest(): Reading | undefined {
    return this.store.latest();
  }

  history(limit: number): Reading[] {
    return this.store.recent(limit);
  }

  /** Alerts recomputed from the latest reading, or undefined before any data. */
  alerts(): AlertReport | undefined {
    const latest = this.store.latest();
    if (!latest) return undefined;
    return {
      alerts: evaluateAlerts(latest, this.thresholds),
      diagnosis: latest.diagnosis,
    };
  }

  sendControl(command: ControlCommand): boolean {
    return this.dispatcher.send(command);
  }

  status(): SystemStatus {
    const latest = this.store.latest();
    return {
      mqtt_broker: this.brokerUrl,
      mqtt_connected: this.dispatcher.isConnected(),
      total_readings: this.store.size(),
      has_data: latest !== undefined,
      last_reading_time: latest?.timestamp ?? null,
      thresholds: { ...this.thresholds },
    };
  }
}
