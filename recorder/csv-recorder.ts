import * as fs from "node:fs";
import { describeError, PersistenceFailure } from "../errors";
import { createServiceLogger, Logger } from "../logger";
import { Reading } from "../types";

export const CSV_COLUMNS = [
  "timestamp",
  "reading_id",
  "water_temp_C",
  "air_temp_C",
  "pH",
  "ammonia_mgL",
  "dissolved_oxygen_mgL",
  "ec_uScm",
  "water_level_percent",
  "humidity_percent",
  "light_lux",
  "pump_status",
  "light_status",
  "diagnosis",
] as const satisfies readonly (keyof Reading)[];

/** Where the manager sends every ingested reading. Best effort. */
export interface RecordSink {
  appendRecord(reading: Reading): void;
}

function csvCell(value: string | number): string {
  const text = String(value);
  return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsvRow(reading: Reading): string {
  return CSV_COLUMNS.map((column) => csvCell(reading[column])).join(",") + "\n";
}

export class CsvRecorder implements RecordSink {
  constructor(
    readonly filePath: string,
    private readonly log: Logger = createServiceLogger("recorder"),
  ) {}

  /** Writes the header row if the file does not exist yet. Never throws. */
  init(): void {
    if (fs.existsSync(this.filePath)) return;
    try {
      fs.writeFileSync(this.filePath, CSV_COLUMNS.join(",") + "\n");
      this.log.info(`📄 Created ${this.filePath}`);
    } catch (err) {
      const failure = new PersistenceFailure(
        `Could not create ${this.filePath}: ${describeError(err)}`,
        { cause: err },
      );
      this.log.error(`❌ ${failure.message}`);
    }
  }

  appendRecord(reading: Reading): void {
    void fs.promises.appendFile(this.filePath, toCsvRow(reading)).catch((err: unknown) => {
      const failure = new PersistenceFailure(
        `CSV write error for reading #${reading.reading_id}: ${describeError(err)}`,
        { cause: err },
      );
      this.log.error(`❌ ${failure.message}`);
    });
  }
}
