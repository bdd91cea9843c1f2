import { ParseError } from "../../errors";
import { createServiceLogger } from "../../logger";
import { TelemetryStore } from "../../monitor/telemetry-store";
import { payload, THRESHOLDS } from "../helpers";

describe("TelemetryStore", () => {
  it("should start empty", () => {
    const store = new TelemetryStore(THRESHOLDS);

    expect(store.latest()).toBeUndefined();
    expect(store.recent(10)).toEqual([]);
    expect(store.size()).toBe(0);
    expect(store.capacity).toBe(500);
  });

  it("should update latest and history together", () => {
    const store = new TelemetryStore(THRESHOLDS);
    const result = store.ingest(payload({ reading_id: 1 }));

    if (!result.ok) throw result.error;
    expect(store.latest()).toBe(result.reading);
    expect(store.recent(1)).toEqual([result.reading]);
    expect(store.recent(1)[0]).toBe(store.latest());
  });

  it("should keep only the last readings in delivery order once full", () => {
    const store = new TelemetryStore(THRESHOLDS, 3);
    for (let id = 1; id <= 8; id++) {
      store.ingest(payload({ reading_id: id }));
    }

    expect(store.size()).toBe(3);
    expect(store.recent(10).map((r) => r.reading_id)).toEqual([6, 7, 8]);
    expect(store.latest()?.reading_id).toBe(8);
  });

  it("should not reorder readings by timestamp", () => {
    const store = new TelemetryStore(THRESHOLDS);
    store.ingest(payload({ reading_id: 2, timestamp: "2025-06-15T10:00:05.000Z" }));
    store.ingest(payload({ reading_id: 1, timestamp: "2025-06-15T10:00:00.000Z" }));

    expect(store.recent(2).map((r) => r.reading_id)).toEqual([2, 1]);
    expect(store.latest()?.reading_id).toBe(1);
  });

  it("should attach the diagnosis at ingestion", () => {
    const store = new TelemetryStore(THRESHOLDS);
    const raw = JSON.parse(payload({ water_level_percent: 70, dissolved_oxygen_mgL: 3 }));
    const result = store.ingest(JSON.stringify({ ...raw, diagnosis: "Normal operation" }));

    expect(result.ok).toBe(true);
    expect(store.latest()?.diagnosis).toBe("Pump failure suspected");
  });

  it("should freeze stored readings", () => {
    const store = new TelemetryStore(THRESHOLDS);
    store.ingest(payload());

    expect(Object.isFrozen(store.latest())).toBe(true);
  });

  it("should hand out copies of the history", () => {
    const store = new TelemetryStore(THRESHOLDS);
    store.ingest(payload({ reading_id: 1 }));
    store.ingest(payload({ reading_id: 2 }));

    const snapshot = store.recent(10);
    snapshot.pop();
    store.ingest(payload({ reading_id: 3 }));

    expect(snapshot.map((r) => r.reading_id)).toEqual([1]);
    expect(store.recent(10).map((r) => r.reading_id)).toEqual([1, 2, 3]);
  });

  it("should drop malformed payloads and keep its state", () => {
    const log = createServiceLogger("test");
    const warn = jest.spyOn(log, "warn");
    const store = new TelemetryStore(THRESHOLDS, 10, log);
    store.ingest(payload({ reading_id: 1 }));

    const result = store.ingest("{broken");

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(ParseError);
    expect(store.size()).toBe(1);
    expect(store.latest()?.reading_id).toBe(1);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
