import { AquaponicsContext } from "../../context";
import { Dispatcher } from "../../executor";
import { createServiceLogger } from "../../logger";
import { handleTelemetryMessage } from "../../monitor";
import { TelemetryStore } from "../../monitor/telemetry-store";
import { RecordSink } from "../../recorder/csv-recorder";
import { Reading } from "../../types";
import { FakeChannel, payload, THRESHOLDS } from "../helpers";

describe("AquaponicsContext", () => {
  const setup = (recorder?: RecordSink) => {
    const channel = new FakeChannel();
    const log = createServiceLogger("test");
    const ctx = new AquaponicsContext({
      brokerUrl: "mqtt://broker.test:1883",
      thresholds: THRESHOLDS,
      store: new TelemetryStore(THRESHOLDS, 5),
      dispatcher: new Dispatcher(channel),
      recorder,
      log,
    });
    return { ctx, channel, log };
  };

  it("should record every accepted reading", () => {
    const appendRecord = jest.fn<void, [Reading]>();
    const { ctx } = setup({ appendRecord });

    const result = ctx.ingest(payload({ reading_id: 4 }));

    expect(result.ok).toBe(true);
    expect(appendRecord).toHaveBeenCalledTimes(1);
    expect(appendRecord.mock.calls[0][0]).toBe(ctx.latest());
  });

  it("should not record a rejected payload", () => {
    const appendRecord = jest.fn<void, [Reading]>();
    const { ctx } = setup({ appendRecord });

    expect(ctx.ingest("nope").ok).toBe(false);
    expect(appendRecord).not.toHaveBeenCalled();
  });

  it("should keep ingesting when the recorder throws", () => {
    const { ctx, log } = setup({
      appendRecord: () => {
        throw new Error("disk full");
      },
    });
    const error = jest.spyOn(log, "error");

    expect(ctx.ingest(payload({ reading_id: 1 })).ok).toBe(true);
    expect(ctx.latest()?.reading_id).toBe(1);
    expect(error).toHaveBeenCalledWith("❌ Could not record reading #1: disk full");
  });

  it("should have no alerts before the first reading", () => {
    expect(setup().ctx.alerts()).toBeUndefined();
  });

  it("should recompute alerts from the latest reading", () => {
    const { ctx } = setup();
    ctx.ingest(payload({ dissolved_oxygen_mgL: 4.0, ammonia_mgL: 0.6, water_level_percent: 90 }));

    expect(ctx.alerts()).toEqual({
      alerts: [
        { type: "warning", sensor: "dissolved_oxygen", message: "Low DO: 4 mg/L" },
        { type: "danger", sensor: "ammonia", message: "High ammonia: 0.6 mg/L" },
      ],
      diagnosis: "Overfeeding / biofilter stress",
    });
  });

  it("should expose history newest last", () => {
    const { ctx } = setup();
    [1, 2, 3].forEach((id) => ctx.ingest(payload({ reading_id: id })));

    expect(ctx.history(2).map((r) => r.reading_id)).toEqual([2, 3]);
  });

  it("should report status", () => {
    const { ctx, channel } = setup();
    expect(ctx.status()).toEqual({
      mqtt_broker: "mqtt://broker.test:1883",
      mqtt_connected: true,
      total_readings: 0,
      has_data: false,
      last_reading_time: null,
      thresholds: THRESHOLDS,
    });

    ctx.ingest(payload({ timestamp: "2025-06-15T11:30:00.000Z" }));
    channel.connected = false;

    expect(ctx.status()).toMatchObject({
      mqtt_connected: false,
      total_readings: 1,
      has_data: true,
      last_reading_time: "2025-06-15T11:30:00.000Z",
    });
  });

  it("should send control commands through the dispatcher", () => {
    const { ctx, channel } = setup();

    expect(ctx.sendControl({ action: "light", state: "on" })).toBe(true);
    expect(channel.published).toEqual([
      { topic: "aquaponics/control/light", message: '{"action":"light","state":"on"}' },
    ]);
  });

  describe("handleTelemetryMessage", () => {
    it("should ingest only the combined topic", () => {
      const { ctx, log } = setup();

      handleTelemetryMessage(ctx, "aquaponics/sensors/ph", '{"value":6.9,"timestamp":"x"}', log);
      expect(ctx.latest()).toBeUndefined();

      handleTelemetryMessage(ctx, "aquaponics/sensors/all", Buffer.from(payload({ reading_id: 2 })), log);
      expect(ctx.latest()?.reading_id).toBe(2);
    });
  });
});
