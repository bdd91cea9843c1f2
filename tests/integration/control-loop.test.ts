import { AquaponicsContext } from "../../context";
import { Dispatcher } from "../../executor";
import { createServiceLogger } from "../../logger";
import { AquaponicsProcessModel } from "../../managed-resource/process-model";
import { handleControlMessage, publishReading } from "../../managed-resource/touchpoints";
import { handleTelemetryMessage } from "../../monitor";
import { TelemetryStore } from "../../monitor/telemetry-store";
import { atHour, FakeBroker, THRESHOLDS, zeroNoise } from "../helpers";

describe("Telemetry and control loop", () => {
  const log = createServiceLogger("test");

  const setup = () => {
    const broker = new FakeBroker();
    const model = new AquaponicsProcessModel({ noise: zeroNoise, log });
    const ctx = new AquaponicsContext({
      brokerUrl: "mqtt://in-process",
      thresholds: THRESHOLDS,
      store: new TelemetryStore(THRESHOLDS, 3, log),
      dispatcher: new Dispatcher(broker, log),
      log,
    });

    broker.onMessage((topic, message) => {
      if (topic.startsWith("aquaponics/sensors/")) handleTelemetryMessage(ctx, topic, message, log);
    });
    broker.onMessage((topic, message) => {
      if (topic.startsWith("aquaponics/control/")) handleControlMessage(model, topic, message, log);
    });

    const tick = (hour: number) => {
      const reading = model.generateReading(atHour(hour));
      publishReading(broker, reading);
      return reading;
    };

    return { model, ctx, tick };
  };

  it("should store each published reading with its diagnosis", () => {
    const { ctx, tick } = setup();

    const reading = tick(6);

    expect(ctx.latest()).toEqual({ ...reading, diagnosis: "Normal operation" });
    expect(ctx.history(10)).toHaveLength(1);
  });

  it("should surface a simulated pump failure on the next reading", () => {
    const { ctx, model, tick } = setup();
    tick(0);

    expect(ctx.sendControl({ action: "simulate_failure", enable: true })).toBe(true);
    expect(model.deviceState().pump_failure).toBe(true);

    const reading = tick(0);
    expect(reading.pump_status).toBe("FAILURE");
    expect(ctx.alerts()).toEqual({
      alerts: [
        { type: "warning", sensor: "dissolved_oxygen", message: "Low DO: 4.5 mg/L" },
        { type: "danger", sensor: "water_level", message: "Low water: 75%" },
        { type: "danger", sensor: "pump", message: "Pump failure detected!" },
      ],
      diagnosis: "Pump failure suspected",
    });
  });

  it("should recover once the failure is cleared", () => {
    const { ctx, tick } = setup();
    ctx.sendControl({ action: "simulate_failure", enable: true });
    tick(0);

    ctx.sendControl({ action: "simulate_failure", enable: false });
    tick(0);

    expect(ctx.latest()?.pump_status).toBe("ON");
    expect(ctx.alerts()?.alerts).toEqual([]);
    expect(ctx.history(10).map((r) => r.diagnosis)).toEqual(["Pump failure suspected", "Normal operation"]);
  });

  it("should keep only the newest readings under a long run", () => {
    const { ctx, tick } = setup();
    for (let i = 0; i < 7; i++) tick(6);

    expect(ctx.history(10).map((r) => r.reading_id)).toEqual([5, 6, 7]);
    expect(ctx.history(1)).toEqual([ctx.latest()]);
  });

  it("should drop commands while the broker is down", () => {
    const broker = new FakeBroker();
    broker.connected = false;
    const model = new AquaponicsProcessModel({ noise: zeroNoise, log });
    broker.onMessage((topic, message) => handleControlMessage(model, topic, message, log));

    const dispatcher = new Dispatcher(broker, log);

    expect(dispatcher.send({ action: "pump", state: "off" })).toBe(false);
    expect(model.deviceState().pump_on).toBe(true);
  });
});
