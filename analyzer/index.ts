import { READING_DEFAULTS } from "../protocol";
import { Alert, SensorSnapshot, ThresholdConfig } from "../types";

export const DIAGNOSIS = {
  PUMP_FAILURE: "Pump failure suspected",
  BIOFILTER_STRESS: "Overfeeding / biofilter stress",
  THERMAL_OXYGEN_STRESS: "Thermal oxygen stress",
  LEAK_OR_EVAPORATION: "Leak or evaporation",
  PH_TOO_LOW: "pH too low — add buffer",
  NORMAL: "Normal operation",
} as const;

export type Diagnosis = (typeof DIAGNOSIS)[keyof typeof DIAGNOSIS];

type AnalyzedFields = Pick<
  SensorSnapshot,
  "dissolved_oxygen_mgL" | "ammonia_mgL" | "water_level_percent" | "water_temp_C" | "pH" | "pump_status"
>;

export type AnalyzerInput = Partial<AnalyzedFields>;

interface Symptoms {
  lowDo: boolean;
  highAmmonia: boolean;
  lowWaterLevel: boolean;
  highTemp: boolean;
  lowPh: boolean;
  pumpFailure: boolean;
}

function withDefaults(reading: AnalyzerInput): AnalyzedFields {
  return {
    dissolved_oxygen_mgL: reading.dissolved_oxygen_mgL ?? READING_DEFAULTS.dissolved_oxygen_mgL,
    ammonia_mgL: reading.ammonia_mgL ?? READING_DEFAULTS.ammonia_mgL,
    water_level_percent: reading.water_level_percent ?? READING_DEFAULTS.water_level_percent,
    water_temp_C: reading.water_temp_C ?? READING_DEFAULTS.water_temp_C,
    pH: reading.pH ?? READING_DEFAULTS.pH,
    pump_status: reading.pump_status ?? READING_DEFAULTS.pump_status,
  };
}

function symptoms(r: AnalyzedFields, t: ThresholdConfig): Symptoms {
  return {
    lowDo: r.dissolved_oxygen_mgL < t.do_low,
    highAmmonia: r.ammonia_mgL > t.ammonia_high,
    lowWaterLevel: r.water_level_percent < t.water_level_low,
    highTemp: r.water_temp_C > t.temp_high,
    lowPh: r.pH < t.ph_low,
    pumpFailure: r.pump_status === "FAILURE",
  };
}

/** Single root-cause label; the first matching rule wins. */
export function diagnose(reading: AnalyzerInput, thresholds: ThresholdConfig): Diagnosis {
  const s = symptoms(withDefaults(reading), thresholds);

  if (s.lowWaterLevel && s.lowDo) return DIAGNOSIS.PUMP_FAILURE;
  if (s.highAmmonia && s.lowDo) return DIAGNOSIS.BIOFILTER_STRESS;
  if (s.highTemp && s.lowDo) return DIAGNOSIS.THERMAL_OXYGEN_STRESS;
  if (s.lowWaterLevel) return DIAGNOSIS.LEAK_OR_EVAPORATION;
  if (s.lowPh) return DIAGNOSIS.PH_TOO_LOW;
  return DIAGNOSIS.NORMAL;
}

/**
 * One alert per violated condition. Unlike {@link diagnose} these are not
 * exclusive, so a single reading can raise several.
 */
export function evaluateAlerts(reading: AnalyzerInput, thresholds: ThresholdConfig): Alert[] {
  const r = withDefaults(reading);
  const s = symptoms(r, thresholds);
  const alerts: Alert[] = [];

  if (s.lowDo) {
    alerts.push({ type: "warning", sensor: "dissolved_oxygen", message: `Low DO: ${r.dissolved_oxygen_mgL} mg/L` });
  }
  if (s.highAmmonia) {
    alerts.push({ type: "danger", sensor: "ammonia", message: `High ammonia: ${r.ammonia_mgL} mg/L` });
  }
  if (s.lowWaterLevel) {
    alerts.push({ type: "danger", sensor: "water_level", message: `Low water: ${r.water_level_percent}%` });
  }
  if (s.highTemp) {
    alerts.push({ type: "warning", sensor: "temperature", message: `High temp: ${r.water_temp_C}°C` });
  }
  if (s.lowPh) {
    alerts.push({ type: "warning", sensor: "pH", message: `Low pH: ${r.pH}` });
  }
  if (s.pumpFailure) {
    alerts.push({ type: "danger", sensor: "pump", message: "Pump failure detected!" });
  }

  return alerts;
}
