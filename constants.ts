// ==========================================
// TOPICS - MQTT channels
// ==========================================
export const TOPIC_SENSOR_ALL = "aquaponics/sensors/all";
export const TOPIC_SENSOR_WILDCARD = "aquaponics/sensors/#";
export const TOPIC_SENSOR_PREFIX = "aquaponics/sensors/";

export const TOPIC_CONTROL_PUMP = "aquaponics/control/pump";
export const TOPIC_CONTROL_LIGHT = "aquaponics/control/light";
export const TOPIC_CONTROL_SIMULATE = "aquaponics/control/simulate";

export const CONTROL_TOPICS = [
  TOPIC_CONTROL_PUMP,
  TOPIC_CONTROL_LIGHT,
  TOPIC_CONTROL_SIMULATE,
] as const;

// Per-sensor topic name -> Reading field it mirrors
export const SENSOR_TOPIC_FIELDS = {
  water_temp: "water_temp_C",
  air_temp: "air_temp_C",
  ph: "pH",
  ammonia: "ammonia_mgL",
  dissolved_oxygen: "dissolved_oxygen_mgL",
  ec: "ec_uScm",
  water_level: "water_level_percent",
  humidity: "humidity_percent",
  light: "light_lux",
} as const;

// ==========================================
// CONNECTIONS
// ==========================================
export const DEFAULT_MQTT_BROKER_URL = "mqtt://localhost:1883";
export const DEFAULT_MANAGER_CLIENT_ID = "aquaponics_manager";
export const DEFAULT_SIMULATOR_CLIENT_ID = "aquaponics_simulator";
export const DEFAULT_API_PORT = 8000;
export const DEFAULT_CONFIG_SERVICE_PORT = 4000;
export const CONFIG_RETRY_DELAY_MS = 3000;

// ==========================================
// KNOWLEDGE - thresholds and rules
// ==========================================
export const DO_LOW = 5.0; // mg/L
export const AMMONIA_HIGH = 0.5; // mg/L
export const WATER_LEVEL_LOW = 80.0; // %
export const TEMP_HIGH = 26.0; // °C, water
export const PH_LOW = 6.0;

// ==========================================
// STORAGE
// ==========================================
export const DEFAULT_MAX_READINGS = 500;
export const DEFAULT_HISTORY_LIMIT = 100;
export const DEFAULT_CSV_FILE = "sensor_readings.csv";

// ==========================================
// SIMULATION
// ==========================================
export const DEFAULT_PUBLISH_INTERVAL_MS = 5000;

// Water level is tuned so a failing pump crosses WATER_LEVEL_LOW
export const FAILURE_WATER_LEVEL_PENALTY = 20;
export const FAILURE_DO_PENALTY = 2;
export const PUMP_OFF_WATER_LEVEL_PENALTY = 5;
export const PUMP_OFF_DO_PENALTY = 1;

export const PH_DRIFT_PER_TICK = 0.0001;
export const EC_DRIFT_STD = 0.5;
export const LIGHT_PEAK_LUX = 20000;
