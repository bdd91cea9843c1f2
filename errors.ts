export class AquaponicsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Inbound payload that is not valid JSON or does not match its schema. */
export class ParseError extends AquaponicsError {}

/** Control publish attempted while the MQTT client is not connected. */
export class ChannelDisconnected extends AquaponicsError {
  constructor(topic: string) {
    super(`MQTT not connected, dropped command for ${topic}`);
  }
}

export class UnrecognizedCommandValue extends AquaponicsError {
  readonly value: unknown;

  constructor(field: string, value: unknown) {
    super(`Unrecognized ${field}: ${JSON.stringify(value)}`);
    this.value = value;
  }
}

export class PersistenceFailure extends AquaponicsError {}

export class ConfigurationError extends AquaponicsError {}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
