import { ChannelDisconnected } from "../errors";
import { createServiceLogger, Logger } from "../logger";
import { encodeControl } from "../protocol";
import { ControlCommand } from "../types";

/** The part of an MQTT client the dispatcher needs. */
export interface ControlChannel {
  readonly connected: boolean;
  publish(topic: string, message: string, callback?: (error?: Error) => void): unknown;
}

function describe(command: ControlCommand): string {
  return command.action === "simulate_failure"
    ? `simulate_failure=${command.enable}`
    : `${command.action}=${command.state}`;
}

/**
 * Publishes control commands for the managed resource. Fire-and-forget:
 * there is no retry and no acknowledgement from the simulator.
 */
export class Dispatcher {
  constructor(
    private readonly channel: ControlChannel,
    private readonly log: Logger = createServiceLogger("executor"),
  ) {}

  isConnected(): boolean {
    return this.channel.connected;
  }

  /** @returns whether the channel was connected when the command was sent */
  send(command: ControlCommand): boolean {
    const { topic, payload } = encodeControl(command);

    if (!this.channel.connected) {
      this.log.warn(`❌ ${new ChannelDisconnected(topic).message}`);
      return false;
    }

    this.channel.publish(topic, payload, (error) => {
      if (error) {
        this.log.error(`❌ Publish on ${topic} failed: ${error.message}`);
      }
    });
    this.log.info(`🚀 Sent ${describe(command)} on ${topic}`);
    return true;
  }
}
