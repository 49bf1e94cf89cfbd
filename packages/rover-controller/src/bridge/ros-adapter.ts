/**
 * ROS adapters: hazard distance in, motion commands and alerts out.
 */

import {
  DEFAULT_CMD_VEL_TOPIC,
  DEFAULT_EMERGENCY_ALERT_TOPIC,
  DEFAULT_HAZARD_DISTANCE_TOPIC,
  FLOAT32_MSG_TYPE,
  STRING_MSG_TYPE,
  TWIST_MSG_TYPE,
} from '../constants.js';
import { PublishFailureError, errorMessage } from '../errors.js';
import { toTwist } from '../rover/command.js';
import type { RoverEventBus } from '../rover/event-bus.js';
import type { Command, DistanceResult } from '../rover/types.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { BridgeConnection } from './connection-manager.js';
import { Float32MsgSchema } from './protocol.js';

export interface DistanceSink {
  onDistanceReading(meters: number): Promise<DistanceResult>;
}

/** Subscribes to the hazard distance topic and feeds readings to the controller. */
export class RosHazardSubscriber {
  private off: (() => void) | null = null;
  private readonly log: Logger;

  constructor(
    private readonly connection: BridgeConnection,
    private readonly sink: DistanceSink,
    private readonly topic = DEFAULT_HAZARD_DISTANCE_TOPIC,
    logger?: Logger,
  ) {
    this.log = logger ?? rootLogger.child('HazardSubscriber');
  }

  start(): void {
    if (this.off) return;
    this.off = this.connection.subscribe(this.topic, FLOAT32_MSG_TYPE, (msg) => {
      void this.handle(msg);
    });
    this.log.info(`Subscribed to ${this.topic}`);
  }

  stop(): void {
    if (this.off) {
      this.off();
      this.off = null;
    }
  }

  private async handle(msg: Record<string, unknown>): Promise<void> {
    const parsed = Float32MsgSchema.safeParse(msg);
    if (!parsed.success) {
      this.log.warn(`Malformed message on ${this.topic}`, { issues: parsed.error.issues.map(i => i.message) });
      return;
    }
    try {
      const result = await this.sink.onDistanceReading(parsed.data.data ?? Number.NaN);
      if (!result.ok) {
        this.log.warn(`Sensor reading rejected: ${result.error.message}`);
      }
    } catch (err) {
      this.log.error(`Distance reading failed: ${errorMessage(err)}`);
    }
  }
}

export interface CommandTopics {
  cmdVel?: string;
  emergencyAlert?: string;
}

/**
 * Publishes final commands as Twist and alerts as String. Publishing is
 * fire-and-forget: a failed publish is logged and dropped, the next
 * operator tick sends fresh state.
 */
export class RosCommandPublisher {
  private subscriptionIds: string[] = [];
  private readonly cmdVelTopic: string;
  private readonly alertTopic: string;
  private readonly log: Logger;
  private failures = 0;

  constructor(
    private readonly connection: BridgeConnection,
    private readonly bus: RoverEventBus,
    topics: CommandTopics = {},
    logger?: Logger,
  ) {
    this.cmdVelTopic = topics.cmdVel ?? DEFAULT_CMD_VEL_TOPIC;
    this.alertTopic = topics.emergencyAlert ?? DEFAULT_EMERGENCY_ALERT_TOPIC;
    this.log = logger ?? rootLogger.child('CommandPublisher');
  }

  start(): void {
    if (this.subscriptionIds.length > 0) return;
    this.connection.advertise(this.cmdVelTopic, TWIST_MSG_TYPE);
    this.connection.advertise(this.alertTopic, STRING_MSG_TYPE);
    this.subscriptionIds = [
      this.bus.subscribe('command', (event) => this.publishCommand(event.command)),
      this.bus.subscribe('alert', (event) => this.publishAlert(event.text)),
    ];
  }

  stop(): void {
    if (this.subscriptionIds.length === 0) return;
    for (const id of this.subscriptionIds) {
      this.bus.unsubscribe(id);
    }
    this.subscriptionIds = [];
    this.connection.unadvertise(this.cmdVelTopic);
    this.connection.unadvertise(this.alertTopic);
  }

  get failureCount(): number {
    return this.failures;
  }

  publishCommand(command: Command): void {
    const twist = toTwist(command);
    this.send(this.cmdVelTopic, { linear: twist.linear, angular: twist.angular });
  }

  publishAlert(text: string): void {
    this.send(this.alertTopic, { data: text });
  }

  private send(topic: string, msg: Record<string, unknown>): void {
    try {
      this.connection.publish(topic, msg);
    } catch (err) {
      this.failures++;
      const failure = new PublishFailureError(errorMessage(err), topic);
      this.log.warn(`Publishing error on ${topic}: ${failure.message}`, { code: failure.code });
    }
  }
}
