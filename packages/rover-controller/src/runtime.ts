/**
 * Process lifecycle: wires the controller to its collaborators.
 */

import { ConnectionManager, type BridgeConnection } from './bridge/connection-manager.js';
import { RosCommandPublisher, RosHazardSubscriber } from './bridge/ros-adapter.js';
import type { RoverConfig } from './config/config-loader.js';
import { OperatorInputSampler } from './operator/input-sampler.js';
import { RoverController } from './rover/controller.js';
import { RoverEventBus } from './rover/event-bus.js';
import { errorMessage } from './errors.js';
import { logger as rootLogger, type Logger } from './utils/logger.js';

export interface RuntimeConnection extends BridgeConnection {
  connect(): Promise<void>;
  disconnect(): void;
}

export interface RoverRuntimeOptions {
  config: RoverConfig;
  bridgeUrl: string;
  logger?: Logger;
  connection?: RuntimeConnection;
}

export class RoverRuntime {
  readonly bus: RoverEventBus;
  readonly controller: RoverController;
  readonly operator: OperatorInputSampler;
  readonly connection: RuntimeConnection;
  private readonly hazardSubscriber: RosHazardSubscriber;
  private readonly commandPublisher: RosCommandPublisher;
  private readonly log: Logger;
  private statusSubscription: string | null = null;
  private offStateChange: (() => void) | null = null;
  private running = false;

  constructor(options: RoverRuntimeOptions) {
    const { config } = options;
    this.log = options.logger ?? rootLogger.child('Runtime');

    this.bus = new RoverEventBus(undefined, this.log.child('EventBus'));
    this.controller = new RoverController({
      outbound: this.bus,
      threshold: config.hazard.thresholdMeters,
      initialDistance: config.hazard.initialDistanceMeters,
      speedCap: config.safeMode.speedCap,
      logger: this.log.child('RoverController'),
    });
    this.operator = new OperatorInputSampler({
      sink: this.controller,
      sampleIntervalMs: config.operator.sampleIntervalMs,
      commandDeadzone: config.operator.commandDeadzone,
      stickDeadzone: config.operator.stickDeadzone,
      logger: this.log.child('OperatorInput'),
    });
    this.connection = options.connection
      ?? new ConnectionManager(options.bridgeUrl, { logger: this.log.child('ConnectionManager') });
    this.hazardSubscriber = new RosHazardSubscriber(
      this.connection,
      this.controller,
      config.topics.hazardDistance,
      this.log.child('HazardSubscriber'),
    );
    this.commandPublisher = new RosCommandPublisher(
      this.connection,
      this.bus,
      { cmdVel: config.topics.cmdVel, emergencyAlert: config.topics.emergencyAlert },
      this.log.child('CommandPublisher'),
    );
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;

    // register before connecting so the first connect replays them
    this.commandPublisher.start();
    this.hazardSubscriber.start();
    this.statusSubscription = this.bus.subscribe('status', () => this.operator.requestResend());
    this.offStateChange = this.controller.stateTracker.onStateChange(t => {
      this.log.info(`Control state: ${t.from} -> ${t.to} (${t.reason})`);
    });

    try {
      await this.connection.connect();
    } catch (err) {
      this.unregister();
      this.running = false;
      this.log.error('Rover controller failed to start', { error: errorMessage(err) });
      throw err;
    }
    this.operator.start();
    this.log.info('Rover controller running');
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    this.operator.stop();
    await this.operator.emergencyStop();

    this.unregister();
    this.connection.disconnect();
    this.log.info('Rover controller stopped');
  }

  private unregister(): void {
    if (this.statusSubscription) {
      this.bus.unsubscribe(this.statusSubscription);
      this.statusSubscription = null;
    }
    if (this.offStateChange) {
      this.offStateChange();
      this.offStateChange = null;
    }
    this.hazardSubscriber.stop();
    this.commandPublisher.stop();
  }
}
