/**
 * Rover event publish/subscribe bus.
 *
 * The outbound side of the controller: final commands, alert text and
 * status changes are fanned out to subscribers (bridge publisher, tool
 * surface, UI) and kept in a bounded history for retrospective queries.
 */

import { randomUUID } from 'crypto';
import { DEFAULT_EVENT_HISTORY } from '../constants.js';
import { errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { Command, HazardStatus, RoverOutbound } from './types.js';

export type RoverEvent =
  | { type: 'command'; timestamp: number; command: Command }
  | { type: 'alert'; timestamp: number; text: string }
  | { type: 'status'; timestamp: number; status: HazardStatus; safeModeEnabled: boolean };

export type RoverEventType = RoverEvent['type'];
export type RoverEventOf<T extends RoverEventType> = Extract<RoverEvent, { type: T }>;

function isEventOfType<T extends RoverEventType>(event: RoverEvent, type: T): event is RoverEventOf<T> {
  return event.type === type;
}

interface Subscription {
  id: string;
  deliver: (event: RoverEvent) => void;
}

export class RoverEventBus implements RoverOutbound {
  private subscriptions = new Map<string, Subscription>();
  private history: RoverEvent[] = [];

  constructor(
    private readonly maxHistory = DEFAULT_EVENT_HISTORY,
    private readonly log: Logger = rootLogger.child('EventBus'),
  ) {}

  /**
   * Subscribe to one event type.
   * @returns A subscription ID used for unsubscribing.
   */
  subscribe<T extends RoverEventType>(type: T, callback: (event: RoverEventOf<T>) => void): string {
    return this.add((event) => {
      if (isEventOfType(event, type)) callback(event);
    });
  }

  unsubscribe(id: string): boolean {
    return this.subscriptions.delete(id);
  }

  publishCommand(command: Command): void {
    this.emit({ type: 'command', timestamp: Date.now(), command });
  }

  publishAlert(text: string): void {
    this.emit({ type: 'alert', timestamp: Date.now(), text });
  }

  notifyStatusChanged(status: HazardStatus, safeModeEnabled: boolean): void {
    this.emit({ type: 'status', timestamp: Date.now(), status, safeModeEnabled });
  }

  /** Recent events of one type, newest first. */
  getHistoryByType<T extends RoverEventType>(type: T, limit?: number): RoverEventOf<T>[] {
    const events = this.history.filter((e): e is RoverEventOf<T> => isEventOfType(e, type)).reverse();
    return limit !== undefined && limit > 0 ? events.slice(0, limit) : events;
  }

  getSubscriberCount(): number {
    return this.subscriptions.size;
  }

  private add(deliver: (event: RoverEvent) => void): string {
    const id = randomUUID();
    this.subscriptions.set(id, { id, deliver });
    return id;
  }

  private emit(event: RoverEvent): void {
    this.history.push(event);
    if (this.history.length > this.maxHistory) {
      this.history = this.history.slice(-this.maxHistory);
    }

    for (const sub of this.subscriptions.values()) {
      try {
        sub.deliver(event);
      } catch (err) {
        this.log.warn('Subscriber failed', { event: event.type, error: errorMessage(err) });
      }
    }
  }
}
