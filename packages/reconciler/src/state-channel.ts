/**
 * Operation State Channel
 *
 * Single-producer, multi-consumer broadcast of OperationState transitions.
 * Subscribers only see states published after they subscribed; nothing is
 * replayed. `current` holds the latest state for pull-style readers.
 *
 * Dispatch is synchronous and in subscription order.
 */

import pino from "pino";
import type { Logger } from "pino";
import { IDLE } from "@exposure/types";
import type { OperationState, Subscription } from "@exposure/types";

export type StateHandler<E> = (state: OperationState<E>) => void;

export class OperationStateChannel<E = Error> {
  private readonly _subscribers = new Set<StateHandler<E>>();
  private readonly _logger: Logger;
  private _current: OperationState<E> = IDLE;

  constructor(logger?: Logger) {
    this._logger = logger ?? pino({ level: "silent" });
  }

  get current(): OperationState<E> {
    return this._current;
  }

  subscribe(handler: StateHandler<E>): Subscription {
    // Wrap so the same function can subscribe twice and unsubscribe independently
    const entry: StateHandler<E> = (state) => handler(state);
    this._subscribers.add(entry);

    return {
      unsubscribe: () => {
        this._subscribers.delete(entry);
      },
    };
  }

  /**
   * Publish a transition. A throwing subscriber is logged and does not
   * prevent delivery to the others.
   */
  publish(state: OperationState<E>): void {
    this._current = state;

    for (const handler of [...this._subscribers]) {
      try {
        handler(state);
      } catch (error) {
        this._logger.error({ err: error, status: state.status }, "State subscriber threw");
      }
    }
  }

  get subscriberCount(): number {
    return this._subscribers.size;
  }
}
