/**
 * Operation State
 *
 * Lifecycle of a long-running operation as published to observers.
 * Single writer (the operation), any number of readers.
 *
 *   idle → in-progress → succeeded | failed → idle
 */

export type OperationState<E = Error> =
  | { readonly status: "idle" }
  | { readonly status: "in-progress" }
  | { readonly status: "succeeded" }
  | { readonly status: "failed"; readonly error: E };

export type OperationStatus = OperationState["status"];

export const IDLE: OperationState<never> = { status: "idle" };
export const IN_PROGRESS: OperationState<never> = { status: "in-progress" };
export const SUCCEEDED: OperationState<never> = { status: "succeeded" };

export function failed<E>(error: E): OperationState<E> {
  return { status: "failed", error };
}

/**
 * Handle returned by subscriptions. Calling `unsubscribe` more than once
 * has no effect.
 */
export interface Subscription {
  unsubscribe(): void;
}
