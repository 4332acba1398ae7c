/**
 * Persistence contracts.
 *
 * The state store holds one bundle per owner key (subscription id or batch
 * key). `save` replaces the whole bundle atomically; entry points never write
 * partial state.
 */

import type { DependencyFlowEvent, StateBundle, Subscription } from "../models/types.js";

export interface StateStore {
  load(ownerKey: string): Promise<StateBundle>;
  save(ownerKey: string, bundle: StateBundle): Promise<void>;
}

export interface SubscriptionStore {
  getSubscription(id: string): Promise<Subscription | null>;
  /** Records that the subscription's target has caught up with `buildId`. Never moves backwards. */
  markCaughtUp(id: string, buildId: number): Promise<void>;
}

/** Fire-and-forget telemetry. */
export interface FlowEventSink {
  record(events: readonly DependencyFlowEvent[]): Promise<void>;
}
