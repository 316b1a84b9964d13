/**
 * ExposureService — Composition root for the exposure packages.
 *
 * Route handlers and the scheduler delegate to this service; they never
 * construct domain objects themselves. One instance per process.
 */

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import pino from "pino";
import {
  DisclosureMatcher,
  KeyRotator,
  Reconciler,
  ReportSubmissionPipeline,
  systemClock,
} from "@exposure/reconciler";
import type {
  BroadcastIdentifier,
  Clock,
  NoOwnKeysPolicy,
  ReconciliationError,
  ReconciliationOutcome,
  StateHandler,
  SubmissionError,
} from "@exposure/reconciler";
import type {
  CheckpointStore,
  DisclosureKeyClient,
  ObservationStore,
  ObservedIdentifier,
  OperationState,
  OwnKeyStore,
  ReportClient,
  Result,
  Subscription,
  SymptomReport,
} from "@exposure/types";

// =============================================================================
// Configuration
// =============================================================================

export interface ExposureServiceConfig {
  readonly observations: ObservationStore;
  readonly ownKeys: OwnKeyStore;
  readonly checkpoints: CheckpointStore;
  readonly keyClient: DisclosureKeyClient;
  readonly reportClient: ReportClient;
  readonly windowSeconds?: number;
  readonly lookbackWindows?: number;
  readonly keyWindowCount?: number;
  readonly reportKeyCount?: number;
  readonly noOwnKeys?: NoOwnKeysPolicy;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

export type ReconcileResult = Result<ReconciliationOutcome, ReconciliationError>;

// =============================================================================
// Service
// =============================================================================

export class ExposureService {
  readonly reconciler: Reconciler;
  readonly pipeline: ReportSubmissionPipeline;
  readonly rotator: KeyRotator;

  private readonly observations: ObservationStore;
  private readonly checkpoints: CheckpointStore;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private _inFlight: Promise<ReconcileResult> | null = null;

  constructor(config: ExposureServiceConfig) {
    this.observations = config.observations;
    this.checkpoints = config.checkpoints;
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? pino({ level: "silent" });

    this.reconciler = new Reconciler({
      keyClient: config.keyClient,
      reportClient: config.reportClient,
      matcher: new DisclosureMatcher({
        observations: config.observations,
        windowSeconds: config.windowSeconds,
        lookbackWindows: config.lookbackWindows,
      }),
      clock: this.clock,
      logger: this.logger.child({ component: "reconciler" }),
    });

    this.pipeline = new ReportSubmissionPipeline({
      ownKeys: config.ownKeys,
      reportClient: config.reportClient,
      reportKeyCount: config.reportKeyCount,
      noOwnKeys: config.noOwnKeys,
      logger: this.logger.child({ component: "submission" }),
    });

    this.rotator = new KeyRotator({
      ownKeys: config.ownKeys,
      windowSeconds: config.windowSeconds,
      keyWindowCount: config.keyWindowCount,
      logger: this.logger.child({ component: "rotation" }),
    });
  }

  // ─── Observations ──────────────────────────────────────────────────

  /**
   * Record an identifier heard from a nearby device.
   *
   * @returns false when the same identifier was already recorded at the same time
   */
  storeObservedCen(observed: ObservedIdentifier): boolean {
    const inserted = this.observations.insert(observed);
    this.logger.debug({ observedAt: observed.observedAt, inserted }, "Observation stored");
    return inserted;
  }

  // ─── Broadcast ─────────────────────────────────────────────────────

  currentIdentifier(): BroadcastIdentifier {
    return this.rotator.currentIdentifier(this.clock());
  }

  // ─── Reconciliation ────────────────────────────────────────────────

  /**
   * Reconcile from the saved checkpoint. A call made while a run is in
   * flight joins that run. The checkpoint advances only on success.
   */
  reconcile(): Promise<ReconcileResult> {
    if (this._inFlight !== null) {
      return this._inFlight;
    }

    const run = this._runReconciliation().finally(() => {
      this._inFlight = null;
    });
    this._inFlight = run;
    return run;
  }

  get reconciling(): boolean {
    return this._inFlight !== null;
  }

  private async _runReconciliation(): Promise<ReconcileResult> {
    const since = this.checkpoints.load();
    const result = await this.reconciler.reconcile(since);

    if (result.ok) {
      this.checkpoints.save(result.value.checkpoint);
      this.logger.info(
        { since, checkpoint: result.value.checkpoint, ...result.value.stats },
        "Reconciliation complete",
      );
    } else {
      this.logger.warn({ since, code: result.error.code }, "Reconciliation failed");
    }

    return result;
  }

  // ─── Reports ───────────────────────────────────────────────────────

  /**
   * Queue a symptom report for submission.
   */
  sendReport(description: string): SymptomReport {
    const report: SymptomReport = {
      id: randomUUID(),
      description,
      createdAt: this.clock(),
    };
    this.pipeline.submit(report);
    return report;
  }

  get reportState(): OperationState<SubmissionError> {
    return this.pipeline.state.current;
  }

  subscribeReportState(handler: StateHandler<SubmissionError>): Subscription {
    return this.pipeline.state.subscribe(handler);
  }

  /**
   * Resolves once every queued submission has finished.
   */
  drain(): Promise<void> {
    return this.pipeline.drain();
  }
}
