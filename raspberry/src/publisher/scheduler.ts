import type winston from "winston";

import { errorMessage } from "../lib/errors";
import type { BrokerSession } from "./broker-session";
import type { ConnectivityGate } from "./connectivity";
import type { MetricSnapshot } from "./metric-cache";
import { buildTelemetryMessage, hasData, serializeTelemetry } from "./payload";
import { QOS_AT_LEAST_ONCE } from "./transport";
import type { PendingTask, WorkerContext } from "./worker";

export const DEFAULT_PUBLISH_INTERVAL_MS = 1_000;

export type SchedulerState = "idle" | "running";

export type CycleOutcome = "offline" | "empty" | "published" | "failed";

export interface PublishSchedulerOptions {
	worker: WorkerContext;
	session: Pick<BrokerSession, "publish">;
	snapshot: () => MetricSnapshot;
	isOnline: ConnectivityGate;
	topic: string;
	deviceId: string;
	intervalMs?: number;
	clock?: () => number;
	logger: winston.Logger;
}

/**
 * Publishes a snapshot right away on start() and then `intervalMs` after
 * each cycle finishes. Failures never stop the loop.
 */
export class PublishScheduler {
	private readonly intervalMs: number;
	private readonly clock: () => number;
	private pending: PendingTask | null = null;
	private generation = 0;
	private _state: SchedulerState = "idle";

	constructor(private readonly opts: PublishSchedulerOptions) {
		this.intervalMs = opts.intervalMs ?? DEFAULT_PUBLISH_INTERVAL_MS;
		this.clock = opts.clock ?? Date.now;
	}

	get state(): SchedulerState {
		return this._state;
	}

	start(): void {
		if (this._state === "running") return;
		this._state = "running";

		const generation = ++this.generation;
		this.pending = this.opts.worker.post(() => this.cycle(generation));
		this.opts.logger.info("Publishing every %dms to %s", this.intervalMs, this.opts.topic);
	}

	stop(): void {
		if (this._state === "idle") return;
		this._state = "idle";

		this.generation++;
		this.pending?.cancel();
		this.pending = null;
		this.opts.logger.info("Publishing stopped");
	}

	/**
	 * One publish attempt. Exposed for diagnostics; the loop calls it via the worker.
	 */
	runOnce(): CycleOutcome {
		const { logger } = this.opts;

		if (!this.opts.isOnline()) {
			logger.error("No active network; skipping publish");
			return "offline";
		}

		try {
			const message = buildTelemetryMessage(this.opts.snapshot(), this.opts.deviceId, this.clock());
			if (!hasData(message)) {
				logger.debug("No sensor measurement to publish");
				return "empty";
			}

			const payload = serializeTelemetry(message);
			logger.debug("Publishing message: %s", payload);
			this.opts.session.publish(this.opts.topic, payload, QOS_AT_LEAST_ONCE);
			return "published";
		} catch (err) {
			logger.error("Error publishing message: %s", errorMessage(err));
			return "failed";
		}
	}

	private cycle(generation: number): void {
		try {
			this.runOnce();
		} finally {
			// stop() (or stop() + start()) since this cycle was queued retires it
			if (generation === this.generation && this._state === "running") {
				this.pending = this.opts.worker.postDelayed(() => this.cycle(generation), this.intervalMs);
			}
		}
	}
}
