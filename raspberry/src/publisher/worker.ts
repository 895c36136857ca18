import type winston from "winston";

import { errorMessage } from "../lib/errors";

export type Task = () => void | Promise<void>;

export interface PendingTask {
	cancel: () => void;
}

/**
 * Single serial execution context. Tasks run one at a time in post order;
 * a task returning a promise is awaited before the next one starts.
 */
export class WorkerContext {
	private tail: Promise<void> = Promise.resolve();
	private readonly delayed = new Set<NodeJS.Timeout>();
	private quitting = false;

	constructor(
		readonly name: string,
		private readonly logger: winston.Logger
	) {}

	get isQuitting(): boolean {
		return this.quitting;
	}

	/**
	 * Queue a task. Returns null once the worker is quitting.
	 */
	post(task: Task): PendingTask | null {
		if (this.quitting) return null;

		let cancelled = false;
		this.tail = this.tail.then(async () => {
			if (cancelled) return;
			await this.run(task);
		});

		return {
			cancel: () => {
				cancelled = true;
			}
		};
	}

	/**
	 * Queue a task after `delayMs`. Cancelling covers both the wait and the
	 * time it spends queued behind other tasks.
	 */
	postDelayed(task: Task, delayMs: number): PendingTask | null {
		if (this.quitting) return null;

		let queued: PendingTask | null = null;
		let cancelled = false;

		const timer = setTimeout(() => {
			this.delayed.delete(timer);
			if (cancelled) return;
			queued = this.post(task);
		}, delayMs);
		this.delayed.add(timer);

		return {
			cancel: () => {
				cancelled = true;
				clearTimeout(timer);
				this.delayed.delete(timer);
				queued?.cancel();
			}
		};
	}

	/**
	 * Stop accepting work, drop delayed tasks, and resolve once every task
	 * already queued has run.
	 */
	async quitSafely(): Promise<void> {
		this.quitting = true;
		for (const timer of this.delayed) {
			clearTimeout(timer);
		}
		this.delayed.clear();
		this.logger.debug("Worker %s draining", this.name);
		await this.tail;
	}

	private async run(task: Task): Promise<void> {
		try {
			await task();
		} catch (err) {
			this.logger.error("Task failed on worker %s: %s", this.name, errorMessage(err));
		}
	}
}
