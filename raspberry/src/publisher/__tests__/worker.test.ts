import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { WorkerContext } from "../worker";
import { silentLogger } from "./fake-transport";

function delay(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}

describe("WorkerContext", () => {
	let worker: WorkerContext;

	beforeEach(() => {
		vi.useFakeTimers();
		worker = new WorkerContext("test", silentLogger());
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("runs tasks one at a time in post order", async () => {
		const order: string[] = [];

		worker.post(async () => {
			order.push("a:start");
			await delay(50);
			order.push("a:end");
		});
		worker.post(() => {
			order.push("b");
		});

		await vi.advanceTimersByTimeAsync(50);

		expect(order).toEqual(["a:start", "a:end", "b"]);
	});

	it("keeps running after a task throws", async () => {
		const order: string[] = [];

		worker.post(() => {
			throw new Error("boom");
		});
		worker.post(() => {
			order.push("after");
		});
		await worker.quitSafely();

		expect(order).toEqual(["after"]);
	});

	it("skips a cancelled task", async () => {
		const task = vi.fn();

		worker.post(task)?.cancel();
		await worker.quitSafely();

		expect(task).not.toHaveBeenCalled();
	});

	it("runs a delayed task after its delay", async () => {
		const task = vi.fn();

		worker.postDelayed(task, 1000);

		await vi.advanceTimersByTimeAsync(999);
		expect(task).not.toHaveBeenCalled();

		await vi.advanceTimersByTimeAsync(1);
		expect(task).toHaveBeenCalledTimes(1);
	});

	it("does not run a cancelled delayed task", async () => {
		const task = vi.fn();

		worker.postDelayed(task, 1000)?.cancel();
		await vi.advanceTimersByTimeAsync(2000);

		expect(task).not.toHaveBeenCalled();
	});

	it("drains queued tasks, drops delayed ones and refuses new work on quit", async () => {
		const queued = vi.fn();
		const delayed = vi.fn();
		let slowDone = false;

		worker.post(async () => {
			await delay(100);
			slowDone = true;
		});
		worker.post(queued);
		worker.postDelayed(delayed, 10);

		const quit = worker.quitSafely();
		expect(worker.post(vi.fn())).toBeNull();
		expect(worker.postDelayed(vi.fn(), 1)).toBeNull();

		await vi.advanceTimersByTimeAsync(100);
		await quit;

		expect(slowDone).toBe(true);
		expect(queued).toHaveBeenCalledTimes(1);
		expect(delayed).not.toHaveBeenCalled();
		expect(worker.isQuitting).toBe(true);
	});
});
