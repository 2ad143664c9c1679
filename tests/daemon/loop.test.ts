import { afterEach, describe, expect, it, vi } from "vitest";
import { MAX_TIMER_DELAY_MS, startExpiryDaemon } from "../../src/daemon/loop.js";

describe("expiry daemon loop", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("sweeps immediately and then once per interval", async () => {
		vi.useFakeTimers();
		const onSweep = vi.fn().mockResolvedValue(undefined);

		const daemon = startExpiryDaemon({ intervalMs: 60_000, onSweep });
		expect(onSweep).toHaveBeenCalledTimes(1);

		await vi.advanceTimersByTimeAsync(59_999);
		expect(onSweep).toHaveBeenCalledTimes(1);

		await vi.advanceTimersByTimeAsync(1);
		expect(onSweep).toHaveBeenCalledTimes(2);

		await vi.advanceTimersByTimeAsync(60_000);
		expect(onSweep).toHaveBeenCalledTimes(3);

		daemon.stop();
		await daemon.done;
	});

	it("waits for a slow sweep before starting the interval", async () => {
		vi.useFakeTimers();
		let finishSweep: () => void = () => {};
		const onSweep = vi.fn(
			() =>
				new Promise<void>((resolve) => {
					finishSweep = resolve;
				}),
		);

		const daemon = startExpiryDaemon({ intervalMs: 1_000, onSweep });
		await vi.advanceTimersByTimeAsync(5_000);
		expect(onSweep).toHaveBeenCalledTimes(1);

		finishSweep();
		await vi.advanceTimersByTimeAsync(999);
		expect(onSweep).toHaveBeenCalledTimes(1);
		await vi.advanceTimersByTimeAsync(1);
		expect(onSweep).toHaveBeenCalledTimes(2);

		daemon.stop();
		finishSweep();
		await daemon.done;
	});

	it("keeps running after a failed sweep", async () => {
		vi.useFakeTimers();
		const onSweep = vi
			.fn()
			.mockRejectedValueOnce(new Error("database is locked"))
			.mockResolvedValue(undefined);

		const daemon = startExpiryDaemon({ intervalMs: 1_000, onSweep });
		await vi.advanceTimersByTimeAsync(1_000);
		expect(onSweep).toHaveBeenCalledTimes(2);

		daemon.stop();
		await daemon.done;
	});

	it("stops when the external signal aborts", async () => {
		vi.useFakeTimers();
		const controller = new AbortController();
		const onSweep = vi.fn().mockResolvedValue(undefined);

		const daemon = startExpiryDaemon({ intervalMs: 1_000, onSweep, signal: controller.signal });
		await vi.advanceTimersByTimeAsync(0);
		controller.abort();
		await daemon.done;

		await vi.advanceTimersByTimeAsync(10_000);
		expect(onSweep).toHaveBeenCalledTimes(1);
	});

	it("rejects a non-positive interval", () => {
		expect(() => startExpiryDaemon({ intervalMs: 0, onSweep: async () => {} })).toThrow(
			RangeError,
		);
	});

	it("rejects an interval longer than a single timer can wait", () => {
		const onSweep = vi.fn().mockResolvedValue(undefined);

		expect(() => startExpiryDaemon({ intervalMs: 2_592_000_000, onSweep })).toThrow(
			"intervalMs must be between 1 and 2147483647 (got 2592000000)",
		);
		expect(onSweep).not.toHaveBeenCalled();
	});

	it("waits the full interval at the largest allowed delay", async () => {
		vi.useFakeTimers();
		const onSweep = vi.fn().mockResolvedValue(undefined);

		const daemon = startExpiryDaemon({ intervalMs: MAX_TIMER_DELAY_MS, onSweep });
		await vi.advanceTimersByTimeAsync(MAX_TIMER_DELAY_MS - 1);
		expect(onSweep).toHaveBeenCalledTimes(1);
		await vi.advanceTimersByTimeAsync(1);
		expect(onSweep).toHaveBeenCalledTimes(2);

		daemon.stop();
		await daemon.done;
	});
});
