import { backoffDelay, retryWithBackoff } from "./Retry";
import { describe, expect, it, vi } from "vitest";

const POLICY = { attempts: 4, baseDelayMs: 100, maxDelayMs: 350 };

describe("Retry", () => {
	describe("backoffDelay", () => {
		it("doubles the delay after each failure up to the cap", () => {
			const noJitter = () => 0;

			expect([1, 2, 3, 4].map(attempt => backoffDelay(attempt, POLICY, noJitter))).toEqual([100, 200, 350, 350]);
		});

		it("adds jitter on top of the capped delay", () => {
			expect(backoffDelay(2, POLICY, () => 0.5)).toBe(300);
			expect(backoffDelay(3, POLICY, () => 0.999)).toBe(699);
		});
	});

	describe("retryWithBackoff", () => {
		function hooks(shouldRetry: (error: unknown) => boolean = () => true) {
			return { shouldRetry, label: "DB connect", sleep: vi.fn().mockResolvedValue(undefined), random: () => 0 };
		}

		it("returns the first result without waiting", async () => {
			const retry = hooks();
			const operation = vi.fn().mockResolvedValue("connected");

			expect(await retryWithBackoff(operation, POLICY, retry)).toBe("connected");
			expect(retry.sleep).not.toHaveBeenCalled();
		});

		it("waits between failed attempts until the operation succeeds", async () => {
			const retry = hooks();
			const operation = vi
				.fn()
				.mockRejectedValueOnce(new Error("connect ECONNREFUSED"))
				.mockRejectedValueOnce(new Error("connect ECONNREFUSED"))
				.mockResolvedValue("connected");

			expect(await retryWithBackoff(operation, POLICY, retry)).toBe("connected");
			expect(operation).toHaveBeenCalledTimes(3);
			expect(retry.sleep.mock.calls).toEqual([[100], [200]]);
		});

		it("rethrows the last error once the attempts run out", async () => {
			const retry = hooks();
			const operation = vi.fn().mockRejectedValue(new Error("still down"));

			await expect(retryWithBackoff(operation, POLICY, retry)).rejects.toThrow("still down");
			expect(operation).toHaveBeenCalledTimes(4);
			expect(retry.sleep.mock.calls).toEqual([[100], [200], [350]]);
		});

		it("rethrows at once when the error is not retryable", async () => {
			const retry = hooks(() => false);
			const operation = vi.fn().mockRejectedValue(new Error("password authentication failed"));

			await expect(retryWithBackoff(operation, POLICY, retry)).rejects.toThrow("password authentication failed");
			expect(operation).toHaveBeenCalledTimes(1);
			expect(retry.sleep).not.toHaveBeenCalled();
		});

		it("waits with a real timer by default", async () => {
			const operation = vi.fn().mockRejectedValueOnce(new Error("blip")).mockResolvedValue("ok");

			const result = await retryWithBackoff(
				operation,
				{ attempts: 2, baseDelayMs: 1, maxDelayMs: 1 },
				{ shouldRetry: () => true, label: "DB connect", random: () => 0 },
			);

			expect(result).toBe("ok");
			expect(operation).toHaveBeenCalledTimes(2);
		});
	});
});
