import { describe, expect, it } from "vitest";
import { AgentState } from "../agent-state";

describe("AgentState", () => {
	it("rejects an initial interval of 4 seconds or less", () => {
		expect(() => new AgentState(4)).toThrow(RangeError);
		expect(() => new AgentState(5)).not.toThrow();
	});

	describe("changePublishInterval", () => {
		it("applies values above 4 that differ from the current one", () => {
			const state = new AgentState(10);
			expect(state.changePublishInterval(30)).toEqual({ result: "changed", previous: 10, current: 30 });
			expect(state.publishInterval).toBe(30);
		});

		it("applies 5, the smallest accepted value", () => {
			const state = new AgentState(10);
			expect(state.changePublishInterval(5).result).toBe("changed");
			expect(state.publishInterval).toBe(5);
		});

		it.each([4, 2, 0, -10])("leaves the interval alone for %d", value => {
			const state = new AgentState(10);
			expect(state.changePublishInterval(value)).toEqual({ result: "too-small", current: 10, requested: value });
			expect(state.publishInterval).toBe(10);
		});

		it("is a no-op for the current value", () => {
			const state = new AgentState(10);
			expect(state.changePublishInterval(10)).toEqual({ result: "unchanged", current: 10 });
			expect(state.publishInterval).toBe(10);
		});
	});

	describe("isPublishDue", () => {
		it("is due on the very first check", () => {
			const state = new AgentState(10);
			expect(state.isPublishDue(1_000)).toBe(true);
		});

		it("becomes due only once now exceeds lastPublish + interval", () => {
			const state = new AgentState(10);
			state.markPublished(1_000);

			expect(state.isPublishDue(1_005)).toBe(false);
			expect(state.isPublishDue(1_010)).toBe(false);
			expect(state.isPublishDue(1_011)).toBe(true);
		});

		it("follows a changed interval", () => {
			const state = new AgentState(10);
			state.markPublished(1_000);
			state.changePublishInterval(20);

			expect(state.isPublishDue(1_015)).toBe(false);
			expect(state.isPublishDue(1_021)).toBe(true);
		});
	});

	describe("withExclusive", () => {
		it("runs sections one after another", async () => {
			const state = new AgentState(10);
			const order: string[] = [];

			let release: () => void = () => undefined;
			const gate = new Promise<void>(resolve => {
				release = resolve;
			});

			const first = state.withExclusive(async () => {
				order.push("first:start");
				await gate;
				order.push("first:end");
				return 1;
			});
			const second = state.withExclusive(async () => {
				order.push("second");
				return 2;
			});

			await Promise.resolve();
			expect(order).toEqual(["first:start"]);

			release();
			expect(await Promise.all([first, second])).toEqual([1, 2]);
			expect(order).toEqual(["first:start", "first:end", "second"]);
		});

		it("keeps going after a section throws", async () => {
			const state = new AgentState(10);
			await expect(
				state.withExclusive(async () => {
					throw new Error("boom");
				})
			).rejects.toThrow("boom");
			await expect(state.withExclusive(async () => "next")).resolves.toBe("next");
		});
	});
});
