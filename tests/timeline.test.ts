import { describe, it, expect } from "vitest";
import { Timeline } from "../src/ui/timeline";

function texts(timeline: Timeline): string[] {
	return timeline.cards.map((card) =>
		card.kind === "assistant" ? `${card.state}:${card.text}` : card.kind
	);
}

describe("Timeline", () => {
	it("buffers deltas until flushed", () => {
		const timeline = new Timeline();
		timeline.appendDelta("Hel");
		timeline.appendDelta("lo");
		expect(texts(timeline)).toEqual(["streaming:"]);
		expect(timeline.pending).toBe("Hello");
		expect(timeline.flush()).toBe(true);
		expect(timeline.flush()).toBe(false);
		expect(texts(timeline)).toEqual(["streaming:Hello"]);
	});

	it("closes the stream before inserting another card", () => {
		const timeline = new Timeline();
		timeline.appendDelta("before");
		timeline.add({ kind: "plan", content: "1. Step" });
		timeline.appendDelta("after");
		timeline.closeStream();
		expect(texts(timeline)).toEqual(["done:before", "plan", "done:after"]);
		expect(timeline.isStreaming).toBe(false);
	});

	it("marks interruptions on the open card or a new one", () => {
		const timeline = new Timeline();
		timeline.appendDelta("partial");
		timeline.interrupt();
		timeline.interrupt();
		expect(texts(timeline)).toEqual(["interrupted:partial\n[Interrupted]", "interrupted:[Interrupted]"]);
	});

	it("appends failures to the open card as an error", () => {
		const timeline = new Timeline();
		timeline.appendDelta("working");
		timeline.fail("CRITICAL_FAILURE: boom");
		expect(texts(timeline)).toEqual(["error:working\nCRITICAL_FAILURE: boom"]);
	});

	it("assigns increasing ids and clears everything", () => {
		const timeline = new Timeline();
		const first = timeline.add({ kind: "user", text: "a" });
		const second = timeline.add({ kind: "user", text: "b" });
		expect(second).toBeGreaterThan(first);
		timeline.appendDelta("x");
		timeline.clear();
		expect(timeline.cards).toEqual([]);
		expect(timeline.pending).toBe("");
		expect(timeline.isStreaming).toBe(false);
	});
});
