import { randomUUID } from "node:crypto";
import type { EventPayloads, EventSource, UIEvent, UIEventType } from "./types";

export type EventInit = {
	[T in UIEventType]: { type: T; payload: EventPayloads[T] };
}[UIEventType];

export function createEvent(
	init: EventInit,
	options: { source?: EventSource; sessionId?: string; turnId?: number } = {}
): UIEvent {
	return {
		eventId: randomUUID(),
		timestamp: Date.now(),
		sessionId: options.sessionId ?? "",
		source: options.source ?? "agent",
		...(options.turnId !== undefined ? { turnId: options.turnId } : {}),
		...init,
	};
}

/**
 * Unbounded FIFO between the turn task (sole producer) and the render tick
 * (sole consumer). Nothing is ever dropped.
 */
export class UIEventBus {
	private queue: UIEvent[] = [];
	private head = 0;

	publish(event: UIEvent): void {
		this.queue.push(event);
	}

	drain(limit: number): UIEvent[] {
		const end = Math.min(this.queue.length, this.head + Math.max(0, limit));
		const batch = this.queue.slice(this.head, end);
		this.head = end;
		if (this.head > 1024 && this.head * 2 > this.queue.length) {
			this.queue = this.queue.slice(this.head);
			this.head = 0;
		}
		return batch;
	}

	get size(): number {
		return this.queue.length - this.head;
	}
}
