import { EventEmitter } from "eventemitter3";

/**
 * Event map -- keys are event names, values are handler signatures.
 * Example: { step: (record: StepRecord) => void; complete: (summary: TraceSummary) => void }
 */
// biome-ignore lint/suspicious/noExplicitAny: base constraint for event handler signatures
export type EventMap = Record<string, (...args: any[]) => void>;

/**
 * Type-safe event emitter over eventemitter3. Handlers run synchronously in
 * registration order, inside the `emit` call.
 *
 * @example
 * ```ts
 * const events = new TypedEmitter<RunEvents>();
 * events.on("step", (record) => trace.push(record.distance));
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, handler);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.off(event, handler);
		return this;
	}

	/** Registers a handler that is removed after its first call. */
	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, handler);
		return this;
	}

	/** Invokes every handler for `event`; returns false when none is registered. */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}
}
