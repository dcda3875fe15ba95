import { createPubSub, type Unsubscriber } from "@marianmeres/pubsub";
import type { MachineDefinition } from "./define-machine.ts";
import { InvalidState, TransitionNotAllowed } from "./errors.ts";
import { fromJson, type FromJsonOptions } from "./from-json.ts";
import { fromMermaid, toMermaid } from "./from-mermaid.ts";
import {
	type HandlerMap,
	resolveHandlers,
	validateHandlers,
} from "./handlers.ts";

/**
 * Logger interface compatible with console.
 * All methods accept variadic arguments and return a string.
 */
export interface Logger {
	debug: (...args: unknown[]) => string;
	log: (...args: unknown[]) => string;
	warn: (...args: unknown[]) => string;
	error: (...args: unknown[]) => string;
}

/**
 * Default console-based logger that wraps console methods.
 * Returns the first argument as a string (or empty string if no args).
 */
const defaultLogger: Logger = {
	debug: (...args: unknown[]) => {
		console.debug(...args);
		return String(args[0] ?? "");
	},
	log: (...args: unknown[]) => {
		console.log(...args);
		return String(args[0] ?? "");
	},
	warn: (...args: unknown[]) => {
		console.warn(...args);
		return String(args[0] ?? "");
	},
	error: (...args: unknown[]) => {
		console.error(...args);
		return String(args[0] ?? "");
	},
};

/**
 * Arbitrary payload data passed to `transitionTo()`.
 * Forwarded untouched to the wildcard and the specific handler.
 */
export type FSMPayload = unknown;

/**
 * Instance options.
 *
 * @template TState - Union type of all possible state names
 * @template TSubject - Type of the bound subject object
 */
export type FSMOptions<TState extends string, TSubject = unknown> = {
	/** State to start in instead of the definition's default state */
	initial?: TState;
	/** External object handlers may read and mutate. Never copied. */
	subject?: TSubject;
	/** Instance-level handlers, consulted before the definition's own */
	handlers?: HandlerMap<TState, TSubject>;
	/** Enable debug logging (default: false) */
	debug?: boolean;
	/** Custom logger implementing Logger interface (default: console) */
	logger?: Logger;
};

/**
 * Published state data sent to subscribers.
 * Contains the current state and the previous state (null if initial).
 *
 * @template TState - Union type of all possible state names
 */
export type PublishedState<TState> = {
	current: TState;
	previous: TState | null;
};

/** Stops a subscription created with `subscribe()`. */
export type Unsubscribe = Unsubscriber;

/**
 * Factory function to create an FSM instance.
 * Equivalent to calling `new FSM(definition, options)`.
 *
 * @example
 * ```typescript
 * const fsm = createFsm(
 *   defineMachine<"ON" | "OFF">({
 *     defaultState: "OFF",
 *     transitions: { ON: ["OFF"], OFF: ["ON"] },
 *   })
 * );
 * ```
 */
export function createFsm<TState extends string, TSubject = unknown>(
	definition: MachineDefinition<TState, TSubject>,
	options: FSMOptions<TState, TSubject> = {}
): FSM<TState, TSubject> {
	return new FSM<TState, TSubject>(definition, options);
}

/**
 * A synchronous finite state machine instance bound to a shared definition.
 *
 * The instance only ever moves along edges declared in the definition's
 * transition table. Around each transition it calls at most two handlers, in
 * this order:
 *
 * 1. the wildcard handler (`"*"`), on every transition
 * 2. the specific handler registered for the target state
 *
 * Both run before the state changes: inside a handler `fsm.state` is still the
 * source state and the target is passed as the first argument. If a handler
 * throws, the transition is abandoned and the state is left as it was.
 *
 * @template TState - Union type of all possible state names
 * @template TSubject - Type of the bound subject object
 *
 * @example
 * ```typescript
 * const fsm = new FSM(workflow, { subject: post });
 *
 * fsm.subscribe(({ current }) => console.log(current));
 * fsm.transitionTo("review"); // → "review"
 * ```
 */
export class FSM<TState extends string, TSubject = unknown> {
	/** FSM's previous state */
	#previous: TState | null = null;

	/** FSM's current state */
	#state: TState;

	/** State this instance was created in, restored by `reset()` */
	#initial: TState;

	#subject: TSubject | undefined;

	#handlers: HandlerMap<TState, TSubject> | undefined;

	/** Internal pub sub */
	#pubsub = createPubSub();

	/** Logger instance */
	#logger: Logger;

	/** Debug mode flag */
	#debug: boolean;

	/**
	 * Creates a new FSM instance.
	 * @param definition - Validated machine definition, see `defineMachine()`
	 * @param options - Initial state override, subject, handlers, logging
	 * @throws InvalidState if `options.initial` is not a defined state
	 * @throws InvalidHandler if `options.handlers` does not fit the definition
	 */
	constructor(
		public readonly definition: MachineDefinition<TState, TSubject>,
		options: FSMOptions<TState, TSubject> = {}
	) {
		this.#debug = options.debug ?? false;
		this.#logger = options.logger ?? defaultLogger;

		const initial = options.initial ?? definition.defaultState;
		if (!definition.table.isValidState(initial)) {
			throw new InvalidState(initial);
		}
		validateHandlers(options.handlers, definition.table);

		this.#initial = initial;
		this.#state = initial;
		this.#subject = options.subject;
		this.#handlers = options.handlers && { ...options.handlers };
		this.#debugLog(`FSM created with initial state "${this.#state}"`);
	}

	/** Log debug message if debug mode is enabled */
	#debugLog(...args: unknown[]): void {
		if (this.#debug) {
			this.#logger.debug("[FSM]", ...args);
		}
	}

	/**
	 * Returns whether debug mode is enabled.
	 * @returns `true` if debug logging is active, `false` otherwise
	 */
	get debug(): boolean {
		return this.#debug;
	}

	/**
	 * Returns the logger instance used by this FSM.
	 * @returns The Logger instance (default: console)
	 */
	get logger(): Logger {
		return this.#logger;
	}

	/**
	 * Returns the current state of the FSM.
	 * This is a non-reactive getter; use `subscribe()` for reactive updates.
	 * While a handler runs, this is still the source state of the transition.
	 */
	get state(): TState {
		return this.#state;
	}

	/** State before the last committed transition, `null` if there was none. */
	get previous(): TState | null {
		return this.#previous;
	}

	/** The bound subject, if one was supplied. */
	get subject(): TSubject | undefined {
		return this.#subject;
	}

	#getNotifyData(): PublishedState<TState> {
		return {
			current: this.#state,
			previous: this.#previous,
		};
	}

	#notify() {
		this.#pubsub.publish("change", this.#getNotifyData());
	}

	/**
	 * Subscribes to FSM state changes.
	 * The callback is invoked immediately with the current state and after every
	 * committed transition or reset.
	 *
	 * **Important:** Subscribers are notified synchronously. Calling
	 * `transitionTo()` from within a subscriber is allowed, but the remaining
	 * subscribers of the outer notification will then observe the newer state.
	 *
	 * @param cb - Callback function receiving current and previous state
	 * @returns Function to stop receiving updates
	 *
	 * @example
	 * ```typescript
	 * const unsub = fsm.subscribe(({ current, previous }) => {
	 *   console.log(`State changed from ${previous} to ${current}`);
	 * });
	 * // Later: unsub() to stop listening
	 * ```
	 */
	subscribe(cb: (data: PublishedState<TState>) => void): Unsubscribe {
		this.#debugLog("subscribe() called");
		const unsub = this.#pubsub.subscribe("change", () =>
			cb(this.#getNotifyData())
		);
		cb(this.#getNotifyData());
		return unsub;
	}

	/**
	 * Moves the FSM to `target`.
	 *
	 * Execution order:
	 * 1. `target` must be a defined state (else `InvalidState`)
	 * 2. the edge current → `target` must be declared (else `TransitionNotAllowed`)
	 * 3. wildcard handler, if any
	 * 4. handler specific to `target`, if any
	 * 5. state changes (previous/current updated)
	 * 6. subscribers notified
	 *
	 * Nothing runs and nothing changes when steps 1 or 2 fail. Handler errors
	 * propagate to the caller and leave the state untouched.
	 *
	 * @param target - The state to move to
	 * @param payload - Optional data passed to the handlers
	 * @param assert - If true (default), throws on invalid transitions; if false, returns current state
	 * @returns The new state, or the current state if the transition was rejected in non-assert mode
	 * @throws InvalidState if `target` is not a defined state and assert is true
	 * @throws TransitionNotAllowed if the edge is not declared and assert is true
	 *
	 * @example
	 * ```typescript
	 * fsm.transitionTo("review");              // Basic transition
	 * fsm.transitionTo("published", { by });   // With payload
	 * fsm.transitionTo("draft", null, false);  // Non-throwing mode
	 * ```
	 */
	transitionTo(target: TState, payload?: FSMPayload, assert = true): TState {
		const from = this.#state;
		this.#debugLog(`transitionTo("${target}") called from state "${from}"`);

		if (!this.definition.table.isValidState(target)) {
			this.#debugLog(`transitionTo("${target}") failed: unknown state`);
			if (assert) throw new InvalidState(target);
			return from;
		}

		if (!this.definition.table.isAllowed(from, target)) {
			this.#debugLog(`transitionTo("${target}") failed: not allowed`);
			if (assert) {
				throw new TransitionNotAllowed(from, target, this.validTransitions());
			}
			return from;
		}

		const { wildcard, specific } = resolveHandlers(
			target,
			this.#handlers,
			this.definition.handlers
		);

		// 1. generic handler, sees the old state
		if (wildcard) {
			this.#debugLog(`transitionTo("${target}") executing wildcard handler`);
			wildcard(target, this, payload);
		}

		// 2. handler for this exact target, still sees the old state
		if (specific) {
			this.#debugLog(`transitionTo("${target}") executing "${target}" handler`);
			specific(target, this, payload);
		}

		// 3. commit
		this.#previous = from;
		this.#state = target;
		this.#debugLog(`transitionTo("${target}"): "${from}" -> "${target}"`);

		// 4. notify listeners
		this.#notify();

		return this.#state;
	}

	/**
	 * Resets the FSM to the state it was created in.
	 * No handlers run. Subscribers are notified after reset.
	 *
	 * @returns The FSM instance for chaining
	 *
	 * @example
	 * ```typescript
	 * fsm.reset().is("draft"); // true
	 * ```
	 */
	reset(): FSM<TState, TSubject> {
		this.#debugLog(`reset() called, returning to "${this.#initial}"`);
		this.#state = this.#initial;
		this.#previous = null;
		this.#notify();
		return this;
	}

	/**
	 * Checks whether the FSM is currently in the given state.
	 *
	 * @example
	 * ```typescript
	 * if (fsm.is("review")) {
	 *   notifyEditors();
	 * }
	 * ```
	 */
	is(state: TState): boolean {
		return this.#state === state;
	}

	/** Whether `state` is a defined state of this machine. */
	isValid(state: string): state is TState {
		return this.definition.table.isValidState(state);
	}

	/**
	 * Checks whether moving from the current state to `target` is declared.
	 * This is a pure query: no handlers run.
	 *
	 * @example
	 * ```typescript
	 * if (fsm.isAllowed("published")) {
	 *   fsm.transitionTo("published");
	 * }
	 * ```
	 */
	isAllowed(target: string): boolean {
		const result = this.definition.table.isAllowed(this.#state, target);
		this.#debugLog(`isAllowed("${target}") -> ${result}`);
		return result;
	}

	/** Every defined state, lexicographically sorted. */
	allStates(): TState[] {
		return this.definition.table.allStates();
	}

	/** States reachable from the current state in one step (`[]` when terminal). */
	validTransitions(): readonly TState[] {
		return this.definition.table.outgoing(this.#state) ?? [];
	}

	/** Whether the current state has no outgoing transitions. */
	isTerminal(): boolean {
		return this.definition.table.isTerminal(this.#state);
	}

	/**
	 * Creates an FSM instance from a data description such as parsed JSON.
	 * See `fromJson()` for the expected shape.
	 *
	 * @example
	 * ```typescript
	 * const fsm = FSM.fromJson({
	 *   transitions: { start: ["end"], end: null },
	 *   default_state: "start",
	 * });
	 * ```
	 */
	static fromJson<TSubject = unknown>(
		description: unknown,
		options: FromJsonOptions<TSubject> & FSMOptions<string, TSubject> = {}
	): FSM<string, TSubject> {
		const { handlers, ...instanceOptions } = options;
		return new FSM<string, TSubject>(
			fromJson<TSubject>(description, { handlers }),
			instanceOptions
		);
	}

	/**
	 * Creates an FSM instance from a Mermaid stateDiagram-v2 notation.
	 * Edge labels are ignored; handlers can be supplied with the options.
	 *
	 * @example
	 * ```typescript
	 * const fsm = FSM.fromMermaid(`
	 *   stateDiagram-v2
	 *   [*] --> IDLE
	 *   IDLE --> ACTIVE
	 *   ACTIVE --> IDLE
	 * `);
	 * ```
	 */
	static fromMermaid<TSubject = unknown>(
		mermaidDiagram: string,
		options: FromJsonOptions<TSubject> & FSMOptions<string, TSubject> = {}
	): FSM<string, TSubject> {
		return FSM.fromJson<TSubject>(fromMermaid(mermaidDiagram), options);
	}

	/**
	 * Generates a Mermaid stateDiagram-v2 notation from the definition.
	 * Useful for visualizing the state machine graph.
	 */
	toMermaid(): string {
		return toMermaid(this.definition);
	}
}
