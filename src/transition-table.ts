import { InvalidState } from "./errors.ts";

/**
 * Outgoing edges of a single state as declared.
 * `null` marks a terminal state (no outgoing transitions). An empty list is
 * treated the same way by every query.
 */
export type Outgoing<TState extends string> = readonly TState[] | null;

/**
 * Immutable mapping from state name to its allowed destinations.
 *
 * The table copies and freezes its input, so later mutation of the source
 * object has no effect. It performs no validation of its own: use
 * `defineMachine()` to build a checked definition around it.
 *
 * @template TState - Union type of all possible state names
 */
export class TransitionTable<TState extends string> {
	#edges = new Map<TState, Outgoing<TState>>();

	#names = new Set<string>();

	/** Sorted once, keys never change */
	#sorted: readonly TState[];

	constructor(transitions: Readonly<Record<TState, Outgoing<TState>>>) {
		for (const state of Object.keys(transitions) as TState[]) {
			const outgoing = transitions[state];
			this.#edges.set(
				state,
				outgoing === null ? null : Object.freeze(dedupe(outgoing))
			);
			this.#names.add(state);
		}
		this.#sorted = Object.freeze([...this.#edges.keys()].sort());
		Object.freeze(this);
	}

	/**
	 * Every declared state, lexicographically sorted.
	 * Declaration order is never observable through this method.
	 */
	allStates(): TState[] {
		return [...this.#sorted];
	}

	/** Whether `state` is a key of the table. */
	isValidState(state: string): state is TState {
		return this.#names.has(state);
	}

	/**
	 * Whether a transition `from` → `to` is declared.
	 * A state never allows a transition to itself unless it is listed.
	 */
	isAllowed(from: string, to: string): boolean {
		if (!this.isValidState(from)) return false;
		const outgoing = this.#edges.get(from);
		if (!outgoing) return false;
		return outgoing.some((state) => state === to);
	}

	/**
	 * Raw declared edges of `from`, for diagnostics.
	 * @throws InvalidState if `from` is not a declared state
	 */
	outgoing(from: TState): Outgoing<TState> {
		const outgoing = this.#edges.get(from);
		if (outgoing === undefined) throw new InvalidState(from);
		return outgoing;
	}

	/** Whether `state` has no outgoing transitions. Unknown states are not terminal. */
	isTerminal(state: TState): boolean {
		const outgoing = this.#edges.get(state);
		if (outgoing === undefined) return false;
		return outgoing === null || outgoing.length === 0;
	}

	/** `[state, outgoing]` pairs in `allStates()` order. */
	entries(): [TState, Outgoing<TState>][] {
		return this.#sorted.map((state) => [state, this.outgoing(state)]);
	}
}

function dedupe<T>(values: readonly T[]): T[] {
	return [...new Set(values)];
}
