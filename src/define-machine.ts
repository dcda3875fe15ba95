import {
	InvalidDefault,
	MalformedDefinition,
	NoStatesDefined,
} from "./errors.ts";
import { ANY, type HandlerMap, validateHandlers } from "./handlers.ts";
import { type Outgoing, TransitionTable } from "./transition-table.ts";

/**
 * Direct (static) declaration of a machine.
 *
 * Every destination must itself be declared as a key. A state without
 * outgoing transitions is declared with `null` (or an empty list).
 *
 * @template TState - Union type of all possible state names
 * @template TSubject - Type of the subject object handlers work with
 *
 * @example
 * ```typescript
 * const config: MachineConfig<"draft" | "published"> = {
 *   defaultState: "draft",
 *   transitions: {
 *     draft: ["published"],
 *     published: null,
 *   },
 * };
 * ```
 */
export type MachineConfig<TState extends string, TSubject = unknown> = {
	transitions: Record<TState, Outgoing<TState>>;
	defaultState: TState;
	handlers?: HandlerMap<TState, TSubject>;
};

/** Symbolic (upper snake case) name → state name. */
export type StateConstants<TState extends string> = Readonly<
	Record<string, TState>
>;

/**
 * Validated, frozen machine definition. Shared read-only by any number of
 * FSM instances.
 */
export interface MachineDefinition<TState extends string, TSubject = unknown> {
	readonly table: TransitionTable<TState>;
	readonly defaultState: TState;
	readonly handlers: Readonly<HandlerMap<TState, TSubject>>;
	/** Lookup of state names by symbolic name, e.g. `states.AWAITING_REVIEW` */
	readonly states: StateConstants<TState>;
}

/**
 * Builds a machine definition, validating the transition table, the default
 * state and the handler registry together.
 *
 * @throws NoStatesDefined if the table is empty
 * @throws MalformedDefinition on an empty or reserved (`"*"`, `"__proto__"`)
 * state name, a non-list entry, a destination that is not declared, or
 * clashing symbolic names
 * @throws InvalidDefault if the default state is not declared
 * @throws InvalidHandler if the handler registry does not fit the table
 *
 * @example
 * ```typescript
 * type Post = { state: string; save(): void };
 *
 * const workflow = defineMachine<"draft" | "review" | "published", Post>({
 *   defaultState: "draft",
 *   transitions: {
 *     draft: ["review"],
 *     review: ["draft", "published"],
 *     published: null,
 *   },
 *   handlers: {
 *     "*": (target, fsm) => {
 *       if (fsm.subject) fsm.subject.state = target;
 *     },
 *     published: (target, fsm) => fsm.subject?.save(),
 *   },
 * });
 * ```
 */
export function defineMachine<TState extends string, TSubject = unknown>(
	config: MachineConfig<TState, TSubject>
): MachineDefinition<TState, TSubject> {
	const entries: [string, unknown][] = Object.entries(config.transitions);
	const stateNames = new Set(entries.map(([state]) => state));

	if (stateNames.size === 0) {
		throw new NoStatesDefined();
	}

	for (const state of stateNames) {
		assertStateName(state);
	}

	if (
		typeof config.defaultState !== "string" ||
		!stateNames.has(config.defaultState)
	) {
		throw new InvalidDefault(config.defaultState);
	}

	for (const [state, outgoing] of entries) {
		if (outgoing === null) continue;
		if (!Array.isArray(outgoing)) {
			throw new MalformedDefinition(
				`Transitions of "${state}" must be a list of state names or null`
			);
		}
		for (const target of outgoing) {
			if (typeof target !== "string" || !stateNames.has(target)) {
				throw new MalformedDefinition(
					`"${state}" lists "${String(target)}" as a destination, but it is not a defined state`
				);
			}
		}
	}

	const table = new TransitionTable<TState>(config.transitions);
	validateHandlers(config.handlers, table);

	return Object.freeze({
		table,
		defaultState: config.defaultState,
		handlers: Object.freeze({ ...config.handlers }),
		states: buildStateConstants(table.allStates()),
	});
}

/**
 * Rejects names that cannot be used as a state.
 * @throws MalformedDefinition on `""`, `"*"` or `"__proto__"`
 */
export function assertStateName(state: string): void {
	if (state === "") {
		throw new MalformedDefinition("State names must not be empty");
	}
	if (state === ANY) {
		throw new MalformedDefinition(
			`"${ANY}" is reserved for the wildcard handler and cannot be a state name`
		);
	}
	if (state === "__proto__") {
		throw new MalformedDefinition(
			'"__proto__" is reserved and cannot be a state name'
		);
	}
}

/**
 * Converts a state name to its symbolic constant name:
 * `"awaiting_review"`, `"awaiting-review"` and `"awaitingReview"` all become
 * `"AWAITING_REVIEW"`. Returns an empty string when nothing alphanumeric is left.
 */
export function toConstantName(state: string): string {
	return state
		.replace(/([a-z0-9])([A-Z])/g, "$1_$2")
		.replace(/[^A-Za-z0-9]+/g, "_")
		.replace(/^_+|_+$/g, "")
		.toUpperCase();
}

function buildStateConstants<TState extends string>(
	states: readonly TState[]
): StateConstants<TState> {
	const constants: Record<string, TState> = {};
	for (const state of states) {
		const name = toConstantName(state);
		// states without a usable symbol stay reachable by their plain name
		if (!name) continue;
		const existing = constants[name];
		if (existing !== undefined) {
			throw new MalformedDefinition(
				`States "${existing}" and "${state}" share the symbolic name "${name}"`
			);
		}
		constants[name] = state;
	}
	return Object.freeze(constants);
}
