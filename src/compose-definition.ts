import type { MachineConfig } from "./define-machine.ts";
import type { FSMPayload } from "./fsm.ts";
import { InvalidDefault, MalformedDefinition } from "./errors.ts";
import type { HandlerMap, TransitionHandler } from "./handlers.ts";
import type { Outgoing } from "./transition-table.ts";

/**
 * A partial machine configuration fragment for composition.
 * All fields are optional to allow building configs piece by piece.
 * A fragment may list only some of the states.
 */
export type MachineConfigFragment<TState extends string, TSubject = unknown> = {
	defaultState?: TState;
	transitions?: Partial<Record<TState, Outgoing<TState>>>;
	handlers?: HandlerMap<TState, TSubject>;
};

/**
 * Options for composing machine configurations.
 */
export type ComposeDefinitionOptions = {
	/**
	 * How to handle handlers registered for the same key by multiple fragments.
	 *
	 * - 'replace': Later fragments override earlier ones (default)
	 * - 'compose': Chain handlers - all run in fragment order
	 */
	handlers?: "replace" | "compose";

	/**
	 * How to handle conflicts for `defaultState`.
	 *
	 * - 'last-wins': Later fragments override earlier ones (default)
	 * - 'error': Throw if fragments define different default states
	 */
	onConflict?: "last-wins" | "error";

	/**
	 * How to merge the destinations of a state listed by multiple fragments.
	 *
	 * - 'replace': Later fragments override earlier lists (default)
	 * - 'prepend': Later fragment destinations come first
	 * - 'append': Later fragment destinations come last
	 *
	 * When merging, a terminal (`null`) entry counts as an empty list. The
	 * merged entry stays `null` only if every fragment declared it `null`.
	 */
	transitions?: "replace" | "prepend" | "append";
};

/**
 * Composes multiple machine configuration fragments into a single config.
 *
 * This allows building machines from reusable building blocks:
 * - Define a core workflow with common states
 * - Add/remove feature branches conditionally
 * - Share handlers across different machine variants
 *
 * @example
 * ```typescript
 * const core = {
 *   defaultState: "draft",
 *   transitions: {
 *     draft: ["published"],
 *     published: null,
 *   },
 * };
 *
 * const review = {
 *   transitions: {
 *     draft: ["review"],          // extends draft
 *     review: ["draft", "published"],
 *   },
 * };
 *
 * const config = composeDefinition([core, review], { transitions: "append" });
 * // Result: draft → ["published", "review"]
 * const definition = defineMachine(config);
 * ```
 *
 * @param fragments - Array of config fragments (falsy values are filtered out)
 * @param options - Composition options
 * @returns A merged config, to be validated by `defineMachine()`
 * @throws MalformedDefinition if no fragment is given or defaults conflict
 * @throws InvalidDefault if no fragment defines a default state
 */
export function composeDefinition<TState extends string, TSubject = unknown>(
	fragments: (
		| MachineConfigFragment<TState, TSubject>
		| false
		| null
		| undefined
	)[],
	options: ComposeDefinitionOptions = {}
): MachineConfig<TState, TSubject> {
	const {
		handlers: handlersMode = "replace",
		onConflict = "last-wins",
		transitions: transitionsMode = "replace",
	} = options;

	// Filter out falsy values (allows conditional fragments)
	const validFragments = fragments.filter(
		(f): f is MachineConfigFragment<TState, TSubject> => Boolean(f)
	);

	if (validFragments.length === 0) {
		throw new MalformedDefinition(
			"composeDefinition requires at least one valid fragment"
		);
	}

	let defaultState: TState | undefined;
	const transitions = new Map<TState, Outgoing<TState>>();
	const handlerCollectors = new Map<
		string,
		TransitionHandler<TState, TSubject>[]
	>();

	for (const fragment of validFragments) {
		if (fragment.defaultState !== undefined) {
			if (
				onConflict === "error" &&
				defaultState !== undefined &&
				defaultState !== fragment.defaultState
			) {
				throw new MalformedDefinition(
					`Conflict: multiple fragments define different default states: "${defaultState}" vs "${fragment.defaultState}"`
				);
			}
			defaultState = fragment.defaultState;
		}

		for (const [state, outgoing] of entriesOf(fragment.transitions)) {
			const existing = transitions.get(state);
			if (existing === undefined || transitionsMode === "replace") {
				transitions.set(state, outgoing);
				continue;
			}
			if (existing === null && outgoing === null) continue;

			const existingArr = existing ?? [];
			const newArr = outgoing ?? [];
			transitions.set(
				state,
				transitionsMode === "prepend"
					? dedupe([...newArr, ...existingArr]) // new comes first
					: dedupe([...existingArr, ...newArr]) // existing comes first
			);
		}

		for (const [key, handler] of entriesOf(fragment.handlers)) {
			const collected = handlerCollectors.get(key) ?? [];
			if (handlersMode === "compose") {
				collected.push(handler);
				handlerCollectors.set(key, collected);
			} else {
				handlerCollectors.set(key, [handler]);
			}
		}
	}

	if (defaultState === undefined) {
		throw new InvalidDefault(undefined);
	}

	const handlers: HandlerMap<TState, TSubject> = {};
	for (const [key, collected] of handlerCollectors) {
		Object.assign(handlers, {
			[key]: collected.length === 1 ? collected[0] : composeHandlers(collected),
		});
	}

	return {
		defaultState,
		transitions: Object.fromEntries(transitions) as Record<
			TState,
			Outgoing<TState>
		>,
		handlers,
	};
}

/**
 * Creates a single handler that runs multiple handlers in sequence.
 */
function composeHandlers<TState extends string, TSubject>(
	handlers: TransitionHandler<TState, TSubject>[]
): TransitionHandler<TState, TSubject> {
	return (target, fsm, payload?: FSMPayload) => {
		for (const handler of handlers) {
			handler(target, fsm, payload);
		}
	};
}

/** Typed `Object.entries` for partial records, skipping undefined values */
function entriesOf<K extends string, V>(
	record: Partial<Record<K, V>> | undefined
): [K, V][] {
	const result: [K, V][] = [];
	if (!record) return result;
	for (const key of Object.keys(record) as K[]) {
		const value = record[key];
		if (value !== undefined) result.push([key, value]);
	}
	return result;
}

function dedupe<T>(values: readonly T[]): T[] {
	return [...new Set(values)];
}
