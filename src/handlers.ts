import { InvalidHandler } from "./errors.ts";
import type { FSM, FSMPayload } from "./fsm.ts";
import type { TransitionTable } from "./transition-table.ts";

/** Registry key of the handler that runs on every transition. */
export const ANY = "*";

/**
 * Behavior invoked while a transition is in flight.
 *
 * Runs after validation and before the commit, so `fsm.state` still reports the
 * source state while `target` is the incoming one. The bound subject is
 * available as `fsm.subject`. The return value is ignored and never awaited.
 *
 * @template TState - Union type of all possible state names
 * @template TSubject - Type of the bound subject object
 */
export type TransitionHandler<TState extends string, TSubject = unknown> = (
	target: TState,
	fsm: FSM<TState, TSubject>,
	payload?: FSMPayload
) => void;

/**
 * Explicit handler registry: at most one wildcard handler under `"*"` and at
 * most one specific handler per destination state.
 */
export type HandlerMap<TState extends string, TSubject = unknown> = {
	[K in TState | typeof ANY]?: TransitionHandler<TState, TSubject>;
};

/** Handlers applicable to one destination state. */
export type HandlerSet<TState extends string, TSubject = unknown> = {
	wildcard: TransitionHandler<TState, TSubject> | null;
	specific: TransitionHandler<TState, TSubject> | null;
};

/**
 * Resolves the wildcard and the specific handler for `target`.
 *
 * Registries are consulted in the given order and, for each slot separately,
 * the first registry that defines it wins. Missing handlers resolve to `null`.
 * Only own keys count, so states such as `constructor` or `valueOf` never
 * pick up `Object.prototype` members.
 */
export function resolveHandlers<TState extends string, TSubject>(
	target: TState,
	...registries: (HandlerMap<TState, TSubject> | undefined)[]
): HandlerSet<TState, TSubject> {
	let wildcard: TransitionHandler<TState, TSubject> | null = null;
	let specific: TransitionHandler<TState, TSubject> | null = null;

	for (const registry of registries) {
		if (!registry) continue;
		wildcard ??= own(registry, ANY);
		specific ??= own(registry, target);
	}

	return { wildcard, specific };
}

function own<TState extends string, TSubject>(
	registry: HandlerMap<TState, TSubject>,
	key: TState | typeof ANY
): TransitionHandler<TState, TSubject> | null {
	return Object.hasOwn(registry, key) ? (registry[key] ?? null) : null;
}

/**
 * Checks a handler registry against a transition table.
 * @throws InvalidHandler if a key is neither `"*"` nor a declared state, or a
 * value is not a function
 */
export function validateHandlers<TState extends string>(
	handlers: object | undefined,
	table: TransitionTable<TState>
): void {
	if (!handlers) return;

	const entries: [string, unknown][] = Object.entries(handlers);
	for (const [key, handler] of entries) {
		if (key !== ANY && !table.isValidState(key)) {
			throw new InvalidHandler(
				key,
				`Handler "${key}" does not match any defined state`
			);
		}
		// undefined slots are allowed, they read the same as a missing key
		if (handler !== undefined && typeof handler !== "function") {
			throw new InvalidHandler(key, `Handler "${key}" is not callable`);
		}
	}
}
