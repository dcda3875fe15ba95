import { z } from "zod";
import {
	assertStateName,
	defineMachine,
	type MachineDefinition,
} from "./define-machine.ts";
import { MalformedDefinition } from "./errors.ts";
import type { HandlerMap } from "./handlers.ts";

const StateNameSchema = z.string().min(1, "State name must not be empty");

/**
 * Shape of a machine description authored outside of program source.
 * `null` marks a state without outgoing transitions.
 */
export const MachineDescriptionSchema = z.object({
	transitions: z.record(StateNameSchema, z.array(StateNameSchema).nullable()),
	default_state: StateNameSchema,
});

export type MachineDescription = z.infer<typeof MachineDescriptionSchema>;

export type FromJsonOptions<TSubject = unknown> = {
	/** Handler registry; a data document cannot carry functions */
	handlers?: HandlerMap<string, TSubject>;
};

/**
 * Builds a machine definition from a structured description such as parsed
 * JSON. The result is indistinguishable from one built with `defineMachine()`
 * from the same table and default state.
 *
 * @param description - Expected to be `{ transitions, default_state }`
 * @throws MalformedDefinition if the description does not have that shape
 * (`issues` lists every problem) or the table is inconsistent
 * @throws InvalidDefault if `default_state` is not one of the transition keys
 *
 * @example
 * ```typescript
 * const definition = fromJson({
 *   transitions: { start: ["end"], end: null },
 *   default_state: "start",
 * });
 * ```
 */
export function fromJson<TSubject = unknown>(
	description: unknown,
	options: FromJsonOptions<TSubject> = {}
): MachineDefinition<string, TSubject> {
	// z.record() silently drops a "__proto__" key, check the raw input first
	const raw = rawTransitions(description);
	if (raw && Object.hasOwn(raw, "__proto__")) assertStateName("__proto__");

	const result = MachineDescriptionSchema.safeParse(description);

	if (!result.success) {
		const issues = result.error.issues.map((issue) => ({
			path: issue.path.join("."),
			message: issue.message,
		}));
		throw new MalformedDefinition(
			`Invalid machine description: ${issues
				.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message))
				.join(", ")}`,
			issues
		);
	}

	return defineMachine<string, TSubject>({
		transitions: result.data.transitions,
		defaultState: result.data.default_state,
		handlers: options.handlers,
	});
}

function rawTransitions(description: unknown): object | null {
	if (typeof description !== "object" || description === null) return null;
	if (!("transitions" in description)) return null;
	const { transitions } = description;
	return typeof transitions === "object" && transitions !== null
		? transitions
		: null;
}

/**
 * Parses JSON text and builds a machine definition from it.
 * @throws MalformedDefinition if the text is not valid JSON, see also `fromJson()`
 */
export function parseDefinition<TSubject = unknown>(
	text: string,
	options: FromJsonOptions<TSubject> = {}
): MachineDefinition<string, TSubject> {
	let description: unknown;
	try {
		description = JSON.parse(text);
	} catch (e) {
		throw new MalformedDefinition(
			`Machine description is not valid JSON: ${
				e instanceof Error ? e.message : String(e)
			}`
		);
	}
	return fromJson<TSubject>(description, options);
}

/**
 * Inverse of `fromJson()`: the data description of a definition, with states
 * in sorted order. Handlers are not part of the description.
 */
export function toJson<TState extends string, TSubject>(
	definition: MachineDefinition<TState, TSubject>
): MachineDescription {
	const transitions: Record<string, string[] | null> = {};
	for (const [state, outgoing] of definition.table.entries()) {
		transitions[state] = outgoing === null ? null : [...outgoing];
	}
	return { transitions, default_state: definition.defaultState };
}
