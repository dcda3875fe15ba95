/**
 * Base class for every error thrown by the engine.
 * Each subclass carries a stable `code` suitable for programmatic checks.
 */
export class FSMError extends Error {
	readonly code: string;

	constructor(code: string, message: string) {
		super(message);
		this.name = "FSMError";
		this.code = code;
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

/** A single problem found while validating a machine description. */
export type DefinitionIssue = {
	path: string;
	message: string;
};

/**
 * Thrown when a machine definition (declared directly, loaded from data, parsed
 * from Mermaid or composed from fragments) cannot be turned into a valid
 * transition table and default state pair.
 */
export class MalformedDefinition extends FSMError {
	readonly issues: readonly DefinitionIssue[];

	constructor(
		message: string,
		issues: readonly DefinitionIssue[] = [],
		code = "FSM_MALFORMED_DEFINITION"
	) {
		super(code, message);
		this.name = "MalformedDefinition";
		this.issues = issues;
	}
}

/** Thrown when a definition declares no states at all. */
export class NoStatesDefined extends MalformedDefinition {
	constructor(message = "No states defined: the transition table is empty") {
		super(message, [], "FSM_NO_STATES");
		this.name = "NoStatesDefined";
	}
}

/** Thrown when the default state is missing or is not a key of the table. */
export class InvalidDefault extends MalformedDefinition {
	readonly state: string | undefined;

	constructor(state: string | undefined) {
		super(
			state === undefined
				? "No default state defined"
				: `Default state "${state}" is not a defined state`,
			[],
			"FSM_INVALID_DEFAULT"
		);
		this.name = "InvalidDefault";
		this.state = state;
	}
}

/** Thrown when a handler registry has a key or value the engine cannot use. */
export class InvalidHandler extends FSMError {
	readonly key: string;

	constructor(key: string, message: string) {
		super("FSM_INVALID_HANDLER", message);
		this.name = "InvalidHandler";
		this.key = key;
	}
}

/** Thrown when an initial state or a transition target is not a recognized state. */
export class InvalidState extends FSMError {
	readonly state: string;

	constructor(state: string) {
		super("FSM_INVALID_STATE", `"${state}" is not a recognized state`);
		this.name = "InvalidState";
		this.state = state;
	}
}

/** Thrown when the current state has no edge to the requested target. */
export class TransitionNotAllowed extends FSMError {
	readonly from: string;
	readonly to: string;
	readonly validTransitions: readonly string[];

	constructor(from: string, to: string, validTransitions: readonly string[]) {
		super(
			"FSM_TRANSITION_NOT_ALLOWED",
			`"${from}" cannot transition to "${to}"`
		);
		this.name = "TransitionNotAllowed";
		this.from = from;
		this.to = to;
		this.validTransitions = validTransitions;
	}
}
