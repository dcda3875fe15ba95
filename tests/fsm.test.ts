import { expect, test } from "vitest";
import { defineMachine } from "../src/define-machine.ts";
import {
	InvalidHandler,
	InvalidState,
	TransitionNotAllowed,
} from "../src/errors.ts";
import { createFsm, FSM, type Logger } from "../src/fsm.ts";

type WORKFLOW =
	| "draft"
	| "awaiting_review"
	| "reviewed"
	| "published"
	| "rejected";

const workflowTransitions = {
	draft: ["awaiting_review", "rejected"],
	awaiting_review: ["draft", "reviewed", "rejected"],
	reviewed: ["published", "rejected"],
	published: null,
	rejected: ["draft"],
} as const;

class FakeNewsPost {
	state = "draft";
	pubDate: Date | null = null;
	saves = 0;

	constructor(public title: string) {}

	save() {
		this.saves += 1;
	}
}

test("basic", () => {
	const fsm = createFsm(
		defineMachine<"start" | "end">({
			defaultState: "start",
			transitions: { start: ["end"], end: null },
		})
	);

	expect(fsm.state).toBe("start");
	expect(fsm.transitionTo("end")).toBe("end");
	expect(fsm.state).toBe("end");

	// "end" is terminal
	expect(() => fsm.transitionTo("start")).toThrow(TransitionNotAllowed);
	expect(fsm.state).toBe("end");
	expect(fsm.isTerminal()).toBe(true);
	expect(fsm.validTransitions()).toEqual([]);
});

test("workflow queries", () => {
	const fsm = createFsm(
		defineMachine<WORKFLOW>({
			defaultState: "draft",
			transitions: workflowTransitions,
		})
	);

	expect(fsm.allStates()).toEqual([
		"awaiting_review",
		"draft",
		"published",
		"rejected",
		"reviewed",
	]);

	expect(fsm.isValid("draft")).toBe(true);
	expect(fsm.isValid("nopenopenope")).toBe(false);

	expect(fsm.isAllowed("awaiting_review")).toBe(true);
	expect(fsm.isAllowed("rejected")).toBe(true);
	expect(fsm.isAllowed("published")).toBe(false);
	// no implicit self loops
	expect(fsm.isAllowed("draft")).toBe(false);
	expect(fsm.isAllowed("nopenopenope")).toBe(false);

	expect(fsm.validTransitions()).toEqual(["awaiting_review", "rejected"]);
	expect(fsm.is("draft")).toBe(true);
	expect(fsm.previous).toBe(null);
});

test("transition not allowed carries both states", () => {
	const fsm = createFsm(
		defineMachine<WORKFLOW>({
			defaultState: "draft",
			transitions: workflowTransitions,
		})
	);

	fsm.transitionTo("awaiting_review");
	fsm.transitionTo("reviewed");
	expect(fsm.isAllowed("published")).toBe(true);

	let error: unknown;
	try {
		fsm.transitionTo("awaiting_review");
	} catch (e) {
		error = e;
	}

	expect(error).toBeInstanceOf(TransitionNotAllowed);
	if (!(error instanceof TransitionNotAllowed)) return;
	expect(error.from).toBe("reviewed");
	expect(error.to).toBe("awaiting_review");
	expect(error.validTransitions).toEqual(["published", "rejected"]);
	expect(error.code).toBe("FSM_TRANSITION_NOT_ALLOWED");
	expect(error.message).toBe(
		'"reviewed" cannot transition to "awaiting_review"'
	);

	expect(fsm.state).toBe("reviewed");
	expect(fsm.previous).toBe("awaiting_review");
});

test("invalid target", () => {
	const fsm = FSM.fromJson({
		transitions: { start: ["end"], end: null },
		default_state: "start",
	});

	expect(() => fsm.transitionTo("nope")).toThrow(InvalidState);
	expect(() => fsm.transitionTo("nope")).toThrow(
		'"nope" is not a recognized state'
	);
	expect(fsm.state).toBe("start");

	// still usable after a failure
	expect(fsm.transitionTo("end")).toBe("end");
});

test("handler order", () => {
	const log: string[] = [];

	const fsm = createFsm(
		defineMachine<WORKFLOW>({
			defaultState: "draft",
			transitions: workflowTransitions,
			handlers: {
				"*": (target, fsm) => log.push(`any:${fsm.state}->${target}`),
				awaiting_review: (target, fsm) =>
					log.push(`specific:${fsm.state}->${target}`),
			},
		})
	);

	fsm.subscribe(({ current, previous }) => {
		log.push(`commit:${previous}->${current}`);
	});

	fsm.transitionTo("awaiting_review");
	fsm.transitionTo("reviewed");

	expect(log).toEqual([
		"commit:null->draft",
		"any:draft->awaiting_review",
		"specific:draft->awaiting_review",
		"commit:draft->awaiting_review",
		"any:awaiting_review->reviewed",
		"commit:awaiting_review->reviewed",
	]);
});

test("failed transitions run no handlers", () => {
	const log: string[] = [];

	const fsm = createFsm(
		defineMachine<WORKFLOW>({
			defaultState: "draft",
			transitions: workflowTransitions,
			handlers: {
				"*": (target) => log.push(`any:${target}`),
				published: (target) => log.push(`specific:${target}`),
			},
		})
	);

	expect(() => fsm.transitionTo("published")).toThrow(TransitionNotAllowed);
	expect(log).toEqual([]);
	expect(fsm.state).toBe("draft");
});

test("specific handler sees the predecessor", () => {
	const seen: string[] = [];

	const fsm = createFsm(
		defineMachine<WORKFLOW>({
			defaultState: "draft",
			transitions: workflowTransitions,
			handlers: {
				rejected: (_target, fsm) => seen.push(fsm.state),
			},
		})
	);

	fsm.transitionTo("rejected");
	fsm.transitionTo("draft");
	fsm.transitionTo("awaiting_review");
	fsm.transitionTo("rejected");

	expect(seen).toEqual(["draft", "awaiting_review"]);
});

test("subject binding", () => {
	const post = new FakeNewsPost("Hello world!");

	const workflow = defineMachine<WORKFLOW, FakeNewsPost>({
		defaultState: "draft",
		transitions: workflowTransitions,
		handlers: {
			"*": (target, fsm) => {
				if (!fsm.subject) return;
				fsm.subject.state = target;
				fsm.subject.save();
			},
			published: (_target, fsm, payload) => {
				if (!fsm.subject || !(payload instanceof Date)) return;
				fsm.subject.pubDate = payload;
				fsm.subject.save();
			},
		},
	});

	const fsm = createFsm(workflow, { subject: post });
	expect(fsm.subject).toBe(post);

	fsm.transitionTo("awaiting_review");
	expect(post.state).toBe("awaiting_review");
	expect(post.pubDate).toBe(null);

	fsm.transitionTo("reviewed");
	expect(post.state).toBe("reviewed");
	expect(post.saves).toBe(2);

	const when = new Date("2024-05-01T10:00:00Z");
	fsm.transitionTo("published", when);
	expect(post.state).toBe("published");
	expect(post.pubDate).toBe(when);
	expect(post.saves).toBe(4);
	expect(fsm.state).toBe("published");
});

test("initial state override", () => {
	const workflow = defineMachine<WORKFLOW>({
		defaultState: "draft",
		transitions: workflowTransitions,
	});

	const fsm = createFsm(workflow, { initial: "reviewed" });
	expect(fsm.state).toBe("reviewed");

	const description = {
		transitions: { start: ["end"], end: null },
		default_state: "start",
	};
	expect(() => FSM.fromJson(description, { initial: "bogus" })).toThrow(
		InvalidState
	);
	expect(FSM.fromJson(description, { initial: "end" }).state).toBe("end");
});

test("handler errors propagate and leave the state unchanged", () => {
	const fsm = createFsm(
		defineMachine<"start" | "end">({
			defaultState: "start",
			transitions: { start: ["end"], end: null },
			handlers: {
				end: () => {
					throw new Error("save failed");
				},
			},
		})
	);

	const log: string[] = [];
	fsm.subscribe(({ current }) => log.push(current));

	expect(() => fsm.transitionTo("end")).toThrow("save failed");
	expect(fsm.state).toBe("start");
	expect(fsm.previous).toBe(null);
	expect(log).toEqual(["start"]);
});

test("non-assert mode", () => {
	const fsm = createFsm(
		defineMachine<"start" | "end">({
			defaultState: "start",
			transitions: { start: ["end"], end: null },
		})
	);

	expect(fsm.transitionTo("start", undefined, false)).toBe("start");
	expect(fsm.transitionTo("end", undefined, false)).toBe("end");
	expect(fsm.transitionTo("start", undefined, false)).toBe("end");

	const loaded = FSM.fromJson({
		transitions: { a: ["b"], b: null },
		default_state: "a",
	});
	expect(loaded.transitionTo("x", null, false)).toBe("a");
});

test("explicit self loop", () => {
	const log: string[] = [];
	const fsm = createFsm(
		defineMachine<"polling" | "done">({
			defaultState: "polling",
			transitions: { polling: ["polling", "done"], done: null },
			handlers: {
				polling: (target, fsm) => log.push(`${fsm.state}:${target}`),
			},
		})
	);

	expect(fsm.transitionTo("polling")).toBe("polling");
	expect(fsm.previous).toBe("polling");
	expect(log).toEqual(["polling:polling"]);
});

test("instance handlers take precedence per slot", () => {
	const log: string[] = [];

	const workflow = defineMachine<"start" | "end">({
		defaultState: "start",
		transitions: { start: ["end"], end: ["start"] },
		handlers: {
			"*": (target) => log.push(`definition:any:${target}`),
			end: (target) => log.push(`definition:${target}`),
		},
	});

	const fsm = createFsm(workflow, {
		handlers: { end: (target) => log.push(`instance:${target}`) },
	});
	fsm.transitionTo("end");
	fsm.transitionTo("start");

	expect(log).toEqual([
		"definition:any:end",
		"instance:end",
		"definition:any:start",
	]);

	// the definition is shared, other instances are unaffected
	log.length = 0;
	createFsm(workflow).transitionTo("end");
	expect(log).toEqual(["definition:any:end", "definition:end"]);

	// e.g. a registry assembled from untyped input
	const handlers: Record<string, () => void> = { middle: () => {} };
	expect(() => createFsm(workflow, { handlers })).toThrow(InvalidHandler);
});

test("instances share the definition but not the state", () => {
	const workflow = defineMachine<WORKFLOW>({
		defaultState: "draft",
		transitions: workflowTransitions,
	});

	const a = createFsm(workflow);
	const b = createFsm(workflow);

	a.transitionTo("rejected");
	expect(a.state).toBe("rejected");
	expect(b.state).toBe("draft");
	expect(a.definition).toBe(b.definition);
});

test("subscribe and reset", () => {
	const fsm = createFsm(
		defineMachine<"start" | "middle" | "end">({
			defaultState: "start",
			transitions: { start: ["middle"], middle: ["end"], end: null },
		}),
		{ initial: "middle" }
	);

	const log: unknown[] = [];
	const unsub = fsm.subscribe((x) => log.push(x));

	fsm.transitionTo("end");
	expect(fsm.reset().is("middle")).toBe(true);

	unsub();
	fsm.transitionTo("end");

	expect(log).toEqual([
		{ current: "middle", previous: null },
		{ current: "end", previous: "middle" },
		{ current: "middle", previous: null },
	]);
});

test("debug logging", () => {
	const messages: string[] = [];
	const capture = (...args: unknown[]) => {
		messages.push(args.map(String).join(" "));
		return String(args[0] ?? "");
	};
	const logger: Logger = {
		debug: capture,
		log: capture,
		warn: capture,
		error: capture,
	};

	const fsm = createFsm(
		defineMachine<"start" | "end">({
			defaultState: "start",
			transitions: { start: ["end"], end: null },
			handlers: { "*": () => {} },
		}),
		{ debug: true, logger }
	);

	expect(fsm.debug).toBe(true);
	expect(fsm.logger).toBe(logger);

	fsm.transitionTo("end");
	fsm.transitionTo("start", undefined, false);

	expect(messages).toEqual([
		'[FSM] FSM created with initial state "start"',
		'[FSM] transitionTo("end") called from state "start"',
		'[FSM] transitionTo("end") executing wildcard handler',
		'[FSM] transitionTo("end"): "start" -> "end"',
		'[FSM] transitionTo("start") called from state "end"',
		'[FSM] transitionTo("start") failed: not allowed',
	]);
});

test("no logging unless debug is on", () => {
	const messages: string[] = [];
	const capture = (...args: unknown[]) => {
		messages.push(args.map(String).join(" "));
		return "";
	};

	const fsm = createFsm(
		defineMachine<"start" | "end">({
			defaultState: "start",
			transitions: { start: ["end"], end: null },
		}),
		{ logger: { debug: capture, log: capture, warn: capture, error: capture } }
	);
	fsm.transitionTo("end");

	expect(fsm.debug).toBe(false);
	expect(messages).toEqual([]);
});

test("toMermaid", () => {
	const fsm = createFsm(
		defineMachine<WORKFLOW>({
			defaultState: "draft",
			transitions: workflowTransitions,
		})
	);

	expect(fsm.toMermaid()).toBe(`stateDiagram-v2
    [*] --> draft
    awaiting_review --> draft
    awaiting_review --> reviewed
    awaiting_review --> rejected
    draft --> awaiting_review
    draft --> rejected
    published --> [*]
    rejected --> draft
    reviewed --> published
    reviewed --> rejected
`);
});

test("states named like Object.prototype members", () => {
	const log: string[] = [];
	const fsm = createFsm(
		defineMachine<string>({
			defaultState: "start",
			transitions: {
				start: ["valueOf", "constructor"],
				valueOf: ["hasOwnProperty"],
				hasOwnProperty: ["start"],
				constructor: null,
			},
			handlers: { "*": (target) => log.push(`any:${target}`) },
		})
	);

	expect(fsm.transitionTo("valueOf")).toBe("valueOf");
	expect(fsm.transitionTo("hasOwnProperty")).toBe("hasOwnProperty");
	expect(fsm.transitionTo("start")).toBe("start");
	expect(fsm.transitionTo("constructor")).toBe("constructor");
	expect(log).toEqual([
		"any:valueOf",
		"any:hasOwnProperty",
		"any:start",
		"any:constructor",
	]);

	const loaded = FSM.fromJson(
		{
			transitions: { a: ["hasOwnProperty"], hasOwnProperty: null },
			default_state: "a",
		},
		{
			handlers: {
				hasOwnProperty: (target: string, fsm: FSM<string>) => log.push(`${fsm.state}->${target}`),
			},
		}
	);
	expect(loaded.transitionTo("hasOwnProperty")).toBe("hasOwnProperty");
	expect(log.at(-1)).toBe("a->hasOwnProperty");
});
