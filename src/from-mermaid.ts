import type { MachineDefinition } from "./define-machine.ts";
import { MalformedDefinition } from "./errors.ts";
import type { MachineDescription } from "./from-json.ts";

/**
 * Parses a Mermaid stateDiagram-v2 notation into a machine description,
 * ready to pass to `fromJson()`.
 *
 * **Recognized lines:**
 * - `[*] --> StateName` - default state
 * - `StateA --> StateB` - transition (an optional `: label` is ignored)
 * - `StateName --> [*]` - marks a state as terminal
 *
 * States that only ever appear as a destination are declared terminal (`null`),
 * so every destination of the resulting description is also a key.
 *
 * **Ignored Mermaid features (non-FSM lines):**
 * - YAML frontmatter (`---\nconfig: ...\n---`)
 * - Comments (`%%`)
 * - Directives (`%%{...}%%`)
 * - Styling (`classDef`, `class`, `style`)
 * - State descriptions (`state "Description" as StateName`)
 * - Composite states / subgraphs (`state StateName { ... }`)
 * - Notes (`note left of`, `note right of`)
 * - Direction statements (`direction LR`, `direction TB`, etc.)
 * - Any other unrecognized lines without `-->`
 *
 * State names must match `\w+`.
 *
 * @throws MalformedDefinition if the header or the default state is missing, or
 * a line with `-->` is not one of the recognized forms
 *
 * @example
 * ```typescript
 * const description = fromMermaid(`
 *   stateDiagram-v2
 *   [*] --> OFF
 *   OFF --> ON
 *   ON --> OFF
 * `);
 * const definition = fromJson(description);
 * ```
 */
export function fromMermaid(mermaidDiagram: string): MachineDescription {
	const lines = mermaidDiagram.trim().split("\n");

	// Find the stateDiagram-v2 header, skipping any YAML frontmatter
	const startIndex = lines.findIndex((line) =>
		line.trim().startsWith("stateDiagram-v2")
	);

	if (startIndex === -1) {
		throw new MalformedDefinition(
			'Invalid mermaid diagram: must contain "stateDiagram-v2"'
		);
	}

	let initial: string | null = null;
	// insertion order of first appearance, edges in diagram order
	const edges = new Map<string, string[]>();

	const declare = (state: string) => {
		if (!edges.has(state)) edges.set(state, []);
	};

	for (let i = startIndex + 1; i < lines.length; i++) {
		const line = lines[i].trim();

		if (!line) continue;

		// both %% comment and %%{ directive }%%
		if (line.startsWith("%%")) continue;

		if (line.startsWith("direction ")) continue;

		if (/^(classDef|class|style)\s/.test(line)) continue;

		// state "Description" as StateName
		if (/^state\s+["']/.test(line)) continue;

		if (/^state\s+\w+\s*\{/.test(line) || line === "{" || line === "}")
			continue;

		if (/^note\s/.test(line)) continue;

		// StateName --> [*]
		const finalMatch = line.match(/^(\w+)\s*-->\s*\[\*\]\s*$/);
		if (finalMatch) {
			declare(finalMatch[1]);
			continue;
		}

		// [*] --> StateName
		const initialMatch = line.match(/^\[\*\]\s*-->\s*(\w+)\s*$/);
		if (initialMatch) {
			initial = initialMatch[1];
			declare(initial);
			continue;
		}

		// StateA --> StateB, StateA --> StateB: label
		const transitionMatch = line.match(/^(\w+)\s*-->\s*(\w+)\s*(?::.*)?$/);
		if (transitionMatch) {
			const [, from, to] = transitionMatch;
			declare(from);
			declare(to);
			const outgoing = edges.get(from);
			if (outgoing && !outgoing.includes(to)) outgoing.push(to);
			continue;
		}

		// an edge that cannot be read would silently change the machine
		if (line.includes("-->")) {
			throw new MalformedDefinition(
				`Invalid mermaid diagram: cannot parse transition "${line}"`
			);
		}
		// Any other unrecognized lines are silently ignored
	}

	if (!initial) {
		throw new MalformedDefinition(
			"Invalid mermaid diagram: no initial state found ([*] --> State)"
		);
	}

	const transitions: Record<string, string[] | null> = Object.fromEntries(
		[...edges].map(([state, outgoing]): [string, string[] | null] => [
			state,
			outgoing.length ? outgoing : null,
		])
	);

	return { transitions, default_state: initial };
}

/**
 * Generates a Mermaid stateDiagram-v2 notation from a machine definition.
 *
 * States are listed in sorted order, each followed by its edges in declared
 * order. Terminal states point to `[*]`.
 *
 * @throws MalformedDefinition if a state name does not match `\w+`
 *
 * @example
 * ```typescript
 * console.log(toMermaid(definition));
 * // stateDiagram-v2
 * //     [*] --> start
 * //     end --> [*]
 * //     start --> end
 * ```
 */
export function toMermaid<TState extends string, TSubject>(
	definition: MachineDefinition<TState, TSubject>
): string {
	for (const state of definition.table.allStates()) {
		if (!/^\w+$/.test(state)) {
			throw new MalformedDefinition(
				`State "${state}" cannot be written as a mermaid state name`
			);
		}
	}

	let mermaid = "stateDiagram-v2\n";
	mermaid += `    [*] --> ${definition.defaultState}\n`;

	for (const [state, outgoing] of definition.table.entries()) {
		if (!outgoing || outgoing.length === 0) {
			mermaid += `    ${state} --> [*]\n`;
			continue;
		}
		for (const target of outgoing) {
			mermaid += `    ${state} --> ${target}\n`;
		}
	}

	return mermaid;
}
