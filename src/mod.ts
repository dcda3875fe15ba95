/**
 * @module
 *
 * A small, typed, synchronous finite state machine engine.
 *
 * A machine is a transition table (state → allowed destinations, or `null` for
 * terminal states) plus a default state. An FSM instance only moves along the
 * declared edges and, around every transition, calls an optional wildcard
 * handler and an optional handler for the target state, both before the new
 * state is committed.
 *
 * @example Basic usage
 * ```typescript
 * import { createFsm, defineMachine } from "waystate";
 *
 * const workflow = defineMachine<"draft" | "reviewed" | "published">({
 *   defaultState: "draft",
 *   transitions: {
 *     draft: ["reviewed"],
 *     reviewed: ["draft", "published"],
 *     published: null,
 *   },
 * });
 *
 * const fsm = createFsm(workflow);
 * fsm.transitionTo("reviewed"); // → "reviewed"
 * ```
 *
 * @example Loading a definition from JSON
 * ```typescript
 * import { FSM } from "waystate";
 *
 * const fsm = FSM.fromJson({
 *   transitions: { start: ["end"], end: null },
 *   default_state: "start",
 * });
 * ```
 *
 * @example Configuration composition
 * ```typescript
 * import { composeDefinition, defineMachine } from "waystate";
 *
 * const definition = defineMachine(composeDefinition([core, feature]));
 * ```
 */

export * from "./errors.ts";
export * from "./transition-table.ts";
export * from "./handlers.ts";
export * from "./define-machine.ts";
export * from "./fsm.ts";
export * from "./from-json.ts";
export * from "./from-mermaid.ts";
export * from "./compose-definition.ts";
