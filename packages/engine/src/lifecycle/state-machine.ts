/**
 * Lifecycle State Machine
 *
 * A generic, synchronous state machine with typed states and actions,
 * guard conditions and final states. Entry points run to completion, so
 * guards never suspend.
 */

import { EscrowError, EscrowErrorCode } from "../core/errors.js";

export interface StateDefinition<TState extends string, TAction extends string> {
	name: TState;
	allowedActions: TAction[];
	isFinal: boolean;
	description?: string;
}

export interface StateTransition<
	TState extends string,
	TAction extends string,
	TContext,
> {
	from: TState | TState[];
	action: TAction;
	to: TState;
	guard?: (context: TContext) => boolean;
}

export interface StateMachineConfig<
	TState extends string,
	TAction extends string,
	TContext,
> {
	initialState: TState;
	states: StateDefinition<TState, TAction>[];
	transitions: StateTransition<TState, TAction, TContext>[];
	/** Error code reported when `action` is not allowed in `state` */
	rejectWith: (state: TState, action: TAction) => EscrowErrorCode;
}

export class StateMachine<
	TState extends string,
	TAction extends string,
	TContext = void,
> {
	private currentState: TState;
	private readonly stateMap = new Map<TState, StateDefinition<TState, TAction>>();
	private readonly transitionMap = new Map<
		string,
		StateTransition<TState, TAction, TContext>
	>();

	constructor(
		private readonly config: StateMachineConfig<TState, TAction, TContext>,
		initialState?: TState,
	) {
		for (const state of config.states) {
			this.stateMap.set(state.name, state);
		}
		for (const transition of config.transitions) {
			const froms = Array.isArray(transition.from)
				? transition.from
				: [transition.from];
			for (const from of froms) {
				this.transitionMap.set(`${from}:${transition.action}`, transition);
			}
		}
		this.currentState = config.initialState;
		if (initialState !== undefined) {
			this.setState(initialState);
		}
	}

	getState(): TState {
		return this.currentState;
	}

	canPerform(action: TAction): boolean {
		const state = this.stateMap.get(this.currentState);
		return state?.allowedActions.includes(action) ?? false;
	}

	getAllowedActions(): TAction[] {
		return this.stateMap.get(this.currentState)?.allowedActions ?? [];
	}

	/**
	 * Perform an action, transitioning state if valid.
	 *
	 * @throws EscrowError with the configured rejection code when the action
	 * is not allowed or its guard fails
	 */
	perform(action: TAction, context: TContext): TState {
		const transition = this.transitionMap.get(`${this.currentState}:${action}`);
		if (!this.canPerform(action) || !transition) {
			throw new EscrowError(
				this.config.rejectWith(this.currentState, action),
				`action "${action}" is not allowed in state "${this.currentState}"`,
				{ action, currentState: this.currentState },
			);
		}
		if (transition.guard && !transition.guard(context)) {
			throw new EscrowError(
				this.config.rejectWith(this.currentState, action),
				`guard failed for action "${action}" in state "${this.currentState}"`,
				{ action, currentState: this.currentState },
			);
		}
		this.currentState = transition.to;
		return this.currentState;
	}

	setState(state: TState): void {
		if (!this.stateMap.has(state)) {
			throw new EscrowError("INVALID_PARAMS", `unknown state "${state}"`, {
				state,
				validStates: Array.from(this.stateMap.keys()),
			});
		}
		this.currentState = state;
	}

	isFinal(): boolean {
		return this.stateMap.get(this.currentState)?.isFinal ?? false;
	}
}
