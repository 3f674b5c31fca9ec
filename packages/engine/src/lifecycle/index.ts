export type {
	StateDefinition,
	StateTransition,
	StateMachineConfig,
} from "./state-machine.js";
export { StateMachine } from "./state-machine.js";

export type {
	LifecycleState,
	LifecycleAction,
	LifecycleContext,
} from "./lifecycle-controller.js";
export {
	LIFECYCLE_STATES,
	ESCROW_LIFECYCLE,
	isLifecycleState,
	closeReason,
	LifecycleController,
} from "./lifecycle-controller.js";
