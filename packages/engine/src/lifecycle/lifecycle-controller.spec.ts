import { Ledger } from "../ledger/ledger.js";
import { MAKER, NOW, OTHER, TAKER, makeParams } from "../../test/fixtures.js";
import {
	ESCROW_LIFECYCLE,
	LifecycleAction,
	LifecycleState,
	closeReason,
	isLifecycleState,
} from "./lifecycle-controller.js";
import { StateMachine } from "./state-machine.js";

describe("closeReason", () => {
	let ledger: Ledger;

	beforeEach(() => {
		ledger = Ledger.create("fp");
	});

	it("lets anyone close once the deadline has passed", () => {
		const params = makeParams();
		expect(closeReason(params, ledger, OTHER, params.deadline)).toBe("deadline_expired");
		expect(closeReason(params, ledger, MAKER, params.deadline)).toBe("deadline_expired");
	});

	it("lets the maker close only an empty escrow", () => {
		const params = makeParams();
		expect(closeReason(params, ledger, MAKER, NOW)).toBe("by_maker");
		ledger.creditSrc(1n);
		expect(() => closeReason(params, ledger, MAKER, NOW)).toThrow(
			expect.objectContaining({ code: "UNAUTHORIZED" }),
		);
	});

	it("lets the only whitelisted taker close", () => {
		ledger.creditSrc(1n);
		expect(closeReason(makeParams({ takerWhitelist: [TAKER] }), ledger, TAKER, NOW)).toBe(
			"by_single_taker",
		);
		expect(() =>
			closeReason(makeParams({ takerWhitelist: [TAKER, OTHER] }), ledger, TAKER, NOW),
		).toThrow(expect.objectContaining({ code: "UNAUTHORIZED" }));
	});
});

describe("escrow lifecycle", () => {
	let ledger: Ledger;
	let machine: StateMachine<LifecycleState, LifecycleAction, Ledger>;

	function machineAction(action: LifecycleAction): LifecycleState {
		return machine.perform(action, ledger);
	}

	beforeEach(() => {
		ledger = Ledger.create("fp");
		machine = new StateMachine(ESCROW_LIFECYCLE);
	});

	it("starts open", () => {
		expect(machine.getState()).toBe("open");
		expect(machine.getAllowedActions()).toEqual(["fund", "fill", "close", "sweep", "resolve"]);
	});

	it("rejects deposits and fills once closed", () => {
		machineAction("close");
		expect(() => machineAction("fund")).toThrow(expect.objectContaining({ code: "CLOSED" }));
		expect(() => machineAction("fill")).toThrow(expect.objectContaining({ code: "CLOSED" }));
	});

	it("guards cleanup on the ledger", () => {
		machineAction("close");
		ledger.tryClose();
		ledger.beginTransfer();
		expect(() => machineAction("cleanup")).toThrow(
			expect.objectContaining({ code: "UNAUTHORIZED" }),
		);
		ledger.endTransfer();
		expect(machineAction("cleanup")).toBe("cleaned");
		expect(machine.isFinal()).toBe(true);
	});

	it("refuses cleanup while open", () => {
		expect(() => machineAction("cleanup")).toThrow(
			expect.objectContaining({ code: "UNAUTHORIZED" }),
		);
	});

	it("rejects everything once cleaned", () => {
		machine.setState("cleaned");
		for (const action of ["fund", "fill", "close", "sweep", "resolve"] as const) {
			expect(() => machineAction(action)).toThrow(
				expect.objectContaining({ code: "CLEANED_UP" }),
			);
		}
	});

	it("recognizes stored state names", () => {
		expect(isLifecycleState("closed")).toBe(true);
		expect(isLifecycleState("settled")).toBe(false);
	});
});
