import {
	BadRequestException,
	Inject,
	Injectable,
	Logger,
	type OnApplicationShutdown,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { EventEmitter2 } from "@nestjs/event-emitter";
import {
	DEFAULT_TRANSFER_BUDGET_CEILING,
	type EscrowParams,
	type EscrowView,
	type FillQuote,
	type FillResult,
	type ReceiveActionJson,
	type TransferGateway,
	SettlementRuntime,
	fillRequestFromJson,
	formatAmount,
	paramsFromJson,
	parseAmount,
	receiveMessageFromJson,
} from "@escrow-settlement/engine";
import { TRANSFER_GATEWAY } from "../asset-ledger/asset-ledger.constants";
import { escrowEventId } from "../common/escrow.event";
import { TypeOrmEscrowStore } from "./typeorm-escrow-store";
import {
	EscrowEventsService,
	type EscrowEventLogEntry,
} from "./events/escrow-events.service";
import type { EscrowParamsDto } from "./dto/escrow-params.dto";
import type {
	DepositEscrowInDto,
	FillEscrowInDto,
	ReceiveActionDto,
	ReceiveEscrowInDto,
} from "./dto/escrow-actions.dto";
import type {
	DepositOutDto,
	EscrowStateOutDto,
	FillOutDto,
	FillQuoteOutDto,
	InitEscrowOutDto,
	ListEscrowsQueryDto,
	ReceiveOutDto,
	SettleOutDto,
} from "./dto/escrow-state.dto";

function toStateDto(view: EscrowView): EscrowStateOutDto {
	return {
		escrowId: view.escrowId,
		fingerprint: view.fingerprint,
		lifecycle: view.lifecycle,
		maker: view.maker,
		srcAsset: view.srcAsset,
		dstAsset: view.dstAsset,
		deadline: view.deadline,
		srcRemaining: formatAmount(view.srcRemaining),
		dstLost: formatAmount(view.dstLost),
		srcLost: formatAmount(view.srcLost),
		closed: view.closed,
		inFlight: view.inFlight,
	};
}

function toQuoteDto(quote: FillQuote): FillQuoteOutDto {
	const integratorFees: Record<string, string> = Object.fromEntries(
		Object.entries(quote.integratorFees).map(([integrator, fee]): [string, string] => [
			integrator,
			formatAmount(fee),
		]),
	);
	return {
		srcOut: formatAmount(quote.srcFillable),
		dstIn: formatAmount(quote.dstIn),
		dstUsed: formatAmount(quote.dstRequired),
		dstWanted: formatAmount(quote.dstWanted),
		surplus: formatAmount(quote.surplus),
		protocolFee: formatAmount(quote.protocolFee),
		integratorFees,
		makerPayout: formatAmount(quote.makerPayout),
	};
}

function toFillDto(result: FillResult): FillOutDto {
	return { unused: formatAmount(result.unused), fill: toQuoteDto(result.quote) };
}

function toActionJson(action: ReceiveActionDto): ReceiveActionJson {
	if (action.type === "fund") return { type: "fund" };
	if (action.takerPrice === undefined) {
		throw new BadRequestException("takerPrice is required for a fill");
	}
	return {
		type: "fill",
		takerPrice: action.takerPrice,
		deadline: action.deadline,
		receiveSrcTo: action.receiveSrcTo,
	};
}

/**
 * HTTP-facing wrapper around the settlement runtime. Converts wire DTOs to
 * engine types and republishes engine events on the application emitter.
 */
@Injectable()
export class EscrowsService implements OnApplicationShutdown {
	private readonly logger = new Logger(EscrowsService.name);
	private readonly runtime: SettlementRuntime;

	constructor(
		store: TypeOrmEscrowStore,
		@Inject(TRANSFER_GATEWAY) gateway: TransferGateway,
		events: EventEmitter2,
		config: ConfigService,
		private readonly eventLog: EscrowEventsService,
	) {
		const ceiling = Number(
			config.get<string>(
				"TRANSFER_BUDGET_CEILING",
				String(DEFAULT_TRANSFER_BUDGET_CEILING),
			),
		);
		if (!Number.isInteger(ceiling) || ceiling <= 0) {
			throw new Error("TRANSFER_BUDGET_CEILING must be a positive integer");
		}
		this.runtime = new SettlementRuntime({
			store,
			gateway,
			events: {
				publish: async (event) => {
					await events.emitAsync(escrowEventId(event), event);
				},
			},
			logger: this.logger,
			transferBudgetCeiling: ceiling,
		});
	}

	async init(dto: EscrowParamsDto): Promise<InitEscrowOutDto> {
		const { escrowId, fingerprint, state } = await this.runtime.init(
			paramsFromJson(dto),
		);
		return { escrowId, fingerprint, state: toStateDto(state) };
	}

	async deposit(
		escrowId: string,
		sender: string,
		dto: DepositEscrowInDto,
	): Promise<DepositOutDto> {
		const result = await this.runtime.onDeposit(
			escrowId,
			sender,
			dto.asset,
			parseAmount(dto.amount),
			paramsFromJson(dto.params),
		);
		return {
			accepted: formatAmount(result.accepted),
			refund: formatAmount(result.refund),
		};
	}

	async fill(
		escrowId: string,
		taker: string,
		dto: FillEscrowInDto,
	): Promise<FillOutDto> {
		const result = await this.runtime.onIncomingAsset(
			escrowId,
			taker,
			dto.asset,
			parseAmount(dto.amount),
			paramsFromJson(dto.params),
			fillRequestFromJson({
				takerPrice: dto.takerPrice,
				deadline: dto.deadline,
				receiveSrcTo: dto.receiveSrcTo,
			}),
		);
		return toFillDto(result);
	}

	async receive(
		escrowId: string,
		sender: string,
		dto: ReceiveEscrowInDto,
	): Promise<ReceiveOutDto> {
		const message = receiveMessageFromJson({
			params: dto.message.params,
			action: toActionJson(dto.message.action),
		});
		const result = await this.runtime.onReceive(
			escrowId,
			sender,
			dto.asset,
			parseAmount(dto.amount),
			message,
		);
		if (result.type === "fund") {
			return {
				type: "fund",
				deposit: {
					accepted: formatAmount(result.accepted),
					refund: formatAmount(result.refund),
				},
			};
		}
		return { type: "fill", fill: toFillDto(result) };
	}

	async view(
		escrowId: string,
		params?: EscrowParamsDto,
	): Promise<EscrowStateOutDto> {
		const typed: EscrowParams | undefined = params
			? paramsFromJson(params)
			: undefined;
		return toStateDto(await this.runtime.viewState(escrowId, typed));
	}

	async list(query: ListEscrowsQueryDto): Promise<{
		items: EscrowStateOutDto[];
		nextOffset?: number;
	}> {
		const limit = query.limit ?? 20;
		const offset = query.offset ?? 0;
		const views = await this.runtime.list({
			lifecycle: query.lifecycle,
			maker: query.maker,
			limit,
			offset,
		});
		return {
			items: views.map(toStateDto),
			nextOffset: views.length === limit ? offset + limit : undefined,
		};
	}

	async close(
		escrowId: string,
		caller: string,
		params: EscrowParamsDto,
	): Promise<SettleOutDto> {
		const cleanedUp = await this.runtime.close(
			escrowId,
			caller,
			paramsFromJson(params),
		);
		this.logger.log(`Escrow ${escrowId} closed by ${caller}`);
		return { cleanedUp };
	}

	async sweep(escrowId: string, params: EscrowParamsDto): Promise<SettleOutDto> {
		const cleanedUp = await this.runtime.sweep(escrowId, paramsFromJson(params));
		return { cleanedUp };
	}

	events(escrowId: string, after?: number): Promise<EscrowEventLogEntry[]> {
		return this.eventLog.findByEscrow(escrowId, after);
	}

	/**
	 * Resolves once every dispatched transfer has been reconciled.
	 */
	drain(): Promise<void> {
		return this.runtime.drain();
	}

	async onApplicationShutdown(): Promise<void> {
		if (this.runtime.pendingOutcomes > 0) {
			this.logger.log(
				`Waiting for ${this.runtime.pendingOutcomes} transfer outcomes`,
			);
		}
		await this.runtime.drain();
	}
}
