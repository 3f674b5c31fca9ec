import {
	Body,
	Controller,
	Get,
	HttpCode,
	HttpStatus,
	Param,
	Post,
	Query,
	Sse,
} from "@nestjs/common";
import {
	ApiBadRequestResponse,
	ApiBody,
	ApiConflictResponse,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiGoneResponse,
	ApiHeader,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiTags,
} from "@nestjs/swagger";
import { type Observable, map } from "rxjs";
import type { EscrowEvent } from "@escrow-settlement/engine";
import { AccountId, ACCOUNT_ID_HEADER } from "../common/decorators/account-id.decorator";
import {
	type ApiEnvelope,
	type ApiPaginatedEnvelope,
	ApiEnvelopeShellDto,
	ApiPaginatedMetaDto,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForListDto,
	getSchemaPathForPaginatedDto,
	paginatedEnvelope,
} from "../common/dto/envelopes";
import {
	type SseEvent,
	ServerSentEventsService,
} from "../common/server-sent-events.service";
import { EscrowsService } from "./escrows.service";
import { EscrowParamsDto } from "./dto/escrow-params.dto";
import {
	DepositEscrowInDto,
	EscrowParamsInDto,
	FillEscrowInDto,
	ReceiveEscrowInDto,
} from "./dto/escrow-actions.dto";
import {
	DepositOutDto,
	EscrowEventOutDto,
	EscrowStateOutDto,
	FillOutDto,
	InitEscrowOutDto,
	ListEscrowsQueryDto,
	ListEventsQueryDto,
	ReceiveOutDto,
	SettleOutDto,
} from "./dto/escrow-state.dto";

const CALLER_HEADER = {
	name: ACCOUNT_ID_HEADER,
	description: "Account performing the call",
	required: true,
} as const;

@ApiTags("1 - Escrows")
@ApiExtraModels(
	ApiEnvelopeShellDto,
	ApiPaginatedMetaDto,
	EscrowStateOutDto,
	InitEscrowOutDto,
	DepositOutDto,
	FillOutDto,
	ReceiveOutDto,
	SettleOutDto,
	EscrowEventOutDto,
)
@Controller("api/v1/escrows")
export class EscrowsController {
	constructor(
		private readonly escrowsService: EscrowsService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Post("")
	@ApiOperation({ summary: "Initialize an escrow instance from its params" })
	@ApiBody({ type: EscrowParamsDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(InitEscrowOutDto) })
	@ApiBadRequestResponse({ description: "Params failed validation" })
	@ApiConflictResponse({ description: "An instance with these params exists" })
	async init(
		@Body() dto: EscrowParamsDto,
	): Promise<ApiEnvelope<InitEscrowOutDto>> {
		return envelope(await this.escrowsService.init(dto));
	}

	@Get("")
	@ApiOperation({ summary: "List live instances, newest first" })
	@ApiOkResponse({ schema: getSchemaPathForPaginatedDto(EscrowStateOutDto) })
	async list(
		@Query() query: ListEscrowsQueryDto,
	): Promise<ApiPaginatedEnvelope<EscrowStateOutDto[]>> {
		const { items, nextOffset } = await this.escrowsService.list(query);
		return paginatedEnvelope(items, { nextOffset, count: items.length });
	}

	@Post(":escrowId/deposits")
	@HttpCode(HttpStatus.OK)
	@ApiHeader(CALLER_HEADER)
	@ApiParam({ name: "escrowId" })
	@ApiBody({ type: DepositEscrowInDto })
	@ApiOperation({ summary: "Add source inventory; only the maker may deposit" })
	@ApiOkResponse({ schema: getSchemaPathForDto(DepositOutDto) })
	@ApiForbiddenResponse({ description: "Sender is not the maker" })
	@ApiConflictResponse({ description: "Instance is closed" })
	async deposit(
		@Param("escrowId") escrowId: string,
		@AccountId() sender: string,
		@Body() dto: DepositEscrowInDto,
	): Promise<ApiEnvelope<DepositOutDto>> {
		return envelope(await this.escrowsService.deposit(escrowId, sender, dto));
	}

	@Post(":escrowId/fills")
	@HttpCode(HttpStatus.OK)
	@ApiHeader(CALLER_HEADER)
	@ApiParam({ name: "escrowId" })
	@ApiBody({ type: FillEscrowInDto })
	@ApiOperation({ summary: "Pay destination asset to fill against inventory" })
	@ApiOkResponse({ schema: getSchemaPathForDto(FillOutDto) })
	@ApiConflictResponse({ description: "Fill rejected by the instance" })
	async fill(
		@Param("escrowId") escrowId: string,
		@AccountId() taker: string,
		@Body() dto: FillEscrowInDto,
	): Promise<ApiEnvelope<FillOutDto>> {
		return envelope(await this.escrowsService.fill(escrowId, taker, dto));
	}

	@Post(":escrowId/receive")
	@HttpCode(HttpStatus.OK)
	@ApiHeader(CALLER_HEADER)
	@ApiParam({ name: "escrowId" })
	@ApiBody({ type: ReceiveEscrowInDto })
	@ApiOperation({
		summary: "Deliver a transfer with a message naming the action to take",
	})
	@ApiOkResponse({ schema: getSchemaPathForDto(ReceiveOutDto) })
	async receive(
		@Param("escrowId") escrowId: string,
		@AccountId() sender: string,
		@Body() dto: ReceiveEscrowInDto,
	): Promise<ApiEnvelope<ReceiveOutDto>> {
		return envelope(await this.escrowsService.receive(escrowId, sender, dto));
	}

	@Get(":escrowId")
	@ApiParam({ name: "escrowId" })
	@ApiOperation({ summary: "Current state of an instance" })
	@ApiOkResponse({ schema: getSchemaPathForDto(EscrowStateOutDto) })
	@ApiNotFoundResponse({ description: "Unknown instance" })
	@ApiGoneResponse({ description: "Instance was cleaned up" })
	async getOne(
		@Param("escrowId") escrowId: string,
	): Promise<ApiEnvelope<EscrowStateOutDto>> {
		return envelope(await this.escrowsService.view(escrowId));
	}

	@Post(":escrowId/view")
	@HttpCode(HttpStatus.OK)
	@ApiParam({ name: "escrowId" })
	@ApiBody({ type: EscrowParamsInDto })
	@ApiOperation({ summary: "Current state, checking the params fingerprint" })
	@ApiOkResponse({ schema: getSchemaPathForDto(EscrowStateOutDto) })
	async view(
		@Param("escrowId") escrowId: string,
		@Body() dto: EscrowParamsInDto,
	): Promise<ApiEnvelope<EscrowStateOutDto>> {
		return envelope(await this.escrowsService.view(escrowId, dto.params));
	}

	@Post(":escrowId/close")
	@HttpCode(HttpStatus.OK)
	@ApiHeader(CALLER_HEADER)
	@ApiParam({ name: "escrowId" })
	@ApiBody({ type: EscrowParamsInDto })
	@ApiOperation({
		summary:
			"Close the instance: the maker, the single whitelisted taker, or anyone after the deadline",
	})
	@ApiOkResponse({ schema: getSchemaPathForDto(SettleOutDto) })
	@ApiForbiddenResponse({ description: "Caller may not close" })
	async close(
		@Param("escrowId") escrowId: string,
		@AccountId() caller: string,
		@Body() dto: EscrowParamsInDto,
	): Promise<ApiEnvelope<SettleOutDto>> {
		return envelope(
			await this.escrowsService.close(escrowId, caller, dto.params),
		);
	}

	@Post(":escrowId/sweep")
	@HttpCode(HttpStatus.OK)
	@ApiParam({ name: "escrowId" })
	@ApiBody({ type: EscrowParamsInDto })
	@ApiOperation({ summary: "Re-issue lost maker balances of a closed instance" })
	@ApiOkResponse({ schema: getSchemaPathForDto(SettleOutDto) })
	async sweep(
		@Param("escrowId") escrowId: string,
		@Body() dto: EscrowParamsInDto,
	): Promise<ApiEnvelope<SettleOutDto>> {
		return envelope(await this.escrowsService.sweep(escrowId, dto.params));
	}

	@Get(":escrowId/events")
	@ApiParam({ name: "escrowId" })
	@ApiOperation({ summary: "Recorded events of an instance, oldest first" })
	@ApiOkResponse({ schema: getSchemaPathForListDto(EscrowEventOutDto) })
	async events(
		@Param("escrowId") escrowId: string,
		@Query() query: ListEventsQueryDto,
	): Promise<ApiEnvelope<EscrowEventOutDto[]>> {
		return envelope(await this.escrowsService.events(escrowId, query.after));
	}

	@Sse(":escrowId/events/stream")
	@ApiParam({ name: "escrowId" })
	@ApiOperation({ summary: "Subscribe to the events of an instance" })
	stream(
		@Param("escrowId") escrowId: string,
	): Observable<SseEvent<EscrowEvent>> {
		return this.sseService
			.escrowEvents(escrowId)
			.pipe(map((event) => ({ data: event })));
	}
}
