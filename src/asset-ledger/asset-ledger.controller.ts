import {
	Controller,
	Delete,
	Get,
	HttpCode,
	HttpStatus,
	Param,
	Post,
	Query,
} from "@nestjs/common";
import {
	ApiExtraModels,
	ApiNoContentResponse,
	ApiOkResponse,
	ApiOperation,
	ApiQuery,
	ApiTags,
} from "@nestjs/swagger";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForListDto,
} from "../common/dto/envelopes";
import { AssetLedgerService } from "./asset-ledger.service";
import {
	AccountBalancesOutDto,
	SettledTransferOutDto,
} from "./dto/asset-ledger.dto";

@ApiTags("2 - Asset Ledger")
@ApiExtraModels(ApiEnvelopeShellDto, AccountBalancesOutDto, SettledTransferOutDto)
@Controller("api/v1/asset-ledger")
export class AssetLedgerController {
	constructor(private readonly ledger: AssetLedgerService) {}

	@Get("accounts/:account/balances")
	@ApiOperation({ summary: "Balances an account received from escrows" })
	@ApiOkResponse({ schema: getSchemaPathForDto(AccountBalancesOutDto) })
	balances(
		@Param("account") account: string,
	): ApiEnvelope<AccountBalancesOutDto> {
		return envelope({ account, balances: this.ledger.balancesOf(account) });
	}

	@Post("accounts/:account/register")
	@HttpCode(HttpStatus.NO_CONTENT)
	@ApiOperation({ summary: "Register an account as a transfer receiver" })
	@ApiNoContentResponse()
	register(@Param("account") account: string): void {
		this.ledger.register(account);
	}

	@Post("accounts/:account/block")
	@HttpCode(HttpStatus.NO_CONTENT)
	@ApiOperation({ summary: "Make every transfer to an account fail" })
	@ApiNoContentResponse()
	block(@Param("account") account: string): void {
		this.ledger.block(account);
	}

	@Delete("accounts/:account/block")
	@HttpCode(HttpStatus.NO_CONTENT)
	@ApiOperation({ summary: "Accept transfers to an account again" })
	@ApiNoContentResponse()
	unblock(@Param("account") account: string): void {
		this.ledger.unblock(account);
	}

	@Get("transfers")
	@ApiOperation({ summary: "Settled transfers, oldest first" })
	@ApiQuery({ name: "escrowId", required: false })
	@ApiQuery({ name: "account", required: false })
	@ApiOkResponse({ schema: getSchemaPathForListDto(SettledTransferOutDto) })
	transfers(
		@Query("escrowId") escrowId?: string,
		@Query("account") account?: string,
	): ApiEnvelope<SettledTransferOutDto[]> {
		return envelope(this.ledger.transfers({ escrowId, account }));
	}
}
