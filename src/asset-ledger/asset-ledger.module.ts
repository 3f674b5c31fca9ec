import { Module } from "@nestjs/common";
import { AssetLedgerController } from "./asset-ledger.controller";
import { AssetLedgerService } from "./asset-ledger.service";
import { TRANSFER_GATEWAY } from "./asset-ledger.constants";

@Module({
	providers: [
		AssetLedgerService,
		{ provide: TRANSFER_GATEWAY, useExisting: AssetLedgerService },
	],
	controllers: [AssetLedgerController],
	exports: [AssetLedgerService, TRANSFER_GATEWAY],
})
export class AssetLedgerModule {}
