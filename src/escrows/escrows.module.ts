import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";

import { AssetLedgerModule } from "../asset-ledger/asset-ledger.module";
import { ServerSentEventsService } from "../common/server-sent-events.service";
import { EscrowInstance } from "./escrow-instance.entity";
import { EscrowTransferLeg } from "./escrow-transfer-leg.entity";
import { EscrowCleanup } from "./escrow-cleanup.entity";
import { EscrowEventRecord } from "./events/escrow-event.entity";
import { EscrowEventsService } from "./events/escrow-events.service";
import { TypeOrmEscrowStore } from "./typeorm-escrow-store";
import { EscrowsService } from "./escrows.service";
import { EscrowsController } from "./escrows.controller";

@Module({
	imports: [
		TypeOrmModule.forFeature([
			EscrowInstance,
			EscrowTransferLeg,
			EscrowCleanup,
			EscrowEventRecord,
		]),
		AssetLedgerModule,
	],
	providers: [
		EscrowsService,
		TypeOrmEscrowStore,
		EscrowEventsService,
		ServerSentEventsService,
	],
	controllers: [EscrowsController],
	exports: [EscrowsService],
})
export class EscrowsModule {}
