import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import type { EscrowEvent } from "@escrow-settlement/engine";
import { type Observable, filter, Subject } from "rxjs";

export type SseEvent<T> = {
	data: T;
};

@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<EscrowEvent>();

	escrowEvents(escrowId?: string): Observable<EscrowEvent> {
		if (escrowId) {
			return this.events$.pipe(filter((e) => e.escrowId === escrowId));
		}
		return this.events$.asObservable();
	}

	@OnEvent("escrow.*")
	onEscrowEvent(evt: EscrowEvent) {
		this.events$.next(evt);
	}
}
