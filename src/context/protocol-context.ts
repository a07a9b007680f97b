/**
 * ProtocolContext — the collaborators every stateful component shares.
 *
 * One context means one unit of work: every component built on it is
 * rolled back together and publishes its events through the same log.
 */

import { EventLog } from "../events/event-log.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { TokenLedger } from "../token/token-ledger.js";
import { UnitOfWork } from "../transaction/unit-of-work.js";

export interface ProtocolContext {
	readonly clock: Clock;
	readonly uow: UnitOfWork;
	readonly events: EventLog;
	readonly ledger: TokenLedger;
	readonly logger: Logger;
}

export interface ProtocolContextOptions {
	readonly clock?: Clock;
	readonly logger?: Logger;
}

export function createProtocolContext(options: ProtocolContextOptions = {}): ProtocolContext {
	const clock = options.clock ?? SystemClock;
	const logger = options.logger ?? silentLogger();
	const uow = new UnitOfWork(logger.child({ component: "transaction" }));
	const events = new EventLog(clock, logger.child({ component: "events" }));
	const ledger = new TokenLedger(uow, events);

	uow.register("events", events);
	uow.register("ledger", ledger);
	uow.onCommit(() => events.flush());

	return { clock, uow, events, ledger, logger };
}
