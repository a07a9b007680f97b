/**
 * createProtocol — wires every component onto one context.
 */

import { type ProtocolContext, createProtocolContext } from "../context/protocol-context.js";
import { type Logger, createLogger } from "../lib/logger/index.js";
import { OraclePriceChecker } from "../pricing/oracle-price-checker.js";
import { EmissionScheduler } from "../rewards/emission-scheduler.js";
import { RewardAccounting } from "../rewards/reward-accounting.js";
import { DEFAULT_PROTOCOL_CONFIG, type ProtocolConfig } from "../shared/config.js";
import type { Address, PoolId } from "../shared/identifiers.js";
import type { Clock } from "../shared/time.js";
import type { SlippageGuard } from "../slippage/slippage-guard.js";
import { AccountBook } from "../strategy/account-book.js";
import { StrategyRewardProcessor } from "../strategy/reward-processor.js";
import type { StrategyRegistry } from "../strategy/types.js";
import { SwapGateway } from "../swap/swap-gateway.js";
import type { SwapVenue } from "../swap/types.js";

export interface ProtocolOptions {
	readonly stakingToken: Address;
	/** Address holding staked principal and reward funds */
	readonly pool: Address;
	readonly venue: SwapVenue;
	readonly strategies: StrategyRegistry;
	/** Pool for Compound swaps without an account route */
	readonly compoundPool: PoolId;
	/** Already validated, e.g. by `resolveConfig` */
	readonly config?: ProtocolConfig;
	/** Existing context to build on; `clock` and `logger` are then ignored */
	readonly context?: ProtocolContext;
	readonly clock?: Clock;
	/** Defaults to a pino logger at `config.logLevel` */
	readonly logger?: Logger;
}

export interface Protocol {
	readonly config: ProtocolConfig;
	readonly ctx: ProtocolContext;
	readonly accounting: RewardAccounting;
	readonly scheduler: EmissionScheduler;
	readonly pricing: OraclePriceChecker;
	readonly gateway: SwapGateway;
	readonly accounts: AccountBook;
	readonly slippage: SlippageGuard;
	readonly processor: StrategyRewardProcessor;
}

/**
 * @example
 * const protocol = createProtocol({ stakingToken, pool, venue, strategies, compoundPool });
 * protocol.ctx.events.on("rewards_processed", (e) => console.log(e.restaked));
 */
export function createProtocol(options: ProtocolOptions): Protocol {
	const config = options.config ?? DEFAULT_PROTOCOL_CONFIG;
	const ctx =
		options.context ??
		createProtocolContext({
			logger: options.logger ?? createLogger({ level: config.logLevel }),
			...(options.clock !== undefined && { clock: options.clock }),
		});

	const accounting = new RewardAccounting(ctx, {
		stakingToken: options.stakingToken,
		pool: options.pool,
	});
	const scheduler = new EmissionScheduler(ctx, accounting);
	const pricing = new OraclePriceChecker(ctx);
	const gateway = new SwapGateway(ctx, pricing, options.venue, {
		compoundFeeBps: config.compoundFeeBps,
		feeRecipient: config.feeRecipient,
		hookGasLimit: config.hookGasLimit,
		appCode: config.appCode,
	});
	const accounts = new AccountBook(ctx, accounting, {
		defaultSlippageBps: config.defaultSlippageBps,
		maxSlippageBps: config.maxSlippageBps,
	});
	const processor = new StrategyRewardProcessor(
		ctx,
		accounting,
		accounts,
		gateway,
		options.strategies,
		{ compoundPool: options.compoundPool },
	);

	ctx.logger.child({ component: "protocol" }).info(
		{ stakingToken: options.stakingToken, pool: options.pool },
		"protocol ready",
	);

	return {
		config,
		ctx,
		accounting,
		scheduler,
		pricing,
		gateway,
		accounts,
		slippage: accounts.slippage,
		processor,
	};
}
