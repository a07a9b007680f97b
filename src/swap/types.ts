import type { Hex } from "../lib/ethereum/types.js";
import type { Address, PoolId } from "../shared/identifiers.js";

/** Sell order handed to the execution venue. */
export interface SellOrder {
	/** Account whose tokens are sold */
	readonly owner: Address;
	readonly sellToken: Address;
	readonly buyToken: Address;
	readonly sellAmount: bigint;
	/** Minimum accepted output */
	readonly buyAmount: bigint;
	readonly receiver: Address;
	/** Expiry, seconds since the epoch */
	readonly validTo: number;
	/** keccak-256 of the order's appData document */
	readonly appData: Hex;
	readonly pool: PoolId;
}

/**
 * External swap execution. The gateway only trusts the balance effect of
 * `settle`, never its return.
 */
export interface SwapVenue {
	readonly address: Address;
	/** Proposed output for selling `amountIn` through `pool`. */
	quote(tokenIn: Address, tokenOut: Address, amountIn: bigint, pool: PoolId): bigint;
	/** Pull the approved sell amount from the owner and deliver to the receiver. */
	settle(order: SellOrder): void;
}

export interface SwapRequest {
	readonly account: Address;
	readonly tokenIn: Address;
	readonly tokenOut: Address;
	readonly amountIn: bigint;
	readonly slippageBps: number;
	readonly pool: PoolId;
}

export interface SwapReceipt {
	readonly order: SellOrder;
	/** Compound fee taken from `amountIn` before the sale */
	readonly fee: bigint;
	/** Balance increase of the buy token observed at the receiver */
	readonly amountOut: bigint;
}

export interface SwapGatewayOptions {
	readonly compoundFeeBps: number;
	readonly feeRecipient?: Address | undefined;
	readonly hookGasLimit: number;
	readonly appCode: string;
}
