/**
 * EIP-712 signing of sell orders.
 *
 * An order is signed only after its buy amount passes the oracle check;
 * a failing check never reaches the signer.
 */

import type { EthSigner, Hex, SignTypedDataParams } from "../lib/ethereum/types.js";
import type { PriceChecker } from "../pricing/types.js";
import { type ProtocolError, classifyError } from "../shared/errors.js";
import type { Address } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { SellOrder } from "./types.js";

export interface OrderDomain {
	readonly chainId: number;
	/** Settlement contract */
	readonly verifyingContract: Address;
}

const ORDER_TYPES = {
	Order: [
		{ name: "sellToken", type: "address" },
		{ name: "buyToken", type: "address" },
		{ name: "receiver", type: "address" },
		{ name: "sellAmount", type: "uint256" },
		{ name: "buyAmount", type: "uint256" },
		{ name: "validTo", type: "uint32" },
		{ name: "appData", type: "bytes32" },
		{ name: "feeAmount", type: "uint256" },
		{ name: "kind", type: "string" },
		{ name: "partiallyFillable", type: "bool" },
		{ name: "sellTokenBalance", type: "string" },
		{ name: "buyTokenBalance", type: "string" },
	],
} as const;

export function orderTypedData(order: SellOrder, domain: OrderDomain): SignTypedDataParams {
	return {
		domain: {
			name: "Gnosis Protocol",
			version: "v2",
			chainId: domain.chainId,
			verifyingContract: domain.verifyingContract,
		},
		types: ORDER_TYPES,
		primaryType: "Order",
		message: {
			sellToken: order.sellToken,
			buyToken: order.buyToken,
			receiver: order.receiver,
			sellAmount: order.sellAmount,
			buyAmount: order.buyAmount,
			validTo: order.validTo,
			appData: order.appData,
			feeAmount: 0n,
			kind: "sell",
			partiallyFillable: false,
			sellTokenBalance: "erc20",
			buyTokenBalance: "erc20",
		},
	};
}

/**
 * Price-check `order` at `slippageBps`, then sign it.
 * @returns the 65-byte signature, or the price-check failure
 */
export async function signAuthorizedOrder(
	checker: PriceChecker,
	signer: EthSigner,
	order: SellOrder,
	slippageBps: number,
	domain: OrderDomain,
): Promise<Result<Hex, ProtocolError>> {
	const checked = checker.checkPrice(
		order.sellAmount,
		order.sellToken,
		order.buyToken,
		order.buyAmount,
		slippageBps,
	);
	if (!checked.ok) return checked;
	try {
		return ok(await signer.signTypedData(orderTypedData(order, domain)));
	} catch (thrown: unknown) {
		return err(classifyError(thrown));
	}
}
