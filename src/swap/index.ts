export type {
	SellOrder,
	SwapVenue,
	SwapRequest,
	SwapReceipt,
	SwapGatewayOptions,
} from "./types.js";
export {
	APP_DATA_VERSION,
	HOOKS_VERSION,
	type AppDataDocument,
	type OrderHook,
	type FeeHookParams,
	buildAppData,
	feeHook,
} from "./app-data.js";
export { SwapGateway } from "./swap-gateway.js";
export { type OrderDomain, orderTypedData, signAuthorizedOrder } from "./order-signing.js";
