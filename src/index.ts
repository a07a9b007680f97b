// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Address,
	type PoolId,
	ZERO_ADDRESS,
	address,
	poolId,
	isZeroAddress,
	idToString,
	type Result,
	ok,
	err,
	done,
	map,
	flatMap,
	collect,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
	ErrorCategory,
	type ErrorContext,
	ProtocolError,
	InvalidInputError,
	LengthMismatchError,
	NotFoundError,
	UnauthorizedError,
	InsufficientBalanceError,
	InsufficientAllowanceError,
	DepositsPausedError,
	OwnershipMismatchError,
	RewardTooHighError,
	PriceCheckError,
	ExternalCallError,
	LifecycleError,
	ConfigError,
	classifyError,
	isProtocolError,
	isPriceCheckError,
	isUnauthorized,
	isOwnershipMismatch,
	BPS_DENOMINATOR,
	WAD,
	applyBps,
	minimumOutput,
	Decimal,
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	type ProtocolConfig,
	type ConfigOverrides,
	DEFAULT_PROTOCOL_CONFIG,
	MAX_SLIPPAGE_BPS,
	resolveConfig,
	configFromEnv,
} from "./shared/index.js";

// ── Access ───────────────────────────────────────────────────────────
export { Role, type Caller, caller, hasRole } from "./access/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { JournaledMap, type Snapshottable, UnitOfWork } from "./transaction/index.js";
export { type TokenMetadata, TokenLedger } from "./token/index.js";
export {
	type ProtocolContext,
	type ProtocolContextOptions,
	createProtocolContext,
} from "./context/index.js";
export {
	type ProtocolEvent,
	type ProtocolEventType,
	type EventOfType,
	type EventRecord,
	EventLog,
	isEventOfType,
} from "./events/index.js";
export { type Logger, type LoggerConfig, type LogLevel, createLogger, silentLogger } from "./lib/logger/index.js";
export { type EthSigner, type Hex, createSigner } from "./lib/ethereum/index.js";

// ── Rewards ──────────────────────────────────────────────────────────
export {
	MIN_REWARD_DECIMALS,
	MAX_REWARD_DECIMALS,
	type RewardTokenConfig,
	type RewardPayout,
	type ExitResult,
	RewardAccounting,
	type RewardAccountingOptions,
	EmissionScheduler,
	forecastEmissions,
	type EmissionForecast,
	type EmissionForecastInput,
} from "./rewards/index.js";

// ── Pricing and swaps ────────────────────────────────────────────────
export {
	type RoundData,
	type PriceFeed,
	type FeedHop,
	type TokenPriceConfig,
	type PriceChecker,
	OraclePriceChecker,
} from "./pricing/index.js";
export { SlippageGuard, type SlippageLimits } from "./slippage/index.js";
export {
	type SellOrder,
	type SwapVenue,
	type SwapRequest,
	type SwapReceipt,
	type SwapGatewayOptions,
	type AppDataDocument,
	type OrderHook,
	type OrderDomain,
	buildAppData,
	feeHook,
	SwapGateway,
	orderTypedData,
	signAuthorizedOrder,
} from "./swap/index.js";

// ── Strategy ─────────────────────────────────────────────────────────
export {
	CompoundMode,
	type SatelliteRoute,
	type SatelliteStrategy,
	type StrategyRegistry,
	type AccountPosition,
	type ProcessingOutcome,
	type ReinvestReceipt,
	AccountBook,
	type AccountRecord,
	StrategyRewardProcessor,
	type RewardProcessorOptions,
} from "./strategy/index.js";

// ── Protocol ─────────────────────────────────────────────────────────
export { createProtocol, type Protocol, type ProtocolOptions } from "./protocol/index.js";
