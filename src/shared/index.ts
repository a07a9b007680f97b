export {
	type Address,
	type PoolId,
	ZERO_ADDRESS,
	address,
	poolId,
	isZeroAddress,
	idToString,
} from "./identifiers.js";

export {
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
} from "./result.js";

export {
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
} from "./errors.js";

export {
	BPS_DENOMINATOR,
	WAD,
	pow10,
	isValidBps,
	applyBps,
	minimumOutput,
	mulDiv,
	requirePositive,
} from "./amounts.js";

export { Decimal } from "./decimal.js";

export { type Clock, SystemClock, FakeClock, Duration } from "./time.js";

export {
	type ProtocolConfig,
	type ConfigOverrides,
	DEFAULT_PROTOCOL_CONFIG,
	MAX_SLIPPAGE_BPS,
	resolveConfig,
	configFromEnv,
} from "./config.js";
