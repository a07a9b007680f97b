export type {
	ProtocolEvent,
	ProtocolEventType,
	EventOfType,
	TransferEvent,
	ApprovalEvent,
	RewardTokenAdded,
	RewardTokenRemoved,
	RewardAdded,
	RewardsDurationUpdated,
	RewardsDistributorUpdated,
	Recovered,
	DepositsPaused,
	DepositsUnpaused,
	Staked,
	Withdrawn,
	RewardPaid,
	AccountRegistered,
	CompoundModeUpdated,
	AccountSlippageUpdated,
	DefaultSlippageUpdated,
	SatelliteRouteUpdated,
	PriceFeedConfigured,
	TokenSwapApproved,
	SwapExecuted,
	Reinvested,
	RewardsProcessed,
} from "./protocol-events.js";
export { isEventOfType } from "./protocol-events.js";
export { EventLog, type EventRecord } from "./event-log.js";
