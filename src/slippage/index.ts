export { SlippageGuard, type SlippageLimits } from "./slippage-guard.js";
