export {
	type ProtocolContext,
	type ProtocolContextOptions,
	createProtocolContext,
} from "./protocol-context.js";
