export { createProtocol, type Protocol, type ProtocolOptions } from "./create-protocol.js";
