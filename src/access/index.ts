export { Role, type Caller, caller, hasRole, requireRole, requireAddress } from "./caller.js";
