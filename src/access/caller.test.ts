import { describe, expect, it } from "vitest";
import { ErrorCategory } from "../shared/errors.js";
import { address } from "../shared/identifiers.js";
import { Role, caller, hasRole, requireAddress, requireRole } from "./caller.js";

const ALICE = address(`0x${"a1".repeat(20)}`);
const BOB = address(`0x${"b2".repeat(20)}`);

describe("Caller", () => {
	it("holds exactly the roles it was granted", () => {
		const who = caller(ALICE, [Role.Backend]);
		expect(hasRole(who, Role.Backend)).toBe(true);
		expect(hasRole(who, Role.Admin)).toBe(false);
	});

	it("requireRole passes for a holder", () => {
		expect(requireRole(caller(ALICE, [Role.Admin]), Role.Admin, "addReward").ok).toBe(true);
	});

	it("requireRole fails with an authorization error naming the role", () => {
		const result = requireRole(caller(ALICE), Role.Backend, "processRewards");
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.category).toBe(ErrorCategory.Authorization);
			expect(result.error.message).toBe("processRewards requires the backend role");
		}
	});

	it("requireAddress compares the caller address", () => {
		expect(requireAddress(caller(ALICE), ALICE, "setCompoundMode").ok).toBe(true);
		const denied = requireAddress(caller(BOB), ALICE, "setCompoundMode");
		expect(denied.ok).toBe(false);
		if (!denied.ok) expect(denied.error.code).toBe("UNAUTHORIZED");
	});
});
