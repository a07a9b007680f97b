/**
 * Caller capabilities — who is invoking an operation and which roles they hold.
 *
 * Every mutating operation receives a Caller and checks it before touching
 * state. Roles are granted by whoever constructs the Caller (the host
 * process); the library only checks them.
 */

import { UnauthorizedError } from "../shared/errors.js";
import type { Address } from "../shared/identifiers.js";
import { type Result, done, err } from "../shared/result.js";

export const Role = {
	/** Reward lifecycle, default slippage, price feeds, swap allow-list, recovery */
	Admin: "admin",
	/** Scheduled reward processing for accounts */
	Backend: "backend",
	/** Halting and resuming deposits */
	Guardian: "guardian",
} as const;

export type Role = (typeof Role)[keyof typeof Role];

export interface Caller {
	readonly address: Address;
	readonly roles: ReadonlySet<Role>;
}

/**
 * Builds a caller context.
 * @example caller(backendAddress, [Role.Backend])
 */
export function caller(address: Address, roles: readonly Role[] = []): Caller {
	return { address, roles: new Set(roles) };
}

export function hasRole(who: Caller, role: Role): boolean {
	return who.roles.has(role);
}

/** Fails unless the caller holds `role`. */
export function requireRole(
	who: Caller,
	role: Role,
	action: string,
): Result<void, UnauthorizedError> {
	if (hasRole(who, role)) return done();
	return err(
		new UnauthorizedError(`${action} requires the ${role} role`, {
			caller: who.address,
			role,
		}),
	);
}

/** Fails unless the caller is exactly `expected`. */
export function requireAddress(
	who: Caller,
	expected: Address,
	action: string,
): Result<void, UnauthorizedError> {
	if (who.address === expected) return done();
	return err(
		new UnauthorizedError(`${action} is restricted to ${expected}`, {
			caller: who.address,
			expected,
		}),
	);
}
