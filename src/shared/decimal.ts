/**
 * Decimal — fixed-point values for human-facing reporting.
 *
 * Ledger math stays in bigint base units. Decimal is for the views built on
 * top of it (APR, per-day emission, token amounts as whole units), where an
 * 18-digit fraction is enough and `number` would round.
 */

const PRECISION = 18;
const SCALE = 10n ** BigInt(PRECISION);

export class Decimal {
	/** value * 10^18 */
	private readonly raw: bigint;

	private constructor(raw: bigint) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	static from(value: string | number): Decimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`Decimal.from: invalid number ${value}`);
			}
			return Decimal.fromString(value.toString());
		}
		return Decimal.fromString(value);
	}

	/**
	 * Lift a base-unit amount of a token with `decimals` into whole units.
	 * @example Decimal.fromUnits(1_500_000n, 6).toString() // "1.5"
	 */
	static fromUnits(amount: bigint, decimals: number): Decimal {
		if (!Number.isInteger(decimals) || decimals < 0 || decimals > PRECISION) {
			throw new Error(`Decimal.fromUnits: decimals must be within 0..${PRECISION}`);
		}
		return new Decimal(amount * 10n ** BigInt(PRECISION - decimals));
	}

	static zero(): Decimal {
		return new Decimal(0n);
	}

	private static fromString(s: string): Decimal {
		const trimmed = s.trim();
		if (trimmed.length === 0) {
			throw new Error("Decimal.from: empty string");
		}

		const negative = trimmed.startsWith("-");
		const abs = negative ? trimmed.slice(1) : trimmed;
		if (!/^\d*\.?\d*$/.test(abs) || abs === ".") {
			throw new Error(`Decimal.from: not a decimal literal "${s}"`);
		}
		const [intPart = "", fracPart = ""] = abs.split(".");
		const paddedFrac = fracPart.padEnd(PRECISION, "0").slice(0, PRECISION);
		const raw = BigInt(intPart || "0") * SCALE + BigInt(paddedFrac);

		return new Decimal(negative ? -raw : raw);
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	mul(other: Decimal): Decimal {
		return new Decimal((this.raw * other.raw) / SCALE);
	}

	div(other: Decimal): Decimal {
		if (other.raw === 0n) {
			throw new Error("Decimal.div: division by zero");
		}
		return new Decimal((this.raw * SCALE) / other.raw);
	}

	// ── Comparison ─────────────────────────────────────────────────

	isZero(): boolean {
		return this.raw === 0n;
	}

	// ── Conversion ─────────────────────────────────────────────────

	toString(): string {
		const negative = this.raw < 0n;
		const absRaw = negative ? -this.raw : this.raw;
		const intPart = absRaw / SCALE;
		const fracPart = absRaw % SCALE;
		const fracStr = fracPart.toString().padStart(PRECISION, "0").replace(/0+$/, "");
		const prefix = negative ? "-" : "";
		return fracStr.length > 0 ? `${prefix}${intPart}.${fracStr}` : `${prefix}${intPart}`;
	}
}
