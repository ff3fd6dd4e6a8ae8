/**
 * Fixed-point money
 *
 * All spend in the gateway is held as a bigint count of picodollars
 * (1 USD = 10^12). Sums never drift and comparisons against a ceiling are exact.
 *
 * @module @modelgate/shared/types/money
 */

/** Amount of money in picodollars */
export type Money = bigint;

/** Number of fractional decimal digits carried by {@link Money} */
export const MONEY_SCALE = 12;

/** Picodollars in one dollar */
export const PICOS_PER_USD = 10n ** BigInt(MONEY_SCALE);

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d+))?$/;

/**
 * Converts a dollar amount into {@link Money}.
 *
 * Strings are parsed exactly. Numbers go through their 12-digit decimal
 * expansion, so `usd(0.1)` is exactly one tenth of a dollar.
 *
 * @throws {RangeError} For non-finite values or more than 12 fractional digits
 *
 * @example
 * ```typescript
 * usd("0.50") + usd(0.5) === usd(1); // true
 * ```
 */
export function usd(amount: number | string): Money {
  let text: string;
  if (typeof amount === "number") {
    if (!Number.isFinite(amount) || Math.abs(amount) >= 1e21) {
      throw new RangeError(`Cannot represent ${amount} as money`);
    }
    text = amount.toFixed(MONEY_SCALE);
  } else {
    text = amount.trim();
  }

  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new RangeError(`Invalid money amount: "${String(amount)}"`);
  }

  const [, sign, whole = "0", fraction = ""] = match;
  const trimmedFraction = fraction.replace(/0+$/, "");
  if (trimmedFraction.length > MONEY_SCALE) {
    throw new RangeError(`Money supports at most ${MONEY_SCALE} fractional digits: "${text}"`);
  }

  const picos =
    BigInt(whole) * PICOS_PER_USD + BigInt(trimmedFraction.padEnd(MONEY_SCALE, "0") || "0");
  return sign ? -picos : picos;
}

/**
 * Converts {@link Money} to a floating point dollar value for display or export.
 */
export function toUsd(amount: Money): number {
  return Number(formatUsd(amount, MONEY_SCALE));
}

/**
 * Formats {@link Money} as a decimal dollar string.
 *
 * Digits beyond `digits` are truncated toward zero.
 *
 * @example
 * ```typescript
 * formatUsd(usd("1.5"), 2); // "1.50"
 * ```
 */
export function formatUsd(amount: Money, digits = 6): string {
  const negative = amount < 0n;
  const abs = negative ? -amount : amount;
  const whole = abs / PICOS_PER_USD;
  const fraction = (abs % PICOS_PER_USD).toString().padStart(MONEY_SCALE, "0").slice(0, digits);
  const body = digits > 0 ? `${whole}.${fraction}` : whole.toString();
  return negative ? `-${body}` : body;
}

/**
 * Converts a price quoted per million tokens into a picodollar rate per token.
 *
 * @throws {RangeError} When the price has finer than picodollar-per-token
 *   precision (more than six fractional digits per million)
 */
export function perMillionToPerToken(pricePerMillion: number | string): Money {
  const perMillion = usd(pricePerMillion);
  if (perMillion % 1_000_000n !== 0n) {
    throw new RangeError(
      `Price ${String(pricePerMillion)} per million tokens is finer than one picodollar per token`
    );
  }
  return perMillion / 1_000_000n;
}
