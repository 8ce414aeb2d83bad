/**
 * Sentinel shown for amounts that carry nothing to display
 */
export const AMOUNT_NOT_AVAILABLE = 'N/A';

/**
 * Render minor units for humans (order notes, logs).
 *
 * ISK has no minor unit in practice: "1.500 ISK". Every other currency gets
 * two decimals: "123.45 USD". Never compare the result of this function;
 * integer minor units are the only unit of truth.
 */
export function formatAmount(minorUnits: number, currency: string): string {
  if (!Number.isFinite(minorUnits) || minorUnits <= 0) {
    return AMOUNT_NOT_AVAILABLE;
  }

  if (currency === 'ISK') {
    const major = Math.round(minorUnits / 100);
    return `${groupThousands(major, '.')} ISK`;
  }

  const whole = Math.trunc(minorUnits);
  const major = Math.floor(whole / 100);
  const cents = String(whole % 100).padStart(2, '0');
  return `${major}.${cents} ${currency}`;
}

function groupThousands(value: number, separator: string): string {
  return String(value).replace(/\B(?=(\d{3})+(?!\d))/g, separator);
}

/**
 * Money value object - immutable representation of monetary values
 * Stores amounts in smallest currency unit (e.g., cents, aurar)
 */
export class Money {
  private readonly _amount: number;
  private readonly _currency: string;

  constructor(amount: number, currency: string) {
    if (!Number.isInteger(amount)) {
      throw new Error('Amount must be an integer (smallest currency unit)');
    }
    if (amount < 0) {
      throw new Error('Amount cannot be negative');
    }
    if (!currency || currency.length !== 3) {
      throw new Error('Currency must be a 3-letter ISO 4217 code');
    }

    this._amount = amount;
    this._currency = currency.toUpperCase();
  }

  get amount(): number {
    return this._amount;
  }

  get currency(): string {
    return this._currency;
  }
}
