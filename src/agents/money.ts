import type { Money } from './types.js';

export const NANOS_PER_UNIT = 1_000_000_000;

export function toNanos(money: Money): number {
  return money.units * NANOS_PER_UNIT + money.nanos;
}

export function fromNanos(nanos: number, currencyCode = 'USD'): Money {
  return { currencyCode, units: Math.floor(nanos / NANOS_PER_UNIT), nanos: nanos % NANOS_PER_UNIT };
}

/** `$12.50`, truncated to cents. Non-USD amounts are prefixed with their code. */
export function formatMoney(money: Money): string {
  const cents = String(Math.floor(money.nanos / 10_000_000)).padStart(2, '0');
  const prefix = money.currencyCode === 'USD' ? '$' : `${money.currencyCode} `;
  return `${prefix}${money.units}.${cents}`;
}
