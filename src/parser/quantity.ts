export const MAX_QUANTITY_DIGITS = 5;

export type QuantityCheck = { ok: true; quantity: number } | { ok: false; reason: string };

export function checkQuantity(digits: string): QuantityCheck {
  if (digits.length > MAX_QUANTITY_DIGITS) {
    return { ok: false, reason: `Quantity ${digits} exceeds ${MAX_QUANTITY_DIGITS} digits` };
  }
  const quantity = Number.parseInt(digits, 10);
  if (!Number.isInteger(quantity) || quantity <= 0) {
    return { ok: false, reason: `Quantity must be positive, got ${digits}` };
  }
  return { ok: true, quantity };
}
