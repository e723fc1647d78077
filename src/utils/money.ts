export function formatAmount(value: number): string {
  return value.toFixed(2);
}

export function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}
