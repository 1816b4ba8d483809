export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** `9000` -> `$9,000`, `4520.5` -> `$4,520.50` */
export function usd(amount: number): string {
  const whole = Number.isInteger(amount);
  return (
    '$' +
    amount.toLocaleString('en-US', {
      minimumFractionDigits: whole ? 0 : 2,
      maximumFractionDigits: whole ? 0 : 2,
    })
  );
}
