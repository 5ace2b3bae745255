// Three fixed decimals from the exact binary value, ties to even.
// Only odd multiples of 1/16 sit exactly halfway at the third decimal.
export function formatFixed3(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  if (value < 0) return `-${formatFixed3(-value)}`;
  // toFixed switches to exponent notation from 1e21; such doubles are integers
  if (value >= 1e21) return `${BigInt(value)}.000`;

  const sixteenths = value * 16;
  if (Number.isInteger(sixteenths) && sixteenths % 2 === 1) {
    const truncated = value.toFixed(4).slice(0, -1);
    if (Number(truncated.slice(-1)) % 2 === 0) return truncated;
  }
  return value.toFixed(3);
}
