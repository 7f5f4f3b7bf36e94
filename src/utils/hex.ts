/** RPC quantity ("0x1a") → 26; throws on non-hex input or unsafe integers */
export function hexToNumber(hex: string): number {
  const value = Number(BigInt(hex));
  if (!Number.isSafeInteger(value)) throw new Error(`value out of range: ${hex}`);
  return value;
}
