/**
 * Round to the nearest integer, resolving exact .5 ties to the even neighbour
 * (2.5 -> 2, 3.5 -> 4). All ratio and layout figures in the app go through this
 * so that published numbers such as the 846-pixel orbital radius stay stable.
 */
export function roundHalfEven(value: number): number {
  if (!Number.isFinite(value)) return value;
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff < 0.5) return floor;
  if (diff > 0.5) return floor + 1;
  return floor % 2 === 0 ? floor : floor + 1;
}
