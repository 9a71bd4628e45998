export const TruncationStrategies = [
  "end",
  "start",
  "middle"
] as const;

export type TruncationStrategy = typeof TruncationStrategies[number];

export function isTruncationStrategy(value: string): value is TruncationStrategy {
  return (TruncationStrategies as readonly string[]).includes(value);
}
