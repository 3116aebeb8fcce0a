export function estimateCost(tokens: number, costPer1000Tokens: number): number {
  return (tokens / 1000) * costPer1000Tokens;
}
