export type AuctionItem = {
  name: string;
  minValue: number;
  maxValue: number;
};

export const AUCTION_ITEMS: readonly AuctionItem[] = [
  { name: "Rare Collectible Set", minValue: 0.01, maxValue: 0.05 },
  { name: "Yield Position", minValue: 0.005, maxValue: 0.03 },
  { name: "Governance Token Bundle", minValue: 0.008, maxValue: 0.04 },
  { name: "Exclusive Access Pass", minValue: 0.003, maxValue: 0.02 },
  { name: "Validator Stake Slot", minValue: 0.015, maxValue: 0.06 }
];

export function estimatedValue(item: AuctionItem): number {
  return (item.minValue + item.maxValue) / 2;
}
