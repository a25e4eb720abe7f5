import type { PokerActionType } from "@gauntlet/shared";

export const RECENT_MOVES = 10;

export type PlayStyle = "unknown" | "loose-aggressive" | "tight-aggressive" | "loose-passive" | "tight-passive";

export class OpponentModel {
  gamesPlayed = 0;
  wins = 0;
  losses = 0;
  readonly counts: Record<PokerActionType, number> = { fold: 0, call: 0, raise: 0 };
  bluffCount = 0;
  readonly recentMoves: PokerActionType[] = [];
  readonly bids: { bid: number; value: number }[] = [];
  overbids = 0;
  underbids = 0;

  constructor(readonly playerId: string) {}

  get totalActions(): number {
    return this.counts.fold + this.counts.call + this.counts.raise;
  }

  get aggression(): number {
    return this.totalActions === 0 ? 0.5 : this.counts.raise / this.totalActions;
  }

  get tightness(): number {
    return this.totalActions === 0 ? 0.5 : this.counts.fold / this.totalActions;
  }

  get bluffFrequency(): number {
    return this.gamesPlayed === 0 ? 0 : this.bluffCount / this.gamesPlayed;
  }

  get winRate(): number {
    return this.gamesPlayed === 0 ? 0.5 : this.wins / this.gamesPlayed;
  }

  get avgBidRatio(): number {
    const ratios = this.bids.filter(b => b.value > 0).map(b => b.bid / b.value);
    return ratios.length === 0 ? 0.5 : ratios.reduce((s, r) => s + r, 0) / ratios.length;
  }

  recordPokerAction(action: PokerActionType, wasBluff = false) {
    this.counts[action] += 1;
    this.recentMoves.push(action);
    if (this.recentMoves.length > RECENT_MOVES) this.recentMoves.shift();
    if (wasBluff) this.bluffCount += 1;
  }

  recordAuctionBid(bid: number, itemValue: number) {
    this.bids.push({ bid, value: itemValue });
    if (bid > itemValue) this.overbids += 1;
    else this.underbids += 1;
  }

  recordGameResult(won: boolean) {
    this.gamesPlayed += 1;
    if (won) this.wins += 1;
    else this.losses += 1;
  }

  style(): PlayStyle {
    if (this.totalActions < 3) return "unknown";
    const aggressive = this.aggression > 0.4;
    const loose = this.tightness < 0.3;
    if (aggressive) return loose ? "loose-aggressive" : "tight-aggressive";
    return loose ? "loose-passive" : "tight-passive";
  }

  toPromptContext(): string {
    const pct = (v: number) => `${(v * 100).toFixed(1)}%`;
    return [
      `Opponent ${this.playerId}:`,
      `  Style: ${this.style()}`,
      `  Games played: ${this.gamesPlayed}`,
      `  Win rate: ${pct(this.winRate)}`,
      `  Aggression: ${pct(this.aggression)}`,
      `  Tightness: ${pct(this.tightness)}`,
      `  Bluff frequency: ${pct(this.bluffFrequency)}`,
      `  Recent actions: ${this.recentMoves.slice(-5).join(", ") || "none"}`
    ].join("\n");
  }
}

export class OpponentTracker {
  private readonly models = new Map<string, OpponentModel>();

  get(playerId: string): OpponentModel {
    const key = playerId.toLowerCase();
    let model = this.models.get(key);
    if (!model) {
      model = new OpponentModel(key);
      this.models.set(key, model);
    }
    return model;
  }

  known(): OpponentModel[] {
    return [...this.models.values()];
  }

  context(playerId: string): string {
    return this.get(playerId).toPromptContext();
  }
}
