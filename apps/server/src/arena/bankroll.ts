export type RiskLevel = "low" | "medium" | "high";

export const MIN_WAGER = 0.001;
export const STOP_LOSS_FRACTION = 0.3;

export const MAX_WAGER_PCT: Record<RiskLevel, number> = {
  low: 0.05,
  medium: 0.1,
  high: 0.15
};

export type BankrollEntry = {
  wager: number;
  won: boolean;
  payout: number;
  balanceAfter: number;
  sessionPnl: number;
};

export type PlayCheck = { ok: true } | { ok: false; reason: string };

export type BankrollSummary = {
  balance: number;
  initialBalance: number;
  sessionPnl: number;
  gamesPlayed: number;
  wins: number;
  winRate: number;
  riskLevel: RiskLevel;
  maxWager: number;
};

export class Bankroll {
  readonly initialBalance: number;
  readonly riskLevel: RiskLevel;
  readonly maxSingleWagerPct: number;
  balance: number;
  sessionPnl = 0;
  gamesPlayed = 0;
  wins = 0;
  readonly history: BankrollEntry[] = [];

  constructor(initialBalance: number, riskLevel: RiskLevel = "medium", maxSingleWagerPct?: number) {
    if (!Number.isFinite(initialBalance) || initialBalance <= 0) {
      throw new RangeError(`Initial balance must be positive, got ${initialBalance}`);
    }
    this.initialBalance = initialBalance;
    this.balance = initialBalance;
    this.riskLevel = riskLevel;
    this.maxSingleWagerPct = maxSingleWagerPct ?? MAX_WAGER_PCT[riskLevel];
  }

  get winRate(): number {
    return this.gamesPlayed === 0 ? 0.5 : this.wins / this.gamesPlayed;
  }

  maxWager(): number {
    return this.balance * this.maxSingleWagerPct;
  }

  shouldPlay(wager: number, estimatedEdge: number): PlayCheck {
    if (wager > this.balance) return { ok: false, reason: `Wager ${wager} exceeds balance ${this.balance.toFixed(4)}` };
    if (wager > this.maxWager()) return { ok: false, reason: `Wager ${wager} exceeds max (${this.maxWager().toFixed(4)})` };
    if (wager < MIN_WAGER) return { ok: false, reason: `Wager ${wager} below minimum ${MIN_WAGER}` };
    if (estimatedEdge <= 0 && this.riskLevel !== "high") {
      return { ok: false, reason: `Negative expected value (edge: ${(estimatedEdge * 100).toFixed(2)}%)` };
    }
    if (this.sessionPnl < -(this.initialBalance * STOP_LOSS_FRACTION)) {
      return { ok: false, reason: `Stop-loss triggered (session P&L: ${this.sessionPnl.toFixed(4)})` };
    }
    return { ok: true };
  }

  // Half-Kelly stake, capped at the single-wager percentage.
  kellyBetSize(winProb: number, odds = 1): number {
    if (winProb <= 0 || winProb >= 1) return 0;
    const edge = winProb * odds - (1 - winProb);
    if (edge <= 0) return 0;
    const fraction = Math.min((edge / odds) * 0.5, this.maxSingleWagerPct);
    return Math.round(this.balance * fraction * 1e6) / 1e6;
  }

  recordResult(wager: number, won: boolean, payout = 0) {
    this.gamesPlayed += 1;
    const delta = won ? payout - wager : -wager;
    if (won) this.wins += 1;
    this.balance += delta;
    this.sessionPnl += delta;
    this.history.push({ wager, won, payout, balanceAfter: this.balance, sessionPnl: this.sessionPnl });
  }

  summary(): BankrollSummary {
    return {
      balance: this.balance,
      initialBalance: this.initialBalance,
      sessionPnl: this.sessionPnl,
      gamesPlayed: this.gamesPlayed,
      wins: this.wins,
      winRate: this.winRate,
      riskLevel: this.riskLevel,
      maxWager: this.maxWager()
    };
  }

  toPromptContext(): string {
    const sign = this.sessionPnl >= 0 ? "+" : "";
    return [
      "BANKROLL STATUS:",
      `  Balance: ${this.balance.toFixed(4)}`,
      `  Session P&L: ${sign}${this.sessionPnl.toFixed(4)}`,
      `  Risk level: ${this.riskLevel}`,
      `  Max bet: ${this.maxWager().toFixed(4)}`,
      `  Win rate: ${(this.winRate * 100).toFixed(1)}% (${this.gamesPlayed} games)`
    ].join("\n");
  }
}
