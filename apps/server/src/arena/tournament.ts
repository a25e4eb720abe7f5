import type { GameKey, TournamentCreate } from "@gauntlet/shared";
import { ArenaError } from "./errors.js";
import type { ArenaManager, MatchSummary } from "./manager.js";

export type TournamentMatch = {
  round: number;
  index: number;
  playerA: string;
  playerB: string;
  winner: string | null;
  summary: MatchSummary | null;
};

export type TournamentBracket = {
  name: string;
  game: GameKey;
  entryFee: number;
  players: string[];
  matches: TournamentMatch[];
  currentRound: number;
  winner: string | null;
  completed: boolean;
};

export function totalRounds(playerCount: number): number {
  return Math.log2(playerCount);
}

export function roundName(round: number, total: number): string {
  if (round === total) return "Finals";
  if (round === total - 1) return "Semifinals";
  return `Round ${round}`;
}

function pairUp(players: readonly string[], round: number): TournamentMatch[] {
  const matches: TournamentMatch[] = [];
  for (let i = 0; i < players.length; i += 2) {
    matches.push({ round, index: i / 2, playerA: players[i], playerB: players[i + 1], winner: null, summary: null });
  }
  return matches;
}

export class TournamentManager {
  private readonly brackets: TournamentBracket[] = [];

  constructor(private readonly arena: ArenaManager) {}

  create(input: TournamentCreate): TournamentBracket {
    const n = input.players.length;
    if (n < 2 || n > 16) throw new ArenaError("Need 2-16 players", 400);
    if ((n & (n - 1)) !== 0) throw new ArenaError("Player count must be a power of 2", 400);
    if (new Set(input.players).size !== n) throw new ArenaError("Players must be distinct", 400);
    for (const id of input.players) this.arena.agents.get(id);

    const bracket: TournamentBracket = {
      name: input.name,
      game: input.game,
      entryFee: input.entryFee,
      players: [...input.players],
      matches: pairUp(input.players, 1),
      currentRound: 1,
      winner: null,
      completed: false
    };
    this.brackets.push(bracket);
    return bracket;
  }

  list(): TournamentBracket[] {
    return [...this.brackets];
  }

  async run(bracket: TournamentBracket): Promise<TournamentBracket> {
    const total = totalRounds(bracket.players.length);
    for (let round = 1; round <= total; round++) {
      bracket.currentRound = round;
      const winners: string[] = [];
      for (const match of bracket.matches.filter(m => m.round === round)) {
        const { summary } = await this.arena.runMatch({
          game: bracket.game,
          playerA: match.playerA,
          playerB: match.playerB,
          wager: bracket.entryFee
        });
        match.winner = summary.winner;
        match.summary = summary;
        winners.push(summary.winner);
      }
      if (winners.length > 1) bracket.matches.push(...pairUp(winners, round + 1));
      else {
        bracket.winner = winners[0] ?? null;
        bracket.completed = true;
      }
    }
    return bracket;
  }

  display(bracket: TournamentBracket): string {
    const nameOf = (id: string) => this.arena.agents.find(id)?.name ?? id;
    const total = totalRounds(bracket.players.length);
    const lines = [`Tournament: ${bracket.name}`, "=".repeat(40)];
    for (let round = 1; round <= total; round++) {
      lines.push("", `${roundName(round, total)}:`);
      for (const m of bracket.matches.filter(x => x.round === round)) {
        const outcome = m.winner ? nameOf(m.winner) : "(pending)";
        lines.push(`  ${nameOf(m.playerA)} vs ${nameOf(m.playerB)}  ->  ${outcome}`);
      }
    }
    if (bracket.winner) lines.push("", `Champion: ${nameOf(bracket.winner)}`);
    return lines.join("\n");
  }
}
