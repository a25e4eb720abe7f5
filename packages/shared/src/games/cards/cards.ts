import { mulberry32, shuffleInPlace, type Rng } from "../../rng.js";

export type Suit = "h" | "d" | "c" | "s";
export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14;
export type RankChar = "2" | "3" | "4" | "5" | "6" | "7" | "8" | "9" | "T" | "J" | "Q" | "K" | "A";
export type CardLabel = `${RankChar}${Suit}`;

export type Card = { readonly rank: Rank; readonly suit: Suit };

export const SUITS: readonly Suit[] = ["h", "d", "c", "s"];
export const RANKS: readonly Rank[] = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14];
const RANK_CHARS: readonly RankChar[] = ["2", "3", "4", "5", "6", "7", "8", "9", "T", "J", "Q", "K", "A"];

export const HAND_CATEGORIES = [
  "high_card",
  "pair",
  "two_pair",
  "three_of_a_kind",
  "straight",
  "flush",
  "full_house",
  "four_of_a_kind",
  "straight_flush",
  "royal_flush"
] as const;
export type HandCategoryName = (typeof HAND_CATEGORIES)[number];
export type HandCategory = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export type HandScore = { category: HandCategory; tiebreak: number[] };

const HIGH_CARD = 0, PAIR = 1, TWO_PAIR = 2, TRIPS = 3, STRAIGHT = 4;
const FLUSH = 5, FULL_HOUSE = 6, QUADS = 7, STRAIGHT_FLUSH = 8, ROYAL_FLUSH = 9;

function isSuit(s: string): s is Suit {
  return s === "h" || s === "d" || s === "c" || s === "s";
}

export function cardLabel(card: Card): CardLabel {
  return `${RANK_CHARS[card.rank - 2]}${card.suit}`;
}

export function cardsLabel(cards: readonly Card[]): string {
  return cards.map(cardLabel).join(", ");
}

export function parseCard(label: string): Card {
  const rankIdx = RANK_CHARS.findIndex(r => r === label.slice(0, -1).toUpperCase().replace("10", "T"));
  const suit = label.slice(-1).toLowerCase();
  if (rankIdx < 0 || !isSuit(suit)) throw new Error(`Invalid card label: ${label}`);
  return { rank: RANKS[rankIdx], suit };
}

export function parseCards(labels: string): Card[] {
  return labels.split(/[\s,]+/).filter(Boolean).map(parseCard);
}

export class Deck {
  private cards: Card[] = [];

  constructor(private readonly rng: Rng = mulberry32(Date.now())) {
    this.reset();
  }

  reset(): void {
    this.cards = [];
    for (const suit of SUITS) for (const rank of RANKS) this.cards.push({ rank, suit });
  }

  shuffle(): void {
    shuffleInPlace(this.cards, this.rng);
  }

  deal(n = 1): Card[] {
    if (n > this.cards.length) throw new Error(`Deck exhausted: wanted ${n}, ${this.cards.length} left`);
    return this.cards.splice(0, n);
  }

  get remaining(): number {
    return this.cards.length;
  }
}

export function compareHandScores(a: HandScore, b: HandScore): number {
  if (a.category !== b.category) return a.category - b.category;
  const n = Math.min(a.tiebreak.length, b.tiebreak.length);
  for (let i = 0; i < n; i++) {
    if (a.tiebreak[i] !== b.tiebreak[i]) return a.tiebreak[i] - b.tiebreak[i];
  }
  return a.tiebreak.length - b.tiebreak.length;
}

// Descending run of a straight, or null. A-5-4-3-2 plays the Ace low.
function straightRun(valuesDesc: number[]): number[] | null {
  const unique = Array.from(new Set(valuesDesc));
  if (unique.length !== 5) return null;
  if (unique[0] - unique[4] === 4) return unique;
  if (unique[0] === 14 && unique[1] === 5 && unique[4] === 2) return [5, 4, 3, 2, 1];
  return null;
}

export function scoreFive(cards: readonly Card[]): HandScore {
  if (cards.length !== 5) throw new Error(`scoreFive expects 5 cards, got ${cards.length}`);
  const values = cards.map((c): number => c.rank).sort((a, b) => b - a);
  const isFlush = cards.every(c => c.suit === cards[0].suit);
  const run = straightRun(values);

  const counts = new Map<number, number>();
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
  const groups = Array.from(counts.entries()).sort((a, b) => {
    if (b[1] !== a[1]) return b[1] - a[1];
    return b[0] - a[0];
  });
  const grouped = groups.map(g => g[0]);
  const shape = groups.map(g => g[1]).join("");

  if (run && isFlush) return { category: run[0] === 14 ? ROYAL_FLUSH : STRAIGHT_FLUSH, tiebreak: run };
  if (shape === "41") return { category: QUADS, tiebreak: grouped };
  if (shape === "32") return { category: FULL_HOUSE, tiebreak: grouped };
  if (isFlush) return { category: FLUSH, tiebreak: values };
  if (run) return { category: STRAIGHT, tiebreak: run };
  if (shape === "311") return { category: TRIPS, tiebreak: grouped };
  if (shape === "221") return { category: TWO_PAIR, tiebreak: grouped };
  if (shape === "2111") return { category: PAIR, tiebreak: grouped };
  return { category: HIGH_CARD, tiebreak: values };
}

export function scoreHand(cards: readonly Card[]): HandScore {
  if (cards.length < 5) {
    return { category: HIGH_CARD, tiebreak: cards.map((c): number => c.rank).sort((a, b) => b - a) };
  }
  let best: HandScore | null = null;
  const n = cards.length;
  for (let a = 0; a < n - 4; a++) {
    for (let b = a + 1; b < n - 3; b++) {
      for (let c = b + 1; c < n - 2; c++) {
        for (let d = c + 1; d < n - 1; d++) {
          for (let e = d + 1; e < n; e++) {
            const score = scoreFive([cards[a], cards[b], cards[c], cards[d], cards[e]]);
            if (!best || compareHandScores(score, best) > 0) best = score;
          }
        }
      }
    }
  }
  return best ?? { category: HIGH_CARD, tiebreak: [] };
}

const HAND_NAMES: Record<HandCategoryName, string> = {
  high_card: "High Card",
  pair: "Pair",
  two_pair: "Two Pair",
  three_of_a_kind: "Three of a Kind",
  straight: "Straight",
  flush: "Flush",
  full_house: "Full House",
  four_of_a_kind: "Four of a Kind",
  straight_flush: "Straight Flush",
  royal_flush: "Royal Flush"
};

export function handName(category: HandCategory): string {
  return HAND_NAMES[HAND_CATEGORIES[category]];
}
