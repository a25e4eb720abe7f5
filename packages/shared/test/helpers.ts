// packages/shared/test/helpers.ts
import type {
  AuctionBidRequest,
  CombatAbilityRequest,
  DecisionProvider,
  PokerActionRequest
} from "../src/decisions.js";
import type { EventSink, SimEvent } from "../src/gameInterface.js";

type Handlers = {
  poker?: (playerId: string, req: PokerActionRequest) => unknown;
  auction?: (playerId: string, req: AuctionBidRequest) => unknown;
  combat?: (playerId: string, req: CombatAbilityRequest) => unknown;
};

export function scriptedProvider(handlers: Handlers): DecisionProvider {
  const unexpected = (game: string) => {
    throw new Error(`unexpected ${game} decision`);
  };
  return {
    pokerAction: async (playerId, req) => (handlers.poker ? handlers.poker(playerId, req) : unexpected("poker")),
    auctionBid: async (playerId, req) => (handlers.auction ? handlers.auction(playerId, req) : unexpected("auction")),
    combatAbility: async (playerId, req) => (handlers.combat ? handlers.combat(playerId, req) : unexpected("combat"))
  };
}

export function collectingSink(): EventSink & { events: SimEvent[] } {
  const events: SimEvent[] = [];
  return { events, notify: e => void events.push(e) };
}
