import { DecisionTimeoutError, type DecisionProvider } from "@gauntlet/shared";

export function raceTimeout<T>(work: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new DecisionTimeoutError(ms)), ms);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

// Rejections surface from play() as ExternalFailureError with the timeout as cause.
export function withTimeout(provider: DecisionProvider, ms: number): DecisionProvider {
  return {
    pokerAction: (playerId, req) => raceTimeout(provider.pokerAction(playerId, req), ms),
    auctionBid: (playerId, req) => raceTimeout(provider.auctionBid(playerId, req), ms),
    combatAbility: (playerId, req) => raceTimeout(provider.combatAbility(playerId, req), ms)
  };
}
