import { SpectatorClientEventSchema, type EventSink, type SimEvent } from "@gauntlet/shared";

export const ARENA_ROOM = "arena";

export function matchRoom(matchId: string): string {
  return `match:${matchId}`;
}

export type SpectatorServerEvent =
  | { type: "sim:event"; matchId: string; event: SimEvent }
  | { type: "spectate:ok"; matchId: string }
  | { type: "unspectate:ok"; matchId: string }
  | { type: "error"; message: string };

export type Broadcast = (rooms: string[], evt: SpectatorServerEvent) => void;

export function createSpectatorSink(broadcast: Broadcast, matchId: string): EventSink {
  return {
    notify: event => broadcast([matchRoom(matchId), ARENA_ROOM], { type: "sim:event", matchId, event })
  };
}

// Late-bound so the HTTP app can be built before socket.io attaches to its server.
export class SpectatorHub {
  private broadcast: Broadcast | null = null;

  attach(broadcast: Broadcast) {
    this.broadcast = broadcast;
  }

  sinkFor(matchId: string): EventSink {
    return createSpectatorSink((rooms, evt) => this.broadcast?.(rooms, evt), matchId);
  }
}

export type RoomMembership = {
  join(room: string): void;
  leave(room: string): void;
};

// Returns the reply for the sending socket.
export function handleSpectatorMessage(msg: unknown, membership: RoomMembership): SpectatorServerEvent {
  const parsed = SpectatorClientEventSchema.safeParse(msg);
  if (!parsed.success) return { type: "error", message: "Bad payload" };

  const evt = parsed.data;
  if (evt.type === "spectate") {
    membership.join(matchRoom(evt.matchId));
    return { type: "spectate:ok", matchId: evt.matchId };
  }
  membership.leave(matchRoom(evt.matchId));
  return { type: "unspectate:ok", matchId: evt.matchId };
}
