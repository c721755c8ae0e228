import type { PeerSetUpdate } from "../core/peers";
import type { NodeInterface, Protocol } from "../core/protocol";
import type { UnderlayMessage } from "../core/underlay";
import type { Entity } from "../types/brands";

/** Payload component of a flooded message; subclass it per item type. */
export class FloodingMessage<T> {
  constructor(readonly item: T) {}
}

export type FloodingMessageType<T> = new (item: T) => FloodingMessage<T>;

/* ── per-node bookkeeping ────────────────────────────────── */

type PeerRecord = { readonly sent: Set<string>; readonly received: Set<string> };

/**
 * Which items went to or came from each peer, per flooding channel.
 * Lives on the node entity.
 */
export class FloodingLedger {
  private readonly channels = new Map<string, Map<Entity, PeerRecord>>();

  private peerRecord(channel: string, peer: Entity): PeerRecord {
    let byPeer = this.channels.get(channel);
    if (!byPeer) {
      byPeer = new Map();
      this.channels.set(channel, byPeer);
    }
    let record = byPeer.get(peer);
    if (!record) {
      record = { sent: new Set(), received: new Set() };
      byPeer.set(peer, record);
    }
    return record;
  }

  /** True once the item was sent to, or received from, that peer. */
  knows(channel: string, peer: Entity, key: string): boolean {
    const record = this.channels.get(channel)?.get(peer);
    return record !== undefined && (record.sent.has(key) || record.received.has(key));
  }

  markSent(channel: string, peer: Entity, key: string): void {
    this.peerRecord(channel, peer).sent.add(key);
  }

  markReceived(channel: string, peer: Entity, key: string): void {
    this.peerRecord(channel, peer).received.add(key);
  }

  forget(channel: string, peer: Entity): void {
    this.channels.get(channel)?.delete(peer);
  }

  sentCount(channel: string, peer: Entity): number {
    return this.channels.get(channel)?.get(peer)?.sent.size ?? 0;
  }
}

/* ── protocol ────────────────────────────────────────────── */

/**
 * Epidemic broadcast of items of type `T`: every node forwards an item to
 * each peer that has not seen it from or through this node.
 */
export class SimpleFlooding<T> implements Protocol<FloodingMessage<T>> {
  constructor(
    readonly name: string,
    readonly payloadType: FloodingMessageType<T>,
    private readonly keyOf: (item: T) => string,
  ) {}

  flood(node: NodeInterface, item: T): void {
    const ledger = node.get(FloodingLedger);
    const key = this.keyOf(item);
    for (const peer of node.peers()) {
      if (ledger.knows(this.name, peer, key)) continue;
      this.send(node, ledger, peer, item, key);
    }
  }

  /** Sends `items` in order to one peer, whatever it has already seen. */
  floodPeerWith(node: NodeInterface, peer: Entity, items: readonly T[]): void {
    const ledger = node.get(FloodingLedger);
    for (const item of items) this.send(node, ledger, peer, item, this.keyOf(item));
  }

  forgetPeer(node: NodeInterface, peer: Entity): void {
    node.get(FloodingLedger).forget(this.name, peer);
  }

  handleMessage(node: NodeInterface, message: UnderlayMessage, payload: FloodingMessage<T>): void {
    if (node.peers().has(message.source)) {
      node.get(FloodingLedger).markReceived(this.name, message.source, this.keyOf(payload.item));
    }
    this.flood(node, payload.item);
  }

  handlePoke(_node: NodeInterface): void {}

  handlePeerSetUpdate(node: NodeInterface, update: PeerSetUpdate): void {
    if (update.type === "peerRemoved") this.forgetPeer(node, update.peer);
  }

  // a despawned peer is skipped and left unrecorded
  private send(node: NodeInterface, ledger: FloodingLedger, peer: Entity, item: T, key: string) {
    if (!node.sim.world.contains(peer)) return;
    node.sendMessage(peer, new this.payloadType(item));
    ledger.markSent(this.name, peer, key);
  }
}
