import { bytesToHex } from "@noble/hashes/utils";
import { SimulationError } from "../core/errors";
import type { PeerSetUpdate } from "../core/peers";
import type { NodeInterface, Protocol } from "../core/protocol";
import type { SimRng } from "../core/rng";
import type { UnderlayMessage } from "../core/underlay";
import { asBlockHash, type BlockHash } from "../types/brands";
import { FloodingMessage, SimpleFlooding } from "./simpleFlooding";

/** Reserved all-zero hash: the implicit predecessor of every first block. */
export const GENESIS: BlockHash = asBlockHash("00".repeat(32));

/**
 * A block's identity is a random 256-bit tag standing in for a hash; it is
 * not derived from the block's content.
 */
export type Block = {
  readonly hash: BlockHash;
  readonly hashPrev: BlockHash;
};

export const newBlock = (hashPrev: BlockHash, rng: SimRng): Block => ({
  hash: asBlockHash(bytesToHex(rng.bytes(32))),
  hashPrev,
});

export class BlockMessage extends FloodingMessage<Block> {}

/* ── per-node chain state ────────────────────────────────── */

export class NakamotoNodeState {
  private readonly allBlocks = new Map<BlockHash, { height: number; block: Block }>();
  private tipHash: BlockHash = GENESIS;
  private readonly forks = new Set<BlockHash>();

  get tip(): BlockHash {
    return this.tipHash;
  }

  /** Heads of known chains other than the tip. */
  get forkTips(): ReadonlySet<BlockHash> {
    return this.forks;
  }

  get blockCount(): number {
    return this.allBlocks.size;
  }

  /**
   * Adds a block to the tree. Returns true when the tip moved.
   *
   * The longest chain wins; a chain of equal height never displaces the
   * current tip. Blocks whose predecessor is unknown are dropped, flooding
   * delivers them again once the ancestor has arrived.
   */
  registerBlock(block: Block): boolean {
    if (this.allBlocks.has(block.hash)) return false;

    if (block.hashPrev === this.tipHash) {
      this.allBlocks.set(block.hash, { height: this.height(this.tipHash) + 1, block });
      this.tipHash = block.hash;
      return true;
    }

    if (block.hashPrev !== GENESIS && !this.allBlocks.has(block.hashPrev)) return false;

    this.allBlocks.set(block.hash, { height: this.height(block.hashPrev) + 1, block });
    this.forks.delete(block.hashPrev);
    this.forks.add(block.hash);
    if (this.height(block.hash) <= this.height(this.tipHash)) return false;

    // reorg
    this.forks.delete(block.hash);
    this.forks.add(this.tipHash);
    this.tipHash = block.hash;
    return true;
  }

  hasBlock(hash: BlockHash): boolean {
    return hash === GENESIS || this.allBlocks.has(hash);
  }

  height(hash: BlockHash): number {
    if (hash === GENESIS) return 0;
    const entry = this.allBlocks.get(hash);
    if (!entry) throw SimulationError.unknownBlock(hash);
    return entry.height;
  }

  tipHeight(): number {
    return this.height(this.tipHash);
  }

  hashPrev(hash: BlockHash): BlockHash | undefined {
    return this.allBlocks.get(hash)?.block.hashPrev;
  }

  /** Every stored block, forks included, lowest height first. */
  allBlocksSorted(): Block[] {
    return [...this.allBlocks.values()]
      .sort((a, b) => a.height - b.height)
      .map(({ block }) => block);
  }
}

/* ── protocol ────────────────────────────────────────────── */

export class NakamotoConsensus implements Protocol<BlockMessage> {
  readonly name = "nakamoto";
  readonly payloadType = BlockMessage;
  readonly flooding = new SimpleFlooding<Block>("nakamoto/blocks", BlockMessage, (b) => b.hash);

  handleMessage(node: NodeInterface, message: UnderlayMessage, payload: BlockMessage): void {
    const state = node.get(NakamotoNodeState);
    const before = state.tip;
    if (!state.hasBlock(payload.item.hashPrev)) {
      node.logger().warn(
        { t: node.now(), block: payload.item.hash, parent: payload.item.hashPrev },
        "dropped block with unknown parent",
      );
    }
    if (state.registerBlock(payload.item) && payload.item.hashPrev !== before) {
      node.logger().info(
        { t: node.now(), tip: state.tip, height: state.tipHeight() },
        "switched to a longer chain",
      );
    }
    this.flooding.handleMessage(node, message, payload);
  }

  handlePoke(node: NodeInterface): void {
    const state = node.get(NakamotoNodeState);
    const block = newBlock(state.tip, node.rng());
    state.registerBlock(block);
    node.log("Got poked, so I found a new block!");
    this.flooding.flood(node, block);
  }

  handlePeerSetUpdate(node: NodeInterface, update: PeerSetUpdate): void {
    switch (update.type) {
      case "peerAdded":
        this.flooding.floodPeerWith(
          node,
          update.peer,
          node.get(NakamotoNodeState).allBlocksSorted(),
        );
        return;
      case "peerRemoved":
        this.flooding.forgetPeer(node, update.peer);
        return;
    }
  }
}
