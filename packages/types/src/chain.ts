/**
 * Chain Types
 *
 * Public representations of Bitcoin blocks and transactions as served
 * by the explorer API.
 *
 * Rules:
 * - Field names follow the node's verbose decode (getblock / getrawtransaction)
 * - Values are taken verbatim from the node, never recomputed
 * - All types are immutable (readonly)
 */

/**
 * Block hash: 64 lowercase hex characters (32 bytes, big-endian display order).
 */
export type BlockHash = string;

/**
 * Transaction identifier. Same shape as a block hash, different domain.
 */
export type TxId = string;

/**
 * Non-negative block height.
 */
export type BlockHeight = number;

// =============================================================================
// Block
// =============================================================================

/**
 * A block as decoded by the node at verbosity 1.
 */
export interface Block {
  readonly hash: BlockHash;
  readonly height: BlockHeight;

  /** Absent for the genesis block */
  readonly previousblockhash?: BlockHash | undefined;

  /** Absent while this block is the tip */
  readonly nextblockhash?: BlockHash | undefined;

  /** Confirmations at the time the node answered (-1 if off the main chain) */
  readonly confirmations: number;

  /** Block timestamp (UNIX seconds) */
  readonly time: number;
  readonly mediantime?: number | undefined;

  /** Number of transactions */
  readonly nTx: number;

  /** Included transaction ids, coinbase first */
  readonly tx: readonly TxId[];

  readonly size: number;
  readonly strippedsize?: number | undefined;
  readonly weight: number;

  readonly difficulty: number;
  readonly nonce: number;
  readonly bits: string;
  readonly merkleroot: string;
  readonly version: number;
  readonly versionHex?: string | undefined;
  readonly chainwork?: string | undefined;
}

// =============================================================================
// Transaction
// =============================================================================

export interface ScriptSig {
  readonly asm: string;
  readonly hex: string;
}

/**
 * Input of a coinbase transaction. Spends no prior output.
 */
export interface CoinbaseInput {
  readonly coinbase: string;
  readonly txinwitness?: readonly string[] | undefined;
  readonly sequence: number;
}

/**
 * Input spending a prior output, referenced by txid + output index.
 */
export interface PrevoutInput {
  readonly txid: TxId;
  readonly vout: number;
  readonly scriptSig: ScriptSig;
  readonly txinwitness?: readonly string[] | undefined;
  readonly sequence: number;
}

export type TxInput = CoinbaseInput | PrevoutInput;

export interface ScriptPubKey {
  readonly asm: string;
  readonly hex: string;
  readonly type: string;

  /** Destination address, when the script has one */
  readonly address?: string | undefined;

  /** Destination list as reported by nodes before v22 */
  readonly addresses?: readonly string[] | undefined;
  readonly desc?: string | undefined;
}

export interface TxOutput {
  /** Value in BTC, as reported by the node */
  readonly value: number;
  readonly n: number;
  readonly scriptPubKey: ScriptPubKey;
}

/**
 * Where a transaction stands relative to the chain.
 */
export type ConfirmationStatus =
  | {
      readonly confirmed: true;
      readonly blockHash: BlockHash;
      readonly blockHeight: BlockHeight;
      readonly blockTime?: number | undefined;
    }
  | { readonly confirmed: false };

export interface Transaction {
  readonly txid: TxId;

  /** Witness transaction id (equals txid for non-segwit transactions) */
  readonly hash: string;

  readonly version: number;
  readonly size: number;
  readonly vsize: number;
  readonly weight: number;
  readonly locktime: number;
  readonly vin: readonly TxInput[];
  readonly vout: readonly TxOutput[];

  /** Serialized transaction */
  readonly hex: string;

  /** Fee in BTC, present only when the node can derive it */
  readonly fee?: number | undefined;

  readonly status: ConfirmationStatus;
}

// =============================================================================
// Latest Blocks
// =============================================================================

/**
 * The most recent blocks, newest first, as of a single height read.
 */
export type LatestBlocksResult = readonly Block[];
