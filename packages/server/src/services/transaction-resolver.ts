/**
 * Transaction Resolver: txid → public Transaction.
 *
 * Lookup sequence:
 * 1. Validate the txid (same rule as block hashes)
 * 2. getrawtransaction, verbose
 * 3. getblockheader for the containing block, when confirmed
 * 4. Optionally re-derive the txid from the returned hex
 *
 * The endpoint contract has a single failure answer: 500 with
 * "Failed to retrieve transaction information", malformed ids included.
 */

import { Transaction as RawTransaction } from "bitcoinjs-lib";
import type { ConfirmationStatus, Transaction, TxId } from "@btc-lens/types";
import { parseTxId } from "@btc-lens/types";
import { RpcError } from "@btc-lens/bitcoin-rpc";
import type { BitcoinNode, NodeTransaction } from "@btc-lens/bitcoin-rpc";
import { ApiError, TRANSACTION_LOOKUP_FAILED } from "../types/error.js";
import { toUpstreamError } from "./upstream.js";

export interface TransactionResolverOptions {
  /** Re-derive the txid from the serialized transaction. Default: true */
  readonly verifyTxid?: boolean | undefined;
}

/**
 * Hash the serialized transaction (witness data excluded) and compare
 * with the id that was asked for.
 *
 * @throws {RpcError} DECODE when the hex does not parse or hashes to another id
 */
export function assertTxidMatches(requested: TxId, raw: NodeTransaction): void {
  let derived: string;
  try {
    derived = RawTransaction.fromHex(raw.hex).getId();
  } catch (error) {
    throw new RpcError("DECODE", `Unparseable transaction hex for ${requested}`, {
      method: "getrawtransaction",
      cause: error,
    });
  }

  if (derived !== requested || raw.txid !== requested) {
    throw new RpcError(
      "DECODE",
      `Transaction ${requested} answered with txid ${raw.txid} (hex hashes to ${derived})`,
      { method: "getrawtransaction" },
    );
  }
}

export function toTransaction(raw: NodeTransaction, status: ConfirmationStatus): Transaction {
  return {
    txid: raw.txid,
    hash: raw.hash,
    version: raw.version,
    size: raw.size,
    vsize: raw.vsize,
    weight: raw.weight,
    locktime: raw.locktime,
    vin: raw.vin,
    vout: raw.vout,
    hex: raw.hex,
    fee: raw.fee,
    status,
  };
}

export class TransactionResolver {
  private readonly node: BitcoinNode;
  private readonly verifyTxid: boolean;

  constructor(node: BitcoinNode, options: TransactionResolverOptions = {}) {
    this.node = node;
    this.verifyTxid = options.verifyTxid ?? true;
  }

  /**
   * @throws {ApiError} 500 with the transaction endpoint's fixed message
   */
  async resolve(rawTxId: string): Promise<Transaction> {
    const txid = parseTxId(rawTxId);
    if (txid === undefined) {
      throw new ApiError("INVALID_INPUT", TRANSACTION_LOOKUP_FAILED, { status: 500 });
    }

    try {
      const raw = await this.node.getRawTransaction(txid);
      if (this.verifyTxid) {
        assertTxidMatches(txid, raw);
      }
      const status = await this.confirmationStatus(raw);
      return toTransaction(raw, status);
    } catch (error) {
      throw toUpstreamError(error, TRANSACTION_LOOKUP_FAILED);
    }
  }

  private async confirmationStatus(raw: NodeTransaction): Promise<ConfirmationStatus> {
    if (raw.blockhash === undefined) {
      return { confirmed: false };
    }

    const header = await this.node.getBlockHeader(raw.blockhash);
    return {
      confirmed: true,
      blockHash: header.hash,
      blockHeight: header.height,
      blockTime: raw.blocktime,
    };
  }
}
