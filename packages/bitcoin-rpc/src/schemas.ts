/**
 * Zod schemas for the node's JSON-RPC answers.
 *
 * Only the fields the explorer serves are declared; anything else the
 * node sends is stripped on parse.
 */

import { z } from "zod";

// =============================================================================
// JSON-RPC envelope
// =============================================================================

export const JsonRpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
});

export const JsonRpcResponseSchema = z.object({
  result: z.unknown(),
  error: JsonRpcErrorSchema.nullable().optional(),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
});

export type JsonRpcResponse = z.infer<typeof JsonRpcResponseSchema>;

// =============================================================================
// Chain queries
// =============================================================================

export const BlockCountSchema = z.number().int().min(0);

export const BlockHashSchema = z.string().regex(/^[0-9a-f]{64}$/);

export const NodeBlockSchema = z.object({
  hash: BlockHashSchema,
  confirmations: z.number().int(),
  height: z.number().int().min(0),
  version: z.number().int(),
  versionHex: z.string().optional(),
  merkleroot: z.string(),
  time: z.number().int(),
  mediantime: z.number().int().optional(),
  nonce: z.number().int(),
  bits: z.string(),
  difficulty: z.number(),
  chainwork: z.string().optional(),
  nTx: z.number().int().min(0),
  previousblockhash: BlockHashSchema.optional(),
  nextblockhash: BlockHashSchema.optional(),
  strippedsize: z.number().int().optional(),
  size: z.number().int(),
  weight: z.number().int(),
  tx: z.array(z.string()),
});

export type NodeBlock = z.infer<typeof NodeBlockSchema>;

export const NodeBlockHeaderSchema = z.object({
  hash: BlockHashSchema,
  confirmations: z.number().int(),
  height: z.number().int().min(0),
  time: z.number().int(),
  previousblockhash: BlockHashSchema.optional(),
  nextblockhash: BlockHashSchema.optional(),
});

export type NodeBlockHeader = z.infer<typeof NodeBlockHeaderSchema>;

// =============================================================================
// Transactions
// =============================================================================

const ScriptSigSchema = z.object({
  asm: z.string(),
  hex: z.string(),
});

const CoinbaseInputSchema = z.object({
  coinbase: z.string(),
  txinwitness: z.array(z.string()).optional(),
  sequence: z.number().int(),
});

const PrevoutInputSchema = z.object({
  txid: z.string(),
  vout: z.number().int().min(0),
  scriptSig: ScriptSigSchema,
  txinwitness: z.array(z.string()).optional(),
  sequence: z.number().int(),
});

const TxOutputSchema = z.object({
  value: z.number(),
  n: z.number().int().min(0),
  scriptPubKey: z.object({
    asm: z.string(),
    hex: z.string(),
    type: z.string(),
    address: z.string().optional(),
    // Nodes before v22 report destinations as a list
    addresses: z.array(z.string()).optional(),
    desc: z.string().optional(),
  }),
});

export const NodeTransactionSchema = z.object({
  txid: z.string(),
  hash: z.string(),
  version: z.number().int(),
  size: z.number().int(),
  vsize: z.number().int(),
  weight: z.number().int(),
  locktime: z.number().int(),
  vin: z.array(z.union([CoinbaseInputSchema, PrevoutInputSchema])),
  vout: z.array(TxOutputSchema),
  hex: z.string(),
  fee: z.number().optional(),
  blockhash: BlockHashSchema.optional(),
  confirmations: z.number().int().optional(),
  time: z.number().int().optional(),
  blocktime: z.number().int().optional(),
});

export type NodeTransaction = z.infer<typeof NodeTransactionSchema>;

// =============================================================================
// Node status
// =============================================================================

export const BlockchainInfoSchema = z.object({
  chain: z.string(),
  blocks: z.number().int().min(0),
  headers: z.number().int().min(0),
  bestblockhash: BlockHashSchema,
  initialblockdownload: z.boolean().optional(),
  verificationprogress: z.number().optional(),
});

export type BlockchainInfo = z.infer<typeof BlockchainInfoSchema>;
