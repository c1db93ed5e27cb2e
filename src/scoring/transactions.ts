/**
 * Transaction loader — validates raw lending-protocol records and groups the
 * survivors by wallet, oldest first.
 *
 * A bad record is dropped and counted by reason; only a document that is not
 * a record collection at all aborts the run.
 */
import fs from 'node:fs'
import { z } from 'zod'
import { DATA_CONFIG } from '../config/constants.js'
import { ErrorCodes } from '../errors.js'
import { log } from '../logger.js'
import type { ActionKind, DropReason, LoadedTransactions, StageOutcome, Transaction } from '../types.js'

// ── Record schema ───────────────────────────────────────────────────────────

const ACTION_ALIASES = new Map<string, ActionKind>([
  ['deposit', 'deposit'],
  ['borrow', 'borrow'],
  ['repay', 'repay'],
  ['redeemunderlying', 'redeem'],
  ['redeem', 'redeem'],
  ['withdraw', 'redeem'],
  ['liquidationcall', 'liquidation'],
  ['liquidation', 'liquidation'],
])

const numeric = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite())

/** Optional metadata: absent and null both read as undefined. */
function optionalField<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined)
}

// Offset-less date-times are UTC, never host-local.
const LOCAL_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(:\d{2}(\.\d+)?)?)$/

function parseIsoSeconds(value: string): number {
  const local = LOCAL_DATE_TIME.exec(value)
  const iso = local ? `${local[1]}T${local[2]}Z` : value
  return Date.parse(iso) / 1000
}

const timestampSchema = z.union([z.number(), z.string().trim().min(1)]).transform((value, ctx) => {
  let seconds: number
  if (typeof value === 'number') {
    seconds = value
  } else if (/^\d+(\.\d+)?$/.test(value)) {
    seconds = Number(value)
  } else {
    seconds = parseIsoSeconds(value)
  }
  if (!Number.isFinite(seconds) || seconds < 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unparseable timestamp: ${value}` })
    return z.NEVER
  }
  return seconds
})

const actionDataSchema = z
  .object({
    amount: optionalField(numeric),
    assetSymbol: optionalField(z.string()),
    assetPriceUSD: optionalField(numeric),
    principalAmount: optionalField(numeric),
    principalReserveSymbol: optionalField(z.string()),
    borrowAssetPriceUSD: optionalField(numeric),
    collateralAmount: optionalField(numeric),
    collateralAssetPriceUSD: optionalField(numeric),
    userId: optionalField(z.string()),
    borrower: optionalField(z.string()),
  })
  .passthrough()

const rawRecordSchema = z
  .object({
    userWallet: z.string().trim().min(1),
    action: z.string().transform((value, ctx) => {
      const kind = ACTION_ALIASES.get(value.trim().toLowerCase())
      if (!kind) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown action: ${value}` })
        return z.NEVER
      }
      return kind
    }),
    timestamp: timestampSchema,
    txHash: optionalField(z.string()),
    actionData: actionDataSchema,
  })
  .transform((rec, ctx): Transaction => {
    const data = rec.actionData
    const isLiquidation = rec.action === 'liquidation'
    const amount = isLiquidation ? (data.principalAmount ?? data.amount) : data.amount
    if (amount === undefined || amount < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['actionData', 'amount'], message: 'Missing or negative amount' })
      return z.NEVER
    }

    const price = isLiquidation ? (data.borrowAssetPriceUSD ?? data.assetPriceUSD) : data.assetPriceUSD
    const asset = (isLiquidation ? (data.principalReserveSymbol ?? data.assetSymbol) : data.assetSymbol) ?? DATA_CONFIG.UNKNOWN_ASSET

    let collateralUsd: number | undefined
    let borrower: string | undefined
    if (isLiquidation) {
      if (data.collateralAmount !== undefined && data.collateralAssetPriceUSD !== undefined) {
        collateralUsd = Math.max(0, data.collateralAmount * data.collateralAssetPriceUSD)
      }
      borrower = (data.borrower ?? data.userId)?.trim().toLowerCase() || undefined
    }

    return {
      wallet: rec.userWallet.toLowerCase(),
      action: rec.action,
      asset,
      amount,
      valueUsd: price !== undefined && price > 0 ? amount * price : 0,
      timestamp: rec.timestamp,
      ...(rec.txHash ? { txHash: rec.txHash } : {}),
      ...(collateralUsd !== undefined ? { collateralUsd } : {}),
      ...(borrower ? { borrower } : {}),
    }
  })

const AMOUNT_FIELDS = new Set<string | number>(['amount', 'principalAmount'])

function dropReasonFor(error: z.ZodError): DropReason {
  const [field, nested] = error.issues[0]?.path ?? []
  switch (field) {
    case 'userWallet':
      return 'missing_wallet'
    case 'action':
      return 'unknown_action'
    case 'timestamp':
      return 'invalid_timestamp'
    case 'actionData':
      // A missing actionData object means a missing amount.
      return nested === undefined || AMOUNT_FIELDS.has(nested) ? 'invalid_amount' : 'invalid_metadata'
    default:
      return 'invalid_metadata'
  }
}

// ── Ordering ────────────────────────────────────────────────────────────────

/** Total order on a wallet's events so equal sets always sort the same way. */
export function compareTransactions(a: Transaction, b: Transaction): number {
  if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp
  const ha = a.txHash ?? ''
  const hb = b.txHash ?? ''
  if (ha !== hb) return ha < hb ? -1 : 1
  if (a.action !== b.action) return a.action < b.action ? -1 : 1
  if (a.asset !== b.asset) return a.asset < b.asset ? -1 : 1
  if (a.amount !== b.amount) return a.amount - b.amount
  return a.valueUsd - b.valueUsd
}

// ── Public API ──────────────────────────────────────────────────────────────

export function parseRecord(record: unknown): { ok: true; tx: Transaction } | { ok: false; reason: DropReason } {
  if (typeof record !== 'object' || record === null || Array.isArray(record)) {
    return { ok: false, reason: 'not_an_object' }
  }
  const parsed = rawRecordSchema.safeParse(record)
  if (!parsed.success) return { ok: false, reason: dropReasonFor(parsed.error) }
  return { ok: true, tx: parsed.data }
}

/**
 * Validate and group an already-parsed record collection.
 * Wallet groups come back sorted by address; events inside a group are
 * sorted by `compareTransactions`.
 */
export function loadTransactions(input: unknown): StageOutcome<LoadedTransactions> {
  if (!Array.isArray(input)) {
    return {
      status: 'fatal',
      stage: 'load',
      code: ErrorCodes.UNREADABLE_INPUT,
      message: 'Transaction log is not a collection of records',
    }
  }

  const byWallet = new Map<string, Transaction[]>()
  const dropReasons: Partial<Record<DropReason, number>> = {}
  let dropped = 0

  for (const record of input) {
    const result = parseRecord(record)
    if (!result.ok) {
      dropped++
      dropReasons[result.reason] = (dropReasons[result.reason] ?? 0) + 1
      continue
    }
    const list = byWallet.get(result.tx.wallet)
    if (list) list.push(result.tx)
    else byWallet.set(result.tx.wallet, [result.tx])
  }

  const groups = new Map<string, Transaction[]>()
  for (const wallet of [...byWallet.keys()].sort()) {
    const txs = byWallet.get(wallet) ?? []
    groups.set(wallet, txs.sort(compareTransactions))
  }

  const transactionsLoaded = input.length - dropped
  if (dropped > 0) {
    log.warn('loader', `Dropped ${dropped} malformed record(s)`, JSON.stringify(dropReasons))
  }
  log.info('loader', `Loaded ${transactionsLoaded} transactions for ${groups.size} wallets`)

  return {
    status: 'ok',
    value: { groups, recordsRead: input.length, transactionsLoaded, dropped, dropReasons },
  }
}

/** Read a JSON transaction log from disk. Missing files and bad JSON are fatal. */
export function readTransactionFile(filePath: string): StageOutcome<unknown> {
  let text: string
  try {
    text = fs.readFileSync(filePath, 'utf8')
  } catch (err) {
    log.error('loader', `Cannot read ${filePath}`, err)
    return {
      status: 'fatal',
      stage: 'load',
      code: ErrorCodes.UNREADABLE_INPUT,
      message: `Cannot read transaction log at ${filePath}`,
    }
  }

  try {
    const value: unknown = JSON.parse(text)
    return { status: 'ok', value }
  } catch (err) {
    log.error('loader', `Invalid JSON in ${filePath}`, err)
    return {
      status: 'fatal',
      stage: 'load',
      code: ErrorCodes.UNREADABLE_INPUT,
      message: `Transaction log at ${filePath} is not valid JSON`,
    }
  }
}
