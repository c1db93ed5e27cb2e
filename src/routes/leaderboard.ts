import { Hono } from 'hono'
import { LEADERBOARD_CONFIG } from '../config/constants.js'
import { countWalletScores, getLeaderboard } from '../db.js'
import { errorResponse, ErrorCodes } from '../errors.js'
import type { LeaderboardEntry, LeaderboardResponse } from '../types.js'

const leaderboard = new Hono()

// GET /v1/leaderboard?order=top|bottom&limit=n
leaderboard.get('/', (c) => {
  const order = c.req.query('order') ?? 'top'
  if (order !== 'top' && order !== 'bottom') {
    return c.json(errorResponse(ErrorCodes.INVALID_QUERY, 'order must be "top" or "bottom"'), 400)
  }

  const limitParam = c.req.query('limit')
  const limit = limitParam === undefined ? LEADERBOARD_CONFIG.DEFAULT_LIMIT : Number(limitParam)
  if (!Number.isInteger(limit) || limit < 1 || limit > LEADERBOARD_CONFIG.MAX_LIMIT) {
    return c.json(
      errorResponse(ErrorCodes.INVALID_QUERY, `limit must be an integer between 1 and ${LEADERBOARD_CONFIG.MAX_LIMIT}`),
      400,
    )
  }

  const rows = getLeaderboard(order, limit)
  const entries = rows.map((row, idx): LeaderboardEntry => ({
    rank: idx + 1,
    wallet: row.wallet,
    score: row.score,
    clusterLabel: row.cluster_label ?? 'noise',
  }))

  const response: LeaderboardResponse = {
    order,
    leaderboard: entries,
    totalWalletsScored: countWalletScores(),
    runId: rows[0]?.run_id ?? null,
  }
  return c.json(response)
})

export default leaderboard
