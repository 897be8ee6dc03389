import type pg from 'pg'
import { getAddress, type Hex } from 'viem'
import type { Address, ClaimPath, ClaimReservation, ClaimStore, UnconfirmedPayout } from '@dualdrop/claim-core'

/** The slice of a pg client the claim store uses. */
export interface SqlClient {
  query<R extends pg.QueryResultRow = pg.QueryResultRow>(text: string, values?: unknown[]): Promise<pg.QueryResult<R>>
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlClient & { release(err?: Error | boolean): void }>
}

/**
 * Claim record and kill switch in Postgres, scoped by airdrop instance.
 *
 * A reservation is an open transaction holding the inserted claim row: a
 * concurrent reservation of the same identity blocks on the row until this
 * one commits (and then sees the conflict) or rolls back.
 */
export class PgClaimStore implements ClaimStore {
  private readonly airdropId: string
  // Identities reserved by this process whose transaction is still open
  private readonly pending = new Set<Address>()

  constructor(
    private readonly pool: SqlPool,
    airdrop: Address,
  ) {
    this.airdropId = getAddress(airdrop)
  }

  async isClaimed(identity: Address): Promise<boolean> {
    const key = getAddress(identity)
    if (this.pending.has(key)) return true
    const { rowCount } = await this.pool.query(
      `SELECT 1 FROM airdrop_claims WHERE airdrop_id = $1 AND claimant = $2`,
      [this.airdropId, key],
    )
    return (rowCount ?? 0) > 0
  }

  async reserve(identity: Address, path: ClaimPath): Promise<ClaimReservation | null> {
    const key = getAddress(identity)
    if (this.pending.has(key)) return null

    const client = await this.pool.connect()
    try {
      await client.query('BEGIN')
      const { rowCount } = await client.query(
        `INSERT INTO airdrop_claims (airdrop_id, claimant, path)
         VALUES ($1, $2, $3)
         ON CONFLICT (airdrop_id, claimant) DO NOTHING`,
        [this.airdropId, key, path],
      )
      if ((rowCount ?? 0) === 0) {
        await client.query('ROLLBACK')
        client.release()
        return null
      }
    } catch (err) {
      // Dropping the connection aborts the transaction
      client.release(err instanceof Error ? err : true)
      throw err
    }

    this.pending.add(key)
    let settled = false
    const finish = async (statement: 'COMMIT' | 'ROLLBACK', unconfirmedTx?: Hex) => {
      if (settled) throw new Error(`Reservation for ${key} already settled`)
      settled = true
      try {
        if (unconfirmedTx) {
          await client.query(
            `UPDATE airdrop_claims SET payout_tx = $3, payout_confirmed = FALSE
             WHERE airdrop_id = $1 AND claimant = $2`,
            [this.airdropId, key, unconfirmedTx],
          )
        }
        await client.query(statement)
        client.release()
      } catch (err) {
        client.release(err instanceof Error ? err : true)
        throw err
      } finally {
        this.pending.delete(key)
      }
    }

    return {
      commit: (unconfirmedTx) => finish('COMMIT', unconfirmedTx),
      rollback: () => finish('ROLLBACK'),
    }
  }

  async unconfirmedPayouts(): Promise<UnconfirmedPayout[]> {
    const { rows } = await this.pool.query<{ claimant: string; payout_tx: Hex }>(
      `SELECT claimant, payout_tx FROM airdrop_claims
       WHERE airdrop_id = $1 AND NOT payout_confirmed
       ORDER BY claimed_at`,
      [this.airdropId],
    )
    return rows.map((row) => ({ identity: getAddress(row.claimant), txHash: row.payout_tx }))
  }

  async isSignatureVerificationDisabled(): Promise<boolean> {
    const { rows } = await this.pool.query<{ signatures_disabled: boolean }>(
      `SELECT signatures_disabled FROM airdrop_switches WHERE airdrop_id = $1`,
      [this.airdropId],
    )
    return rows[0]?.signatures_disabled === true
  }

  async disableSignatureVerification(): Promise<void> {
    await this.pool.query(
      `INSERT INTO airdrop_switches (airdrop_id, signatures_disabled, disabled_at)
       VALUES ($1, TRUE, NOW())
       ON CONFLICT (airdrop_id) DO UPDATE
         SET signatures_disabled = TRUE,
             disabled_at = COALESCE(airdrop_switches.disabled_at, EXCLUDED.disabled_at)`,
      [this.airdropId],
    )
  }

  /** Readiness check: the database answers a trivial query. */
  async ping(): Promise<boolean> {
    await this.pool.query('SELECT 1')
    return true
  }
}
