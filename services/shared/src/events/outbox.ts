import { PoolClient } from 'pg';
import { StocktakeEventType } from '../types/stocktake.types';

/**
 * Queue a domain event in the same transaction as the state change it
 * describes. The event dispatcher publishes it once the transaction commits.
 */
export async function recordDomainEvent(
     client: PoolClient,
     type: StocktakeEventType,
     payload: Record<string, unknown>
): Promise<void> {
     await client.query(
          `
      INSERT INTO domain_event (type, payload)
      VALUES ($1, $2::jsonb)
    `,
          [type, JSON.stringify({ ...payload, timestamp: new Date().toISOString() })]
     );
}
