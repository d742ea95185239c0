import { pool, withTransaction } from './client';
import { logger } from '../utils/logger';

// One item per conversion family, plus a minerals item tagged to use the juice formula
const DEMO_ITEMS = [
     ['SPR-GIN-001', 'Dry Gin 70cl', 'SPIRITS', null, 20, null, null, 18.5, 6.5],
     ['SPR-WHI-001', 'Irish Whiskey 70cl', 'SPIRITS', null, 20, null, null, 24.0, 7.0],
     ['WIN-RED-001', 'House Red 75cl', 'WINE', null, 1, null, null, 7.8, 28.0],
     ['DRF-LAG-001', 'Lager 50L Keg', 'DRAFT', null, 88, null, null, 165.0, 6.2],
     ['BTL-BEE-001', 'Bottled Lager 330ml', 'BOTTLED', null, 1, 24, null, 26.4, 5.5],
     ['MIN-TON-001', 'Tonic Water 200ml', 'MINERAL', 'SOFT_DRINKS', 1, 24, null, 12.0, 3.0],
     ['MIN-ORA-001', 'Orange Juice 1L', 'MINERAL', 'JUICES', 1000, 12, 200, 21.6, 3.5],
     ['JUI-CRA-001', 'Cranberry Juice 1L', 'JUICE', null, 1000, 12, 200, 19.2, 3.5],
     ['SYR-GRE-001', 'Grenadine 70cl', 'SYRUP', null, 700, null, 35, 9.5, 1.0],
] as const;

async function seedDatabase() {
     try {
          logger.info('Seeding database with demo data');

          await withTransaction(async (client) => {
               const { rows: hotels } = await client.query<{ id: string }>(`
        INSERT INTO hotel (slug, name, currency, timezone)
        VALUES ('harbour-view', 'Harbour View Hotel', 'EUR', 'Europe/Dublin')
        ON CONFLICT (slug) DO UPDATE SET name = EXCLUDED.name
        RETURNING id
      `);
               const hotelId = hotels[0].id;

               for (const item of DEMO_ITEMS) {
                    await client.query(
                         `
          INSERT INTO stock_item (
            hotel_id, sku, name, category, subcategory,
            uom, units_per_case, serving_size_ml, unit_cost, menu_price
          ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
          ON CONFLICT (hotel_id, sku) DO NOTHING
        `,
                         [hotelId, ...item]
                    );
               }
               logger.info({ count: DEMO_ITEMS.length }, 'Inserted stock items');

               const { rows: periods } = await client.query<{ id: string }>(
                    `
        INSERT INTO stock_period (hotel_id, name, start_date, end_date)
        SELECT $1, to_char(date_trunc('month', CURRENT_DATE), 'FMMonth YYYY'),
               date_trunc('month', CURRENT_DATE)::date,
               (date_trunc('month', CURRENT_DATE) + INTERVAL '1 month - 1 day')::date
        WHERE NOT EXISTS (
          SELECT 1 FROM stock_period
          WHERE hotel_id = $1 AND start_date = date_trunc('month', CURRENT_DATE)::date
        )
        RETURNING id
      `,
                    [hotelId]
               );
               logger.info({ created: periods.length }, 'Ensured current period');

               // A few ledger movements so the expected quantities are not all zero
               await client.query(
                    `
        INSERT INTO stock_movement (hotel_id, item_id, movement_type, quantity, value, reference)
        SELECT i.hotel_id, i.id, m.movement_type, m.quantity, m.value, 'SEED'
        FROM stock_item i
        JOIN (VALUES
          ('SPR-GIN-001', 'PURCHASE', 120, 111.00),
          ('SPR-GIN-001', 'SALE', 86, 559.00),
          ('DRF-LAG-001', 'PURCHASE', 176, 330.00),
          ('DRF-LAG-001', 'SALE', 150, 930.00),
          ('DRF-LAG-001', 'WASTE', 4, 7.50)
        ) AS m(sku, movement_type, quantity, value) ON m.sku = i.sku
        WHERE i.hotel_id = $1
          AND NOT EXISTS (SELECT 1 FROM stock_movement WHERE reference = 'SEED')
      `,
                    [hotelId]
               );
               logger.info('Inserted ledger movements');
          });

          logger.info('Database seeding completed successfully');
     } catch (error) {
          logger.error({ error }, 'Seeding failed');
          throw error;
     } finally {
          await pool.end();
     }
}

// Run if executed directly
if (require.main === module) {
     seedDatabase().catch(() => {
          process.exit(1);
     });
}

export { seedDatabase };
