import { pendingMigrations } from '@stockroom/shared/src/db/migrate';

describe('pendingMigrations', () => {
     it('should list every migration file on a fresh database', async () => {
          await expect(pendingMigrations(new Set())).resolves.toEqual(['001_initial_schema.sql']);
     });

     it('should skip migrations already recorded', async () => {
          await expect(pendingMigrations(new Set(['001_initial_schema.sql']))).resolves.toEqual([]);
     });
});
