import vehicles from '../data/vehicles.json';
import { DatabaseService } from '../services/database.service';
import { pool } from './database';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

async function seed() {
  const store = new DatabaseService();

  for (const vehicle of vehicles) {
    await store.put('vehicles', vehicle.id, vehicle);
  }

  logger.info('Vehicle inventory seeded', { count: vehicles.length });
  await pool.end();
}

seed().catch((err) => {
  logger.error('Seed failed', { error: errorMessage(err) });
  process.exit(1);
});
