/**
 * Development seed: one user per role and a few pharmacies.
 */

import 'dotenv/config';
import { Pool } from 'pg';
import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { USER_ROLES } from '../domain-types';
import { loadConfig } from '../config';

const seedSchema = z.object({
  users: z.array(
    z.object({
      userId: z.string().uuid(),
      username: z.string().min(1),
      email: z.string().email(),
      role: z.enum(USER_ROLES),
    })
  ),
  pharmacies: z.array(
    z.object({
      pharmacyId: z.string().uuid(),
      name: z.string().min(1),
      address: z.string().min(1),
      city: z.string().min(1),
    })
  ),
});

async function seed() {
  const config = loadConfig();
  const data = seedSchema.parse(JSON.parse(readFileSync(join(__dirname, '../../db/seed-data.json'), 'utf-8')));
  const pool = new Pool({ connectionString: config.databaseUrl });

  try {
    for (const user of data.users) {
      await pool.query(
        `INSERT INTO users (user_id, username, email, role, is_active)
         VALUES ($1, $2, $3, $4, TRUE)
         ON CONFLICT (user_id) DO NOTHING`,
        [user.userId, user.username, user.email, user.role]
      );
      console.log(`[Seed] ${user.role.padEnd(16)} ${user.userId} (${user.username})`);
    }

    for (const pharmacy of data.pharmacies) {
      await pool.query(
        `INSERT INTO pharmacies (pharmacy_id, name, address, city)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (pharmacy_id) DO NOTHING`,
        [pharmacy.pharmacyId, pharmacy.name, pharmacy.address, pharmacy.city]
      );
      console.log(`[Seed] Pharmacy ${pharmacy.pharmacyId} ${pharmacy.name}, ${pharmacy.city}`);
    }

    console.log('[Seed] Done. Next step: npm run dev');
  } finally {
    await pool.end();
  }
}

seed()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    console.error('[Seed] Failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
