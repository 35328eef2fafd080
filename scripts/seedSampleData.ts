import { subDays } from 'date-fns';
import { loadConfig } from '../src/config';
import { createStorage } from '../src/storage';
import { Storage } from '../src/storage/storage';
import { StoreResult } from '../src/storage/errors';
import { Medicine } from '../src/storage/records';
import { toLocalDateTime } from '../src/utils/time.utils';

const USERNAME = process.env.SEED_USERNAME || 'demo';
const EMAIL = process.env.SEED_EMAIL || 'demo@medicate.local';
const PASSWORD = process.env.SEED_PASSWORD || 'demo-password';

function unwrap<T>(result: StoreResult<T>, step: string): T {
  if (!result.success) throw new Error(`${step}: ${result.error.kind} ${result.error.message}`);
  return result.data;
}

async function seed(storage: Storage) {
  const existing = await storage.getUserByEmail(EMAIL);
  if (existing.success) {
    console.log(`Sample user ${EMAIL} already exists; nothing to do`);
    return;
  }

  const user = unwrap(await storage.registerUser(USERNAME, EMAIL, PASSWORD), 'register');
  unwrap(await storage.activateUser(user.id), 'activate');
  unwrap(await storage.grantAdmin(user.id), 'grant admin');

  const medicines = [
    { name: 'Metformin', dose: 500, unit: 'mg', stock: 56 },
    { name: 'Lisinopril', dose: 10, unit: 'mg', stock: 8 },
    { name: 'Vitamin D', dose: 25, unit: 'mcg', stock: 90 },
  ];
  const created: Medicine[] = [];
  for (const medicine of medicines) created.push(unwrap(await storage.createMedicine(user.id, medicine), 'medicine'));
  const [metformin, lisinopril, vitaminD] = created;

  unwrap(await storage.createSchedule(user.id, { medicineId: metformin.id, time: '08:00', amount: 1, daysOfWeek: [] }), 'schedule');
  unwrap(await storage.createSchedule(user.id, { medicineId: metformin.id, time: '20:00', amount: 1, daysOfWeek: [] }), 'schedule');
  unwrap(await storage.createSchedule(user.id, { medicineId: lisinopril.id, time: '08:00', amount: 1, daysOfWeek: [] }), 'schedule');
  unwrap(
    await storage.createSchedule(user.id, { medicineId: vitaminD.id, time: '12:00', amount: 1, daysOfWeek: ['MO', 'WE', 'FR'] }),
    'schedule'
  );

  // A week of mostly-kept morning doses
  for (let back = 1; back <= 7; back++) {
    const day = subDays(new Date(), back);
    day.setHours(8, 5, 0, 0);
    unwrap(await storage.createDosageHistory(user.id, metformin.id, 1, '08:00', toLocalDateTime(day)), 'dose');
    if (back % 3 !== 0) {
      unwrap(await storage.createDosageHistory(user.id, lisinopril.id, 1, '08:00', toLocalDateTime(day)), 'dose');
    }
  }

  console.log(`Seeded ${USERNAME} <${EMAIL}> with ${created.length} medicines`);
}

async function main() {
  const storage = createStorage(loadConfig());
  try {
    await seed(storage);
  } finally {
    await storage.close();
  }
}

main().catch((err: unknown) => {
  console.error('Seeding failed', err);
  process.exit(1);
});
