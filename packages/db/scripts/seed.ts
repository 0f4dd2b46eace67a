import 'dotenv/config'
import { eq } from 'drizzle-orm'
import {
  accessories,
  accessoryUsers,
  assetModels,
  assets,
  categories,
  createDatabase,
  licenseSeats,
  licenses,
  locations,
  manufacturers,
  statusLabels,
  users,
} from '../src/index.js'

const SEED_ACTOR = 'seed'

const SEEDED_TAGS = ['LAPTOP-0001', 'LAPTOP-0002', 'DOCK-0001'] as const

/**
 * Loads a small demo inventory: two people, two locations, three assets,
 * one five-seat license and a stock of chargers. Running it twice is a
 * no-op once the first tag exists.
 */
async function seed() {
  const { db, pool } = createDatabase(process.env.DATABASE_URL ?? '')
  try {
    const existing = await db.query.assets.findFirst({
      where: eq(assets.tag, SEEDED_TAGS[0]),
    })
    if (existing) {
      console.log('[db] seed data already present, skipping.')
      return
    }

    const stamp = { createdBy: SEED_ACTOR, updatedBy: SEED_ACTOR }

    const [headOffice, storeRoom] = await db
      .insert(locations)
      .values([
        { name: 'Head Office', city: 'Lyon', country: 'FR', ...stamp },
        { name: 'IT Store Room', city: 'Lyon', country: 'FR', ...stamp },
      ])
      .returning()

    const [alice, bruno] = await db
      .insert(users)
      .values([
        { username: 'alice', firstName: 'Alice', lastName: 'Martin', name: 'Alice Martin', locationId: headOffice.id, ...stamp },
        { username: 'bruno', firstName: 'Bruno', lastName: 'Petit', name: 'Bruno Petit', locationId: headOffice.id, ...stamp },
      ])
      .returning()

    const [ready] = await db
      .insert(statusLabels)
      .values([
        { name: 'Ready to deploy', deployable: true, ...stamp },
        { name: 'In repair', pending: true, ...stamp },
      ])
      .returning()

    const [lenovo] = await db.insert(manufacturers).values({ name: 'Lenovo', ...stamp }).returning()
    const [laptops, office, peripherals] = await db
      .insert(categories)
      .values([
        { name: 'Laptops', categoryType: 'asset', ...stamp },
        { name: 'Office suites', categoryType: 'license', ...stamp },
        { name: 'Peripherals', categoryType: 'accessory', ...stamp },
      ])
      .returning()

    const [t14] = await db
      .insert(assetModels)
      .values({ name: 'ThinkPad T14', modelNumber: '21AH', manufacturerId: lenovo.id, categoryId: laptops.id, ...stamp })
      .returning()

    const now = new Date()
    await db.insert(assets).values([
      {
        tag: SEEDED_TAGS[0],
        name: 'Alice laptop',
        modelId: t14.id,
        statusId: ready.id,
        locationId: headOffice.id,
        defaultLocationId: storeRoom.id,
        assignedType: 'user',
        assignedTo: alice.id,
        assignedAt: now,
        custodianUserId: alice.id,
        checkoutCounter: 1,
        ...stamp,
      },
      { tag: SEEDED_TAGS[1], name: 'Spare laptop', modelId: t14.id, statusId: ready.id, locationId: storeRoom.id, ...stamp },
      { tag: SEEDED_TAGS[2], name: 'USB-C dock', statusId: ready.id, locationId: storeRoom.id, ...stamp },
    ])

    const [suite] = await db
      .insert(licenses)
      .values({ name: 'Office Suite', serial: 'TEST-KEY-0000', seats: 5, reassignable: true, categoryId: office.id, manufacturerId: lenovo.id, ...stamp })
      .returning()

    await db.insert(licenseSeats).values([
      { licenseId: suite.id, assignedToUser: bruno.id, custodianUserId: bruno.id, assignedAt: now, ...stamp },
      ...Array.from({ length: 4 }, () => ({ licenseId: suite.id, ...stamp })),
    ])

    const [chargers] = await db
      .insert(accessories)
      .values({ name: 'USB-C CHARGER', categoryId: peripherals.id, locationId: storeRoom.id, qty: 10, minAmt: 2, ...stamp })
      .returning()

    await db.insert(accessoryUsers).values({ accessoryId: chargers.id, assignedTo: alice.id, assignedAt: now, ...stamp })

    console.log(`[db] seeded ${SEEDED_TAGS.length} assets, license "${suite.name}" (5 seats) and accessory "${chargers.name}".`)
  } finally {
    await pool.end()
  }
}

seed().catch((error) => {
  console.error('[db] failed to seed inventory:', error)
  process.exit(1)
})
