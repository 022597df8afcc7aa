import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { loadConfigFromDotenv } from "./config.js";
import { describeError } from "./errors.js";
import { KNOWLEDGE_CATEGORIES } from "./knowledge/types.js";
import { log } from "./logger.js";
import { createSupportService } from "./service.js";
import type { SupportStore } from "./store/types.js";

// ── Seed: sample accounts and knowledge base ────────────

const DEFAULT_SEED_PATH = fileURLToPath(new URL("../data/seed.json", import.meta.url));

const isoDay = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

const subscriptionSeed = z.object({
  plan: z.enum(["free", "starter", "professional", "enterprise"]),
  status: z.enum(["active", "trial", "past_due", "cancelled", "paused"]),
  billingCycle: z.enum(["monthly", "yearly"]),
  price: z.number().nonnegative(),
  seats: z.number().int().positive(),
  startDate: isoDay,
  endDate: isoDay.nullable(),
  trialEndDate: isoDay.nullable(),
  features: z.array(z.string()),
});

const invoiceSeed = z.object({
  invoiceNumber: z.string().min(1),
  status: z.enum(["draft", "pending", "paid", "overdue", "cancelled", "refunded"]),
  amount: z.number(),
  tax: z.number(),
  total: z.number(),
  currency: z.string().length(3),
  dueDate: isoDay,
  paidDate: isoDay.nullable(),
  description: z.string(),
});

const customerSeed = z.object({
  email: z.string().email(),
  firstName: z.string(),
  lastName: z.string(),
  companyName: z.string(),
  phone: z.string(),
  isActive: z.boolean(),
  subscriptions: z.array(subscriptionSeed),
  invoices: z.array(invoiceSeed),
});

export const seedFileSchema = z.object({
  customers: z.array(customerSeed),
  knowledge: z.array(
    z.object({
      id: z.string().min(1),
      title: z.string().min(1),
      content: z.string().min(1),
      category: z.enum(KNOWLEDGE_CATEGORIES),
      active: z.boolean(),
    }),
  ),
});

export type SeedFile = z.infer<typeof seedFileSchema>;

export function readSeedFile(path: string = DEFAULT_SEED_PATH): SeedFile {
  return seedFileSchema.parse(JSON.parse(readFileSync(path, "utf-8")));
}

/** Insert customers not already present. Returns how many were added. */
export async function seedAccounts(
  store: SupportStore,
  customers: SeedFile["customers"],
): Promise<number> {
  let added = 0;
  for (const { subscriptions, invoices, ...profile } of customers) {
    if (await store.findCustomer(profile.email)) {
      log.info({ email: profile.email }, "  ⏭️ Customer exists");
      continue;
    }

    const customer = await store.insertCustomer(profile);
    for (const s of subscriptions) {
      await store.insertSubscription({ ...s, customerId: customer.id });
    }
    for (const inv of invoices) {
      await store.insertInvoice({ ...inv, customerId: customer.id });
    }
    added++;
    log.info(
      {
        email: customer.email,
        subscriptions: subscriptions.length,
        invoices: invoices.length,
      },
      "  👤 Customer seeded",
    );
  }
  return added;
}

async function main() {
  const config = loadConfigFromDotenv();
  const seed = readSeedFile(process.argv[2]);
  const service = createSupportService(config);

  try {
    const customers = await seedAccounts(service.store, seed.customers);
    const documents = await service.knowledge.addDocuments(seed.knowledge);
    log.info({ customers, documents }, "🌱 Seed complete");
  } finally {
    await service.close();
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    log.fatal({ error: describeError(error) }, "💀 Seed failed");
    process.exit(1);
  });
}
