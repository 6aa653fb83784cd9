// demo-runner.ts
// Walks one vendor through a full cycle on a local SQLite file:
// price -> sale (pending) -> refund -> escrow release -> payout attempts.

import fs from "fs";
import path from "path";
import {
  closeDatabase,
  fixedClock,
  getAuditTrail,
  isFinanceError,
  loadPolicyFromEnv,
  openFinanceCore,
} from "./src/index";
import type { VendorWallet } from "./src/index";

const DB_PATH = path.join(__dirname, "data", "finance-demo.sqlite");
const VENDOR = "vendor-demo";
const ORDER = "order-1001";

// =====================================================
// Alignment helpers
// =====================================================
const WIDTH = 60;

function line(char = "─") {
  console.log(char.repeat(WIDTH));
}

function box(titleLines: string[]) {
  console.log("╔" + "═".repeat(WIDTH - 2) + "╗");
  for (const l of titleLines) {
    console.log(`║ ${l.padEnd(WIDTH - 4, " ")} ║`);
  }
  console.log("╚" + "═".repeat(WIDTH - 2) + "╝");
}

function section(title: string) {
  console.log();
  line();
  console.log(title);
  line();
  console.log();
}

function setup(msg: string) {
  console.log(`[SETUP] ${msg}`);
}

function ok(msg: string) {
  console.log(`  ✓ ${msg}`);
}

function notice(msg: string) {
  console.log(`[NOTICE] ${msg}\n`);
}

function printWallet(wallet: VendorWallet) {
  console.log(`  pending:   ${wallet.pendingBalance.toFixed(2)}`);
  console.log(`  available: ${wallet.availableBalance.toFixed(2)}`);
  console.log(`  earnings:  ${wallet.lifetimeEarnings.toFixed(2)}`);
  console.log(`  payouts:   ${wallet.lifetimePayouts.toFixed(2)}`);
  console.log(`  version:   ${wallet.version}`);
}

async function runDemo() {
  console.log();
  box(["MARKETPLACE FINANCE CORE - FULL DEMO", "Pricing, escrow, ledger and payouts"]);

  section("SETUP");

  setup("Removing previous demo database...");
  fs.rmSync(DB_PATH, { force: true });
  fs.mkdirSync(path.dirname(DB_PATH), { recursive: true });
  ok("Fresh start");

  const clock = fixedClock("2026-09-01T10:00:00.000Z");
  setup("Opening SQLite database...");
  const { core, db } = await openFinanceCore(DB_PATH, { policy: loadPolicyFromEnv(), clock });
  ok(`Database ready at ${DB_PATH}`);

  try {
    await core.provisionWallet(VENDOR);
    ok(`Wallet provisioned for ${VENDOR}`);

    section("PRICE: cooperative-backed vendor, 2 x hand-woven rug");
    const breakdown = core.calculatePrice({
      basePrice: 500,
      categoryId: "home-decor-textiles",
      isVatRegistered: false,
      isLegalized: false,
      parentUplift: { kind: "percentage", value: "0.05" },
    });
    console.log(`  A vendor revenue:   ${breakdown.bucketA.toFixed(2)}`);
    console.log(`  B vendor VAT:       ${breakdown.bucketB.toFixed(2)}`);
    console.log(`  C platform revenue: ${breakdown.bucketC.toFixed(2)}`);
    console.log(`  D platform VAT:     ${breakdown.bucketD.toFixed(2)}`);
    console.log(`  final price:        ${breakdown.finalPrice.toFixed(2)}`);
    console.log(`  display price:      ${core.roundToFriendlyPrice(breakdown.finalPrice).toFixed(2)}`);

    const deviation = core.checkDeviation(breakdown.finalPrice, 640);
    console.log(
      `  vs benchmark 640:   ${deviation.deviationPercent.times(100).toFixed(2)}% (${deviation.direction})`
    );

    const shipping = core.calculateShippingFee({ actualWeightKg: 4, lengthCm: 60, widthCm: 40, heightCm: 15 });
    console.log(`  shipping:           ${shipping.customerFee.toFixed(2)} (subsidy ${shipping.platformSubsidy.toFixed(2)})`);

    section("SALE");
    await core.recordSale(VENDOR, { orderId: ORDER, lineItemId: "rug", quantity: 2, breakdown });
    ok("Sale recorded as pending");
    await core.recordSale(VENDOR, { orderId: ORDER, lineItemId: "rug", quantity: 2, breakdown });
    ok("Duplicate submission replayed, wallet unchanged");
    printWallet(await core.getWallet(VENDOR));

    section("PARTIAL REFUND");
    await core.refundPending(VENDOR, ORDER, 50, "Colour differs from listing");
    ok("Refunded 50.00 from held funds");

    section("ESCROW");
    const deliveredAt = "2026-09-03T10:00:00.000Z";
    clock.set("2026-09-10T10:00:00.000Z");
    const early = core.computeRelease(deliveredAt);
    notice(`Release on ${early.releaseDate.toISOString()} (${early.daysRemaining} days left)`);
    try {
      await core.releaseEscrow(VENDOR, ORDER, deliveredAt);
    } catch (err) {
      if (!isFinanceError(err)) throw err;
      ok(`Release refused: ${err.code}`);
    }

    clock.set("2026-09-17T10:00:00.000Z");
    const released = await core.releaseEscrow(VENDOR, ORDER, deliveredAt);
    ok(`Released ${released.length} entries`);
    printWallet(await core.getWallet(VENDOR));

    section("PAYOUT");
    for (const amount of [100, 5000, 500]) {
      try {
        const entry = await core.payout(VENDOR, amount);
        ok(`${entry.description} (${entry.id})`);
      } catch (err) {
        if (!isFinanceError(err)) throw err;
        console.log(`  ✗ ${amount}: ${err.code} - ${err.message}`);
      }
    }
    printWallet(await core.getWallet(VENDOR));

    console.log();
    box(["LEDGER"]);
    for (const entry of await core.ledgerFor(VENDOR)) {
      console.log(
        `  ${entry.createdAt.toISOString()}  ${entry.balanceStatus.padEnd(9)} ${entry.vendorAmount
          .toFixed(2)
          .padStart(10)}  ${entry.description}`
      );
    }

    const trail = await getAuditTrail(db, VENDOR);
    console.log();
    box([`AUDIT TRAIL: ${trail.length} event(s)`]);
    for (const event of trail) console.log(`  [${event.type}] ${event.message}`);
    console.log();
  } finally {
    await closeDatabase(db);
  }
}

runDemo().catch((err) => {
  console.error("[FATAL ERROR]", err);
  process.exit(1);
});
