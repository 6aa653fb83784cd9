import type { ZodError } from "zod";

export type ErrorCategory = "validation" | "policy" | "invariant";

export type FinanceErrorCode =
  | "INVALID_PRICING_INPUT"
  | "INVALID_BENCHMARK"
  | "INVALID_LEDGER_ENTRY"
  | "INVALID_PAYOUT_AMOUNT"
  | "INVALID_SHIPPING_INPUT"
  | "INVALID_POLICY_CONFIG"
  | "WALLET_NOT_FOUND"
  | "BELOW_MINIMUM_THRESHOLD"
  | "INSUFFICIENT_BALANCE"
  | "ESCROW_HOLD_ACTIVE"
  | "NEGATIVE_BALANCE_VIOLATION"
  | "ACCOUNTING_IDENTITY_VIOLATION"
  | "CONCURRENCY_CONFLICT";

export interface ValidationIssue {
  path: string[];
  message: string;
}

export class FinanceError extends Error {
  readonly code: FinanceErrorCode;
  readonly category: ErrorCategory;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: FinanceErrorCode,
    category: ErrorCategory,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.category = category;
    this.details = details;
  }
}

export function isFinanceError(value: unknown): value is FinanceError {
  return value instanceof FinanceError;
}

export function issuesFromZod(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String),
    message: issue.message,
  }));
}

function describeIssues(issues: readonly ValidationIssue[]): string {
  return issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

/* =========================
   VALIDATION
========================= */

export class ValidationFailure extends FinanceError {
  readonly issues: ValidationIssue[];

  constructor(label: string, code: FinanceErrorCode, issues: ValidationIssue[]) {
    super(`${label}: ${describeIssues(issues)}`, code, "validation", { issues });
    this.issues = issues;
  }
}

export class InvalidPricingInputError extends ValidationFailure {
  constructor(issues: ValidationIssue[]) {
    super("Invalid pricing input", "INVALID_PRICING_INPUT", issues);
  }
}

export class InvalidBenchmarkError extends ValidationFailure {
  constructor(issues: ValidationIssue[]) {
    super("Invalid deviation benchmark", "INVALID_BENCHMARK", issues);
  }
}

export class InvalidLedgerEntryError extends ValidationFailure {
  constructor(issues: ValidationIssue[]) {
    super("Invalid ledger entry", "INVALID_LEDGER_ENTRY", issues);
  }
}

export class InvalidPayoutAmountError extends ValidationFailure {
  constructor(issues: ValidationIssue[]) {
    super("Invalid payout request", "INVALID_PAYOUT_AMOUNT", issues);
  }
}

export class InvalidShippingInputError extends ValidationFailure {
  constructor(issues: ValidationIssue[]) {
    super("Invalid shipping input", "INVALID_SHIPPING_INPUT", issues);
  }
}

export class InvalidPolicyConfigError extends ValidationFailure {
  constructor(issues: ValidationIssue[]) {
    super("Invalid policy configuration", "INVALID_POLICY_CONFIG", issues);
  }
}

/* =========================
   POLICY / PRECONDITION
========================= */

export class WalletNotFoundError extends FinanceError {
  constructor(vendorId: string) {
    super(`No wallet provisioned for vendor ${vendorId}`, "WALLET_NOT_FOUND", "policy", { vendorId });
  }
}

export class BelowMinimumThresholdError extends FinanceError {
  constructor(requested: string, minimum: string) {
    super(
      `Payout amount must be at least ${minimum}. Requested: ${requested}.`,
      "BELOW_MINIMUM_THRESHOLD",
      "policy",
      { requested, minimum }
    );
  }
}

export class InsufficientBalanceError extends FinanceError {
  constructor(requested: string, available: string, details?: Record<string, unknown>) {
    super(
      `Insufficient balance. Available: ${available}, Requested: ${requested}.`,
      "INSUFFICIENT_BALANCE",
      "policy",
      { requested, available, ...details }
    );
  }
}

export class EscrowHoldActiveError extends FinanceError {
  constructor(orderId: string, releaseDate: Date) {
    super(
      `Funds for order ${orderId} are held until ${releaseDate.toISOString()}`,
      "ESCROW_HOLD_ACTIVE",
      "policy",
      { orderId, releaseDate: releaseDate.toISOString() }
    );
  }
}

/* =========================
   INVARIANT VIOLATIONS
========================= */

export class NegativeBalanceViolationError extends FinanceError {
  constructor(vendorId: string, balance: "pendingBalance" | "availableBalance", result: string) {
    super(
      `Applying entry would drive ${balance} of vendor ${vendorId} to ${result}`,
      "NEGATIVE_BALANCE_VIOLATION",
      "invariant",
      { vendorId, balance, result }
    );
  }
}

export class AccountingIdentityViolationError extends FinanceError {
  constructor(vendorId: string, net: string, balances: string) {
    super(
      `Wallet ${vendorId} out of balance: earnings - payouts = ${net}, pending + available = ${balances}`,
      "ACCOUNTING_IDENTITY_VIOLATION",
      "invariant",
      { vendorId, net, balances }
    );
  }
}

export class ConcurrencyConflictError extends FinanceError {
  constructor(vendorId: string, attempts: number) {
    super(
      `Wallet ${vendorId} kept changing underneath; gave up after ${attempts} attempts`,
      "CONCURRENCY_CONFLICT",
      "invariant",
      { vendorId, attempts }
    );
  }
}
