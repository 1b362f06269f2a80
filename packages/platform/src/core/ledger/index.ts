export {
  LicenseLedger,
  type LicenseLedgerDeps,
  type CreditBalance,
  type ReplenishResult,
  type ExecutionCheck,
  type TransactionQuery,
} from "./ledger.js";
export { classifyTierChange, hasUsableLicense } from "./rules.js";
