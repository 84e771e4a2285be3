import { resolve } from "node:path";

const PROJECT_ROOT = resolve(__dirname, "..", "..");
const DATA_ROOT = resolve(PROJECT_ROOT, "data");

export const paths = {
  projectRoot: PROJECT_ROOT,
  dataRoot: DATA_ROOT,
  /** Created on first write by the file store. */
  ledgerStore: resolve(DATA_ROOT, "ledger-store.json")
};
