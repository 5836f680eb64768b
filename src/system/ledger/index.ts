export { createLedger, createZoneBalance } from './ledger';
export type { ApplyEtOutcome, Ledger, LedgerOptions, LedgerZones, ZoneBalance } from './types';
