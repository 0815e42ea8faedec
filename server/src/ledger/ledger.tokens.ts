/** AssetVault operating the custody account */
export const LEDGER_VAULT = Symbol("LEDGER_VAULT");
/** Clock shared by the vault and the engines */
export const LEDGER_CLOCK = Symbol("LEDGER_CLOCK");
