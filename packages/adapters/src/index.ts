// ============================================
// Adapters Package Entry
// ============================================

// Base interfaces
export type { VenueAdapter } from "./base/IVenueAdapter.js";
export type { YieldOracle, RiskOracle, PriceOracle } from "./base/IOracle.js";
export { VenueRegistry, type RegisterVenueOptions } from "./base/VenueRegistry.js";

// Dry-run venue
export {
  SimulatedVenueAdapter,
  type SimulatedMarket,
  type SimulatedOperation,
  type SimulatedCall,
  type SimulatedVenueOptions,
  type TransferHook,
} from "./simulated/SimulatedVenueAdapter.js";

// Oracles
export { AdapterYieldOracle } from "./oracles/AdapterYieldOracle.js";
export { TableRiskOracle, TablePriceOracle, type RiskEntry } from "./oracles/TableOracles.js";
