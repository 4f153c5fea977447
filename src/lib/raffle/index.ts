export * from "./types.js";
export * from "./errors.js";
export { EntryLedger, type LedgerSnapshot } from "./entry-ledger.js";
export {
  Round,
  type RoundCheckpoint,
  settingsFromRecord,
  settingsToRecord,
} from "./round.js";
export {
  EMPTY_PERFORM_DATA,
  assertUpkeepNeeded,
  checkUpkeep,
  evaluateUpkeep,
  snapshotRound,
  type UpkeepEvaluation,
  type UpkeepSnapshot,
} from "./upkeep.js";
export {
  DrawCoordinator,
  selectWinnerIndex,
  type DrawCoordinatorDeps,
} from "./draw-coordinator.js";
export {
  BufferedEventSink,
  type AutomationGateway,
  type PayoutGateway,
  type RaffleEventSink,
  type RandomnessGateway,
} from "./gateways.js";
export { Raffle, type Clock, type EntryDebit, type RaffleDeps } from "./raffle.js";
