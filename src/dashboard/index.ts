/**
 * Dashboard Module Entry Point
 *
 * Exports the dashboard functionality for use by the CLI.
 */

export { generateDashboard, syncMachineState, discoverLocal, type GenerateResult, type GeneratePhase } from './generate.js';
export { renderCatalog, renderScanResults, renderWarnings, renderGenerateSummary } from './cli-renderer.js';
export { PinStore } from './pins.js';
export { startServer, createRelayApp, type RunningServer } from './web/server.js';
