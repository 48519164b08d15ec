/**
 * Decomposition
 */

export {
  DecompositionCoordinator,
  type CoordinatorConfig,
  type DecomposeOptions,
  type SpawnContext,
  type SpawnFn,
} from "./coordinator.js";
export { RecursionGuard } from "./guard.js";
export { WorkerPool } from "./worker-pool.js";
