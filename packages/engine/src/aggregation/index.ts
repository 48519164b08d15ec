/**
 * Sub-forecast aggregation
 */

export {
  aggregate,
  DEFAULT_PROBABILITY_FLOOR,
  DEFAULT_PROBABILITY_CEILING,
  type AggregateOptions,
} from "./aggregator.js";
