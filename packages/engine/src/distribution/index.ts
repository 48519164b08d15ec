/**
 * Distribution synthesis
 */

export { createBounds } from "./bounds.js";
export {
  createContinuousCdf,
  isValidCdf,
  maxStepFor,
  minGapFor,
  mixCdfValues,
  repairCdf,
  uniformCdf,
} from "./cdf.js";
export { synthesize, percentilesToCdf, type SynthesizeOptions } from "./synthesizer.js";
export { synthesizeMixture } from "./mixture.js";
