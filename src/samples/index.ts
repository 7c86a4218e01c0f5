/**
 * JSON sample collection for opaque JSON columns.
 *
 * @module samples
 * @category Samples
 */

export {
  collectSamples,
  isInterestingSample,
  jsonColumns,
  pickSample,
  writeSampleFile,
} from './collector';
export type { SampleMap, SampleSource } from './collector';
